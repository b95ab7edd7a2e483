// Structured error handling for extraction and synchronization

export enum ErrorCode {
    // Model snapshot errors
    MODEL_FILE_NOT_FOUND = 'MODEL_001',
    MODEL_INVALID_FORMAT = 'MODEL_002',
    MODEL_REPORT_NOT_FOUND = 'MODEL_003',
    MODEL_WRITE_FAILED = 'MODEL_004',

    // Configuration errors
    CONFIG_INVALID = 'CONFIG_001',
    CONFIG_OPTIONS_INVALID = 'CONFIG_002',

    // Validation errors
    VALIDATION_MISSING_REQUIRED = 'VALID_001',
    VALIDATION_INVALID_RECORD = 'VALID_002',

    // Database errors
    DB_CONNECTION_FAILED = 'DB_001',
    DB_QUERY_FAILED = 'DB_002',
    DB_CONSTRAINT_VIOLATION = 'DB_003',
    DB_DUPLICATE_NATURAL_KEY = 'DB_004',
    DB_INVALID_RESPONSE = 'DB_005',

    // Authentication errors
    AUTH_UNAUTHORIZED = 'AUTH_001',
    AUTH_FORBIDDEN = 'AUTH_002',

    // General errors
    UNKNOWN_ERROR = 'UNKNOWN_001',
    NETWORK_ERROR = 'NETWORK_001',
}

export interface AppError {
    code: ErrorCode;
    message: string;
    context: Record<string, unknown>;
    suggestedAction?: string;
    originalError?: Error;
    timestamp: string;
}

/**
 * Create a structured application error with context
 * @example
 * ```ts
 * const error = createAppError(
 *   ErrorCode.MODEL_INVALID_FORMAT,
 *   'Model snapshot is not valid JSON',
 *   { path: 'exports/aspen.json' }
 * );
 * ```
 */
export function createAppError(
    code: ErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    originalError?: Error
): AppError {
    return {
        code,
        message,
        context,
        suggestedAction: SUGGESTED_ACTIONS[code],
        originalError,
        timestamp: new Date().toISOString(),
    };
}

const SUGGESTED_ACTIONS: Record<ErrorCode, string | undefined> = {
    [ErrorCode.MODEL_FILE_NOT_FOUND]: 'Check the model snapshot path',
    [ErrorCode.MODEL_INVALID_FORMAT]: 'Re-export the model snapshot from the design model',
    [ErrorCode.MODEL_REPORT_NOT_FOUND]: 'Check the report file referenced by the snapshot',
    [ErrorCode.MODEL_WRITE_FAILED]: 'Check that the snapshot file is writable',

    [ErrorCode.CONFIG_INVALID]: 'Fix the listed environment variables (see .env.example)',
    [ErrorCode.CONFIG_OPTIONS_INVALID]: 'Fix the project options file',

    [ErrorCode.VALIDATION_MISSING_REQUIRED]: 'Set the missing fields with edit-attributes',
    [ErrorCode.VALIDATION_INVALID_RECORD]: undefined,

    [ErrorCode.DB_CONNECTION_FAILED]: 'Check the database address and that it is reachable',
    [ErrorCode.DB_QUERY_FAILED]: undefined,
    [ErrorCode.DB_CONSTRAINT_VIOLATION]: 'A row with the same plan, spec level and subdivision may already exist',
    [ErrorCode.DB_DUPLICATE_NATURAL_KEY]: 'Remove the duplicate rows from the plans table',
    [ErrorCode.DB_INVALID_RESPONSE]: 'Check that the table has the expected columns',

    [ErrorCode.AUTH_UNAUTHORIZED]: 'Check the service key or database credentials',
    [ErrorCode.AUTH_FORBIDDEN]: 'The credential lacks permission on the plans table',

    [ErrorCode.UNKNOWN_ERROR]: undefined,
    [ErrorCode.NETWORK_ERROR]: 'Check your network connection',
};

/**
 * Throwable wrapper around an AppError
 */
export class PlanQueryError extends Error {
    readonly appError: AppError;

    constructor(appError: AppError) {
        super(appError.message);
        this.name = 'PlanQueryError';
        this.appError = appError;
    }

    get code(): ErrorCode {
        return this.appError.code;
    }

    static create(code: ErrorCode, message: string, context: Record<string, unknown> = {}, originalError?: Error): PlanQueryError {
        return new PlanQueryError(createAppError(code, message, context, originalError));
    }
}

// Shape shared by pg's DatabaseError, Node system errors and PostgREST errors
interface ErrorLike {
    message?: unknown;
    code?: unknown;
    status?: unknown;
}

function isErrorLike(value: unknown): value is ErrorLike {
    return typeof value === 'object' && value !== null;
}

const CONNECTION_ERRNOS = ['ECONNREFUSED', 'ENOTFOUND', 'ECONNRESET', 'ETIMEDOUT', 'EAI_AGAIN'];

/**
 * Classify a driver error code (SQLSTATE or errno) or HTTP status
 */
export function classifyRemoteError(code: string | undefined, status: number | undefined, fallback: ErrorCode): ErrorCode {
    if (code) {
        if (code.startsWith('23')) return ErrorCode.DB_CONSTRAINT_VIOLATION;
        if (code.startsWith('28')) return ErrorCode.AUTH_UNAUTHORIZED;
        if (code === '42501') return ErrorCode.AUTH_FORBIDDEN;
        if (code.startsWith('08') || CONNECTION_ERRNOS.includes(code)) return ErrorCode.DB_CONNECTION_FAILED;
    }

    if (status !== undefined) {
        if (status === 0) return ErrorCode.NETWORK_ERROR;
        if (status === 401) return ErrorCode.AUTH_UNAUTHORIZED;
        if (status === 403) return ErrorCode.AUTH_FORBIDDEN;
        if (status === 409) return ErrorCode.DB_CONSTRAINT_VIOLATION;
    }

    return fallback;
}

/**
 * Normalize anything thrown into a PlanQueryError
 */
export function toPlanQueryError(
    error: unknown,
    fallback: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context: Record<string, unknown> = {}
): PlanQueryError {
    if (error instanceof PlanQueryError) return error;

    if (isErrorLike(error)) {
        const message = typeof error.message === 'string' && error.message ? error.message : String(error);
        const code = typeof error.code === 'string' ? error.code : undefined;
        const status = typeof error.status === 'number' ? error.status : undefined;
        const original = error instanceof Error ? error : undefined;

        return PlanQueryError.create(
            classifyRemoteError(code, status, fallback),
            message,
            { ...context, ...(code ? { driverCode: code } : {}), ...(status !== undefined ? { status } : {}) },
            original
        );
    }

    return PlanQueryError.create(fallback, String(error), context);
}

/**
 * Message plus suggested action, for notifications
 */
export function describeError(error: unknown): string {
    const planError = toPlanQueryError(error);
    const { message, suggestedAction } = planError.appError;
    return suggestedAction ? `${message}\n${suggestedAction}` : message;
}
