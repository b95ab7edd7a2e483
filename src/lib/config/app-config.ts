/**
 * Application configuration from environment variables.
 * dotenv populates process.env at start-up; this module only validates it.
 */

import { z } from 'zod';
import { ErrorCode, PlanQueryError } from '../errors/types';
import { formatZodIssues } from '../validation';

export const DEFAULT_TABLE = 'house_plans';
export const DEFAULT_PROJECT_OPTIONS_PATH = 'config/project-options.json';

// plain identifier, optionally schema-qualified
const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

// .env files leave unset values as empty strings
const blankToUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const EnvSchema = z.object({
    PLAN_STORE_BACKEND: z.preprocess(blankToUndefined, z.enum(['rest', 'sql']).default('rest')),
    PLAN_STORE_TABLE: z.preprocess(
        blankToUndefined,
        z.string().trim().regex(TABLE_NAME_PATTERN, 'must be a plain SQL identifier').default(DEFAULT_TABLE)
    ),
    SUPABASE_URL: z.preprocess(blankToUndefined, z.string().trim().url().optional()),
    SUPABASE_SERVICE_ROLE_KEY: z.preprocess(blankToUndefined, z.string().trim().optional()),
    DATABASE_URL: z.preprocess(blankToUndefined, z.string().trim().optional()),
    PROJECT_OPTIONS_PATH: z.preprocess(blankToUndefined, z.string().trim().default(DEFAULT_PROJECT_OPTIONS_PATH)),
    MODEL_PATH: z.preprocess(blankToUndefined, z.string().trim().optional()),
});

export interface RestStoreConfig {
    backend: 'rest';
    table: string;
    supabaseUrl: string;
    serviceRoleKey: string;
}

export interface SqlStoreConfig {
    backend: 'sql';
    table: string;
    databaseUrl: string;
}

export type StoreConfig = RestStoreConfig | SqlStoreConfig;

export interface AppConfig {
    store: StoreConfig;
    projectOptionsPath: string;
    modelPath: string | null;
}

function invalidConfig(issues: string[]): PlanQueryError {
    return PlanQueryError.create(
        ErrorCode.CONFIG_INVALID,
        `Invalid configuration:\n${issues.join('\n')}`,
        { issues }
    );
}

export type LocalConfig = Omit<AppConfig, 'store'>;

function parseEnv(env: NodeJS.ProcessEnv): z.infer<typeof EnvSchema> {
    const result = EnvSchema.safeParse(env);
    if (!result.success) {
        throw invalidConfig(formatZodIssues(result.error));
    }
    return result.data;
}

function toLocalConfig(parsed: z.infer<typeof EnvSchema>): LocalConfig {
    return {
        projectOptionsPath: parsed.PROJECT_OPTIONS_PATH,
        modelPath: parsed.MODEL_PATH ?? null
    };
}

/**
 * Paths only. Commands that never reach the store don't need its credentials.
 */
export function loadLocalConfig(env: NodeJS.ProcessEnv = process.env): LocalConfig {
    return toLocalConfig(parseEnv(env));
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = parseEnv(env);
    const common = toLocalConfig(parsed);

    if (parsed.PLAN_STORE_BACKEND === 'sql') {
        if (!parsed.DATABASE_URL) {
            throw invalidConfig(['DATABASE_URL: required when PLAN_STORE_BACKEND=sql']);
        }
        return {
            ...common,
            store: { backend: 'sql', table: parsed.PLAN_STORE_TABLE, databaseUrl: parsed.DATABASE_URL }
        };
    }

    const missing: string[] = [];
    if (!parsed.SUPABASE_URL) missing.push('SUPABASE_URL: required when PLAN_STORE_BACKEND=rest');
    if (!parsed.SUPABASE_SERVICE_ROLE_KEY) missing.push('SUPABASE_SERVICE_ROLE_KEY: required when PLAN_STORE_BACKEND=rest');
    // the REST API only exposes tables of its configured schema
    if (parsed.PLAN_STORE_TABLE.includes('.')) missing.push('PLAN_STORE_TABLE: must not be schema-qualified when PLAN_STORE_BACKEND=rest');
    if (!parsed.SUPABASE_URL || !parsed.SUPABASE_SERVICE_ROLE_KEY || missing.length > 0) {
        throw invalidConfig(missing);
    }

    return {
        ...common,
        store: {
            backend: 'rest',
            table: parsed.PLAN_STORE_TABLE,
            supabaseUrl: parsed.SUPABASE_URL,
            serviceRoleKey: parsed.SUPABASE_SERVICE_ROLE_KEY
        }
    };
}
