/**
 * SQL Plan Store
 *
 * PostgreSQL backend. Rows are matched on the natural key columns; every
 * statement is parameterized, only the table name is interpolated (validated
 * by the config layer and quoted here).
 */

import { Pool } from 'pg';
import { z } from 'zod';
import type { PlanNaturalKey, PlanRecord } from '../../types';
import { DEFAULT_TABLE } from '../config/app-config';
import { ErrorCode, PlanQueryError, toPlanQueryError } from '../errors/types';
import { logger } from '../logger';
import {
    NON_KEY_COLUMNS,
    PLAN_COLUMNS,
    formatNaturalKey,
    toPlanRow,
    toUpdateRow,
    type PlanMatch,
    type PlanStore
} from './plan-store';

export interface SqlQueryResult {
    rows: Record<string, unknown>[];
    rowCount: number | null;
}

// The slice of pg's Pool the store needs
export interface SqlExecutor {
    query(text: string, values?: unknown[]): Promise<SqlQueryResult>;
    end(): Promise<void>;
}

export function poolExecutor(pool: Pool): SqlExecutor {
    return {
        async query(text, values) {
            const result = await pool.query(text, values);
            return { rows: result.rows, rowCount: result.rowCount };
        },
        end: () => pool.end()
    };
}

export function createPoolExecutor(connectionString: string): SqlExecutor {
    return poolExecutor(new Pool({ connectionString, max: 1 }));
}

// COUNT(*) is a bigint, which pg returns as text
const CountRowSchema = z.object({ match_count: z.coerce.number().int().nonnegative() });

export function quoteIdentifier(name: string): string {
    return name
        .split('.')
        .map(part => `"${part.replaceAll('"', '""')}"`)
        .join('.');
}

export class SqlPlanStore implements PlanStore {
    readonly backend = 'sql';
    private readonly table: string;

    constructor(
        private readonly executor: SqlExecutor,
        table: string = DEFAULT_TABLE
    ) {
        this.table = quoteIdentifier(table);
    }

    async findByNaturalKey(key: PlanNaturalKey): Promise<PlanMatch | null> {
        const result = await this.run(
            'lookup',
            `SELECT COUNT(*) AS match_count FROM ${this.table} WHERE plan_name = $1 AND spec_level = $2 AND client_subdivision = $3`,
            [key.planName, key.specLevel, key.clientSubdivision]
        );

        const parsed = CountRowSchema.safeParse(result.rows[0]);
        if (!parsed.success) {
            throw PlanQueryError.create(ErrorCode.DB_INVALID_RESPONSE, 'Lookup returned no match count', {
                table: this.table
            });
        }

        const count = parsed.data.match_count;
        if (count === 0) return null;
        if (count > 1) {
            throw PlanQueryError.create(
                ErrorCode.DB_DUPLICATE_NATURAL_KEY,
                `${count} rows share the plan key ${formatNaturalKey(key)}`,
                { table: this.table, key, count }
            );
        }

        return { key, id: null };
    }

    async insert(record: PlanRecord): Promise<void> {
        const row = toPlanRow(record);
        const placeholders = PLAN_COLUMNS.map((_, i) => `$${i + 1}`).join(', ');

        await this.run(
            'insert',
            `INSERT INTO ${this.table} (${PLAN_COLUMNS.join(', ')}) VALUES (${placeholders})`,
            PLAN_COLUMNS.map(column => row[column])
        );
    }

    async update(match: PlanMatch, record: PlanRecord): Promise<void> {
        const row = toUpdateRow(record);
        const assignments = NON_KEY_COLUMNS.map((column, i) => `${column} = $${i + 1}`).join(', ');
        const k = NON_KEY_COLUMNS.length;

        const result = await this.run(
            'update',
            `UPDATE ${this.table} SET ${assignments} WHERE plan_name = $${k + 1} AND spec_level = $${k + 2} AND client_subdivision = $${k + 3}`,
            [
                ...NON_KEY_COLUMNS.map(column => row[column]),
                match.key.planName,
                match.key.specLevel,
                match.key.clientSubdivision
            ]
        );

        // the row can disappear between lookup and update
        if (result.rowCount === 0) {
            throw PlanQueryError.create(
                ErrorCode.DB_QUERY_FAILED,
                `No row matched the plan key ${formatNaturalKey(match.key)} during update`,
                { table: this.table, key: match.key }
            );
        }
    }

    async close(): Promise<void> {
        await this.executor.end();
    }

    private async run(operation: string, text: string, values: unknown[]): Promise<SqlQueryResult> {
        logger.debug(`SQL ${operation}`, { table: this.table });
        try {
            return await this.executor.query(text, values);
        } catch (error) {
            throw toPlanQueryError(error, ErrorCode.DB_QUERY_FAILED, { operation, table: this.table });
        }
    }
}
