/**
 * Supabase Plan Store
 *
 * Hosted REST backend (PostgREST behind supabase-js). Authenticates with the
 * service role key as bearer token; rows are updated by id.
 */

import { createClient, type PostgrestError, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { PlanNaturalKey, PlanRecord } from '../../types';
import { DEFAULT_TABLE, type RestStoreConfig } from '../config/app-config';
import { ErrorCode, PlanQueryError, toPlanQueryError } from '../errors/types';
import { logger } from '../logger';
import { formatNaturalKey, toPlanRow, toUpdateRow, type PlanMatch, type PlanStore } from './plan-store';

const LookupRowsSchema = z.array(z.object({ id: z.union([z.number(), z.string()]) }));

export function createServiceClient(supabaseUrl: string, serviceRoleKey: string, fetchImpl?: typeof fetch): SupabaseClient {
    return createClient(supabaseUrl, serviceRoleKey, {
        auth: { persistSession: false, autoRefreshToken: false },
        ...(fetchImpl ? { global: { fetch: fetchImpl } } : {})
    });
}

export class SupabasePlanStore implements PlanStore {
    readonly backend = 'rest';

    constructor(
        private readonly client: SupabaseClient,
        private readonly table: string = DEFAULT_TABLE
    ) {}

    static fromConfig(config: RestStoreConfig): SupabasePlanStore {
        return new SupabasePlanStore(createServiceClient(config.supabaseUrl, config.serviceRoleKey), config.table);
    }

    async findByNaturalKey(key: PlanNaturalKey): Promise<PlanMatch | null> {
        logger.debug('REST lookup', { table: this.table });
        const { data, error, status } = await this.client
            .from(this.table)
            .select('id')
            .eq('plan_name', key.planName)
            .eq('spec_level', key.specLevel)
            .eq('client_subdivision', key.clientSubdivision);

        if (error) throw this.toError(error, status, 'lookup');

        const rows = LookupRowsSchema.safeParse(data);
        if (!rows.success) {
            throw PlanQueryError.create(ErrorCode.DB_INVALID_RESPONSE, 'Lookup returned rows without an id', {
                table: this.table
            });
        }

        if (rows.data.length === 0) return null;
        if (rows.data.length > 1) {
            throw PlanQueryError.create(
                ErrorCode.DB_DUPLICATE_NATURAL_KEY,
                `${rows.data.length} rows share the plan key ${formatNaturalKey(key)}`,
                { table: this.table, key, count: rows.data.length }
            );
        }

        return { key, id: rows.data[0].id };
    }

    async insert(record: PlanRecord): Promise<void> {
        logger.debug('REST insert', { table: this.table });
        const { error, status } = await this.client.from(this.table).insert(toPlanRow(record));

        if (error) throw this.toError(error, status, 'insert');
    }

    async update(match: PlanMatch, record: PlanRecord): Promise<void> {
        if (match.id === null) {
            throw PlanQueryError.create(ErrorCode.DB_INVALID_RESPONSE, 'Matched row has no id to update', {
                table: this.table,
                key: match.key
            });
        }

        logger.debug('REST update', { table: this.table, id: match.id });
        const { data, error, status } = await this.client
            .from(this.table)
            .update(toUpdateRow(record))
            .eq('id', match.id)
            .select('id');

        if (error) throw this.toError(error, status, 'update');

        // the row can disappear between lookup and update
        if (!data || data.length === 0) {
            throw PlanQueryError.create(
                ErrorCode.DB_QUERY_FAILED,
                `No row matched the plan key ${formatNaturalKey(match.key)} during update`,
                { table: this.table, key: match.key, id: match.id }
            );
        }
    }

    async close(): Promise<void> {
        // stateless HTTP client; nothing to release
    }

    private toError(error: PostgrestError, status: number, operation: string): PlanQueryError {
        return toPlanQueryError(
            { message: error.message, code: error.code || undefined, status },
            ErrorCode.DB_QUERY_FAILED,
            { operation, table: this.table, ...(error.details ? { details: error.details } : {}) }
        );
    }
}
