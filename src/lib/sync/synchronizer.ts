/**
 * Plan Synchronizer
 *
 * Lookup → Insert, or Lookup → Confirm-Update → Update | Cancelled.
 * At most one mutating call per run. The lookup and the mutation are separate
 * statements, so two runs on the same key at once can race; the table's
 * unique constraint turns a racing insert into DB_CONSTRAINT_VIOLATION.
 */

import type { PlanNaturalKey, PlanRecord } from '../../types';
import { ErrorCode, PlanQueryError, toPlanQueryError } from '../errors/types';
import { logger } from '../logger';
import { PlanRecordSchema, formatZodIssues, getMissingRequiredFields } from '../validation';
import { formatNaturalKey, naturalKeyOf, type PlanMatch, type PlanStore } from './plan-store';

export type SyncState = 'lookup' | 'insert' | 'confirm-update' | 'update' | 'cancelled';

export type SyncStatus = 'inserted' | 'updated' | 'cancelled';

export interface SyncResult {
    status: SyncStatus;
    key: PlanNaturalKey;
    transitions: SyncState[];
}

/** Asked only when a row with the same natural key exists. False cancels. */
export type ConfirmUpdate = (match: PlanMatch, record: PlanRecord) => boolean | Promise<boolean>;

export class PlanSynchronizer {
    constructor(private readonly store: PlanStore) {}

    async synchronize(record: PlanRecord, confirmUpdate: ConfirmUpdate): Promise<SyncResult> {
        this.assertSynchronizable(record);

        const key = naturalKeyOf(record);
        const transitions: SyncState[] = ['lookup'];

        const match = await this.step('lookup', () => this.store.findByNaturalKey(key));

        if (!match) {
            transitions.push('insert');
            await this.step('insert', () => this.store.insert(record));
            logger.info('Plan inserted', { key: formatNaturalKey(key), backend: this.store.backend });
            return { status: 'inserted', key, transitions };
        }

        transitions.push('confirm-update');
        const confirmed = await confirmUpdate(match, record);
        if (!confirmed) {
            transitions.push('cancelled');
            logger.info('Plan update declined', { key: formatNaturalKey(key) });
            return { status: 'cancelled', key, transitions };
        }

        transitions.push('update');
        await this.step('update', () => this.store.update(match, record));
        logger.info('Plan updated', { key: formatNaturalKey(key), backend: this.store.backend });
        return { status: 'updated', key, transitions };
    }

    private assertSynchronizable(record: PlanRecord): void {
        const missing = getMissingRequiredFields(record);
        if (missing.length > 0) {
            throw PlanQueryError.create(
                ErrorCode.VALIDATION_MISSING_REQUIRED,
                `Missing required information: ${missing.join(', ')}`,
                { missing }
            );
        }

        const result = PlanRecordSchema.safeParse(record);
        if (!result.success) {
            const issues = formatZodIssues(result.error);
            throw PlanQueryError.create(ErrorCode.VALIDATION_INVALID_RECORD, `Invalid plan record:\n${issues.join('\n')}`, {
                issues
            });
        }
    }

    private async step<T>(state: SyncState, action: () => Promise<T>): Promise<T> {
        try {
            return await action();
        } catch (error) {
            const planError = toPlanQueryError(error, ErrorCode.DB_QUERY_FAILED, { state });
            logger.error(`Plan sync failed during ${state}`, { code: planError.code, message: planError.message });
            throw planError;
        }
    }
}
