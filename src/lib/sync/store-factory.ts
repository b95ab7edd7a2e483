import type { StoreConfig } from '../config/app-config';
import { logger } from '../logger';
import type { PlanStore } from './plan-store';
import { SqlPlanStore, createPoolExecutor } from './sql-plan-store';
import { SupabasePlanStore } from './supabase-plan-store';

export function createPlanStore(config: StoreConfig): PlanStore {
    logger.debug('Creating plan store', { backend: config.backend, table: config.table });

    if (config.backend === 'sql') {
        return new SqlPlanStore(createPoolExecutor(config.databaseUrl), config.table);
    }
    return SupabasePlanStore.fromConfig(config);
}
