export * from './types';
export { logger, Logger } from './lib/logger';
export * from './lib/errors/types';
export * from './lib/config/app-config';
export { loadProjectOptions } from './lib/config/project-options';
export * from './lib/validation';
export * from './lib/model/design-model';
export * from './lib/model/project-attributes';
export { SnapshotDesignModel, loadModelSnapshot, parseModelSnapshot, parseReportCsv } from './lib/model/snapshot-model';
export * from './lib/processing/dimension-formatter';
export * from './lib/processing/area-report-parser';
export * from './lib/processing/space-classifier';
export * from './lib/processing/bbox-calculator';
export * from './lib/processing/plan-record-builder';
export * from './lib/processing/plan-summary';
export * from './lib/sync/plan-store';
export * from './lib/sync/sql-plan-store';
export * from './lib/sync/supabase-plan-store';
export { createPlanStore } from './lib/sync/store-factory';
export * from './lib/sync/synchronizer';
