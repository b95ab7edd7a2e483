/**
 * Plan store contract shared by the SQL and REST backends, plus the mapping
 * between PlanRecord fields and table columns.
 */

import type { PlanNaturalKey, PlanRecord } from '../../types';

// Table row, column names as in sql/house_plans.sql
export interface PlanRow {
    plan_name: string;
    spec_level: string;
    client_name: string;
    client_division: string;
    client_subdivision: string;
    garage_loading: string;
    overall_width: string;
    overall_depth: string;
    stories: number;
    bedrooms: number;
    bathrooms: number;
    garage_bays: number;
    living_area: number;
    total_area: number;
}

export type PlanColumn = keyof PlanRow;

export const KEY_COLUMNS = ['plan_name', 'spec_level', 'client_subdivision'] as const;

export type KeyColumn = (typeof KEY_COLUMNS)[number];

export type PlanRowUpdate = Omit<PlanRow, KeyColumn>;

export const PLAN_COLUMNS: readonly PlanColumn[] = [
    'plan_name',
    'spec_level',
    'client_name',
    'client_division',
    'client_subdivision',
    'garage_loading',
    'overall_width',
    'overall_depth',
    'stories',
    'bedrooms',
    'bathrooms',
    'garage_bays',
    'living_area',
    'total_area'
];

export const NON_KEY_COLUMNS: readonly (keyof PlanRowUpdate)[] = [
    'client_name',
    'client_division',
    'garage_loading',
    'overall_width',
    'overall_depth',
    'stories',
    'bedrooms',
    'bathrooms',
    'garage_bays',
    'living_area',
    'total_area'
];

/**
 * A stored row matching a natural key. `id` is the row's primary key where the
 * backend addresses rows by id; the SQL backend matches on the key itself.
 */
export interface PlanMatch {
    key: PlanNaturalKey;
    id: number | string | null;
}

export interface PlanStore {
    readonly backend: 'rest' | 'sql';
    /** Null when no row matches. More than one match raises DB_DUPLICATE_NATURAL_KEY. */
    findByNaturalKey(key: PlanNaturalKey): Promise<PlanMatch | null>;
    insert(record: PlanRecord): Promise<void>;
    /** Overwrites the non-key columns of the matched row */
    update(match: PlanMatch, record: PlanRecord): Promise<void>;
    close(): Promise<void>;
}

export function naturalKeyOf(record: PlanRecord): PlanNaturalKey {
    return {
        planName: record.planName,
        specLevel: record.specLevel,
        clientSubdivision: record.clientSubdivision
    };
}

export function formatNaturalKey(key: PlanNaturalKey): string {
    return `${key.planName} / ${key.specLevel} / ${key.clientSubdivision}`;
}

export function toUpdateRow(record: PlanRecord): PlanRowUpdate {
    return {
        client_name: record.clientName,
        client_division: record.clientDivision,
        garage_loading: record.garageLoading,
        overall_width: record.overallWidth,
        overall_depth: record.overallDepth,
        stories: record.stories,
        bedrooms: record.bedrooms,
        bathrooms: record.bathrooms,
        garage_bays: record.garageBays,
        living_area: record.livingArea,
        total_area: record.totalArea
    };
}

export function toPlanRow(record: PlanRecord): PlanRow {
    return {
        plan_name: record.planName,
        spec_level: record.specLevel,
        client_subdivision: record.clientSubdivision,
        ...toUpdateRow(record)
    };
}
