// Zod schemas for the model snapshot, project options and plan records

import { z } from 'zod';
import type { PlanRecord, RequiredPlanField } from '../types';

// === MODEL SNAPSHOT ===

const Point3DSchema = z.object({
    x: z.number(),
    y: z.number(),
    z: z.number().default(0)
});

export const BoundingBoxSchema = z.object({
    min: Point3DSchema,
    max: Point3DSchema
});

export const WallSchema = z.object({
    id: z.string(),
    boundingBox: BoundingBoxSchema.nullable().default(null)
});

export const LevelSchema = z.object({
    name: z.string(),
    elevation: z.number().optional()
});

export const SpatialRegionSchema = z.object({
    name: z.string().default(''),
    area: z.number()
});

export const DoorSchema = z.object({
    typeName: z.string()
});

// Schedules exported with numeric cells still read as text
const CellSchema = z.union([z.string(), z.number(), z.null()]).transform(v => (v === null ? '' : String(v)));

export const InlineReportSchema = z.object({
    title: z.string(),
    rows: z.array(z.array(CellSchema))
});

// Report exported next to the snapshot as CSV, path relative to the snapshot
export const CsvReportSchema = z.object({
    title: z.string(),
    csv: z.string().min(1)
});

export const ReportSchema = z.union([InlineReportSchema, CsvReportSchema]);

export const ModelSnapshotSchema = z.object({
    title: z.string().default(''),
    attributes: z.record(z.union([z.string(), z.number(), z.null()])).default({}),
    walls: z.array(WallSchema).default([]),
    levels: z.array(LevelSchema).default([]),
    rooms: z.array(SpatialRegionSchema).default([]),
    doors: z.array(DoorSchema).default([]),
    reports: z.array(ReportSchema).default([])
}).passthrough();

export type ModelSnapshot = z.infer<typeof ModelSnapshotSchema>;
export type ModelSnapshotInput = z.input<typeof ModelSnapshotSchema>;
export type ReportDeclaration = z.infer<typeof ReportSchema>;

// === PROJECT OPTIONS (attribute form selection lists) ===

const OptionListSchema = z.array(z.string().trim().min(1)).min(1);

export const ProjectOptionsSchema = z.object({
    specLevels: OptionListSchema,
    clientNames: OptionListSchema,
    clientDivisions: OptionListSchema,
    garageLoadings: OptionListSchema
});

export type ProjectOptions = z.infer<typeof ProjectOptionsSchema>;

// === PLAN RECORD ===

const Count = z.number().int().nonnegative();

export const PlanRecordSchema = z.object({
    planName: z.string(),
    specLevel: z.string(),
    clientName: z.string(),
    clientDivision: z.string(),
    clientSubdivision: z.string(),
    garageLoading: z.string(),
    overallWidth: z.string(),
    overallDepth: z.string(),
    stories: Count,
    bedrooms: Count,
    bathrooms: z.number().nonnegative().refine(v => Number.isInteger(v * 2), 'bathrooms must be a multiple of 0.5'),
    garageBays: Count,
    livingArea: Count,
    totalArea: Count
});

export const REQUIRED_FIELDS: readonly RequiredPlanField[] = [
    'planName',
    'specLevel',
    'clientName',
    'clientDivision',
    'clientSubdivision'
];

export const REQUIRED_FIELD_LABELS: Record<RequiredPlanField, string> = {
    planName: 'Plan Name',
    specLevel: 'Spec Level',
    clientName: 'Client Name',
    clientDivision: 'Client Division',
    clientSubdivision: 'Client Subdivision'
};

/**
 * Labels of required fields that are blank (empty or whitespace), in field order
 */
export function getMissingRequiredFields(record: Pick<PlanRecord, RequiredPlanField>): string[] {
    return REQUIRED_FIELDS.filter(f => record[f].trim() === '').map(f => REQUIRED_FIELD_LABELS[f]);
}

export function isPlanRecordComplete(record: PlanRecord): boolean {
    return getMissingRequiredFields(record).length === 0;
}

export function formatZodIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}
