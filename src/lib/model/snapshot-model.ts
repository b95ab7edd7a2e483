/**
 * Model Snapshot
 *
 * A JSON export of the design model: project attributes, walls with their
 * bounding boxes, levels, rooms, doors and schedules. Schedules are either
 * inline row grids or CSV files sitting next to the snapshot.
 */

import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import { parse } from 'csv-parse/sync';
import type {
    AttributeValue,
    DoorElement,
    LevelElement,
    SpatialRegion,
    TabularReport,
    WallElement
} from '../../types';
import { ErrorCode, PlanQueryError } from '../errors/types';
import { logger } from '../logger';
import {
    ModelSnapshotSchema,
    formatZodIssues,
    type ModelSnapshot,
    type ModelSnapshotInput,
    type ReportDeclaration
} from '../validation';
import type { WritableDesignModel } from './design-model';

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

export class SnapshotDesignModel implements WritableDesignModel {
    private snapshot: ModelSnapshot;
    private readonly reports: TabularReport[];
    private readonly filePath: string | null;

    constructor(snapshot: ModelSnapshot, reports: TabularReport[], filePath: string | null = null) {
        this.snapshot = snapshot;
        this.reports = reports;
        this.filePath = filePath;
    }

    /**
     * In-memory model. CSV reports can't be resolved without a file, so only
     * inline reports are kept.
     */
    static fromSnapshot(input: ModelSnapshotInput): SnapshotDesignModel {
        const snapshot = parseModelSnapshot(input, '<memory>');
        const reports = snapshot.reports.flatMap(r => ('rows' in r ? [{ title: r.title, rows: r.rows }] : []));
        return new SnapshotDesignModel(snapshot, reports);
    }

    getTitle(): string {
        return this.snapshot.title;
    }

    getAttribute(name: string): string {
        const value = Object.hasOwn(this.snapshot.attributes, name) ? this.snapshot.attributes[name] : null;
        if (value === null || value === undefined) return '';

        return typeof value === 'number' ? String(value) : value.trim();
    }

    hasAttribute(name: string): boolean {
        return Object.hasOwn(this.snapshot.attributes, name);
    }

    getWalls(): WallElement[] {
        return this.snapshot.walls.map(w => ({ id: w.id, boundingBox: w.boundingBox }));
    }

    getLevels(): LevelElement[] {
        return this.snapshot.levels.map(l => ({ ...l }));
    }

    getSpatialRegions(): SpatialRegion[] {
        return this.snapshot.rooms.map(r => ({ name: r.name, area: r.area }));
    }

    getDoors(): DoorElement[] {
        return this.snapshot.doors.map(d => ({ typeName: d.typeName }));
    }

    getReports(): TabularReport[] {
        return this.reports.map(r => ({ title: r.title, rows: r.rows.map(row => [...row]) }));
    }

    defineAttribute(name: string): void {
        if (this.hasAttribute(name)) return;
        this.snapshot = { ...this.snapshot, attributes: { ...this.snapshot.attributes, [name]: '' } };
    }

    setAttribute(name: string, value: AttributeValue): boolean {
        if (!this.hasAttribute(name)) return false;
        this.snapshot = { ...this.snapshot, attributes: { ...this.snapshot.attributes, [name]: value } };
        return true;
    }

    async save(): Promise<void> {
        // in-memory models have nothing to persist
        if (!this.filePath) return;

        try {
            await writeFile(this.filePath, JSON.stringify(this.snapshot, null, 2) + '\n', 'utf-8');
            logger.debug('Model snapshot saved', { path: this.filePath });
        } catch (error) {
            throw PlanQueryError.create(
                ErrorCode.MODEL_WRITE_FAILED,
                `Could not write model snapshot: ${this.filePath}`,
                { path: this.filePath },
                error instanceof Error ? error : undefined
            );
        }
    }
}

export function parseModelSnapshot(data: unknown, source: string): ModelSnapshot {
    const result = ModelSnapshotSchema.safeParse(data);
    if (!result.success) {
        const issues = formatZodIssues(result.error);
        throw PlanQueryError.create(
            ErrorCode.MODEL_INVALID_FORMAT,
            `Invalid model snapshot ${source}:\n${issues.join('\n')}`,
            { source, issues }
        );
    }
    return result.data;
}

/**
 * Parse a CSV schedule into rows of text cells. Rows may have different
 * lengths; the value column is each row's last cell.
 */
export function parseReportCsv(content: string): string[][] {
    const rows: string[][] = parse(content, {
        relax_column_count: true,
        skip_empty_lines: true
    });
    return rows;
}

async function resolveReport(declaration: ReportDeclaration, baseDir: string): Promise<TabularReport> {
    if ('rows' in declaration) {
        return { title: declaration.title, rows: declaration.rows };
    }

    const csvPath = path.resolve(baseDir, declaration.csv);
    try {
        const content = await readFile(csvPath, 'utf-8');
        return { title: declaration.title, rows: parseReportCsv(content) };
    } catch (error) {
        if (isNodeError(error) && error.code === 'ENOENT') {
            throw PlanQueryError.create(
                ErrorCode.MODEL_REPORT_NOT_FOUND,
                `Report file not found: ${csvPath}`,
                { report: declaration.title, path: csvPath },
                error
            );
        }
        throw PlanQueryError.create(
            ErrorCode.MODEL_INVALID_FORMAT,
            `Could not read report "${declaration.title}" from ${csvPath}`,
            { report: declaration.title, path: csvPath },
            error instanceof Error ? error : undefined
        );
    }
}

/**
 * Load and validate a model snapshot from disk
 */
export async function loadModelSnapshot(filePath: string): Promise<SnapshotDesignModel> {
    const absolutePath = path.resolve(filePath);

    let content: string;
    try {
        content = await readFile(absolutePath, 'utf-8');
    } catch (error) {
        throw PlanQueryError.create(
            ErrorCode.MODEL_FILE_NOT_FOUND,
            `Model snapshot not found: ${absolutePath}`,
            { path: absolutePath },
            error instanceof Error ? error : undefined
        );
    }

    let data: unknown;
    try {
        data = JSON.parse(content);
    } catch (error) {
        throw PlanQueryError.create(
            ErrorCode.MODEL_INVALID_FORMAT,
            `Model snapshot is not valid JSON: ${absolutePath}`,
            { path: absolutePath },
            error instanceof Error ? error : undefined
        );
    }

    const snapshot = parseModelSnapshot(data, absolutePath);
    const baseDir = path.dirname(absolutePath);
    const reports: TabularReport[] = [];
    for (const declaration of snapshot.reports) {
        reports.push(await resolveReport(declaration, baseDir));
    }

    logger.info('Model snapshot loaded', {
        path: absolutePath,
        walls: snapshot.walls.length,
        levels: snapshot.levels.length,
        rooms: snapshot.rooms.length,
        reports: reports.length
    });

    return new SnapshotDesignModel(snapshot, reports, absolutePath);
}
