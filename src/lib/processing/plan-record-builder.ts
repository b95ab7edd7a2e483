/**
 * Plan Record Builder
 *
 * Reads live model state and assembles one PlanRecord. Nothing here talks to
 * the store; the caller checks completeness before synchronizing.
 */

import type { LevelElement, PlanRecord } from '../../types';
import { logger } from '../logger';
import { ATTRIBUTE, type DesignModel } from '../model/design-model';
import { extractLivingArea, extractTotalArea, findFloorAreaReport } from './area-report-parser';
import { calculatePlanExtents } from './bbox-calculator';
import { classifySpaces } from './space-classifier';

// Levels whose names contain any of these are not habitable stories
export const NON_STORY_LEVEL_KEYWORDS = ['roof', 'foundation', 'base', 'plate'];

const MODEL_FILE_EXTENSION = /\.rvt$/i;

export interface PlanRecordDiagnostics {
    wallCount: number;
    levelCount: number;
    floorAreaReport: string | null;
    ignoredRegions: number;
    garageBaysFromDoors: boolean;
    planNameSource: 'project' | 'building' | 'title' | 'none';
}

export interface PlanRecordBuild {
    record: PlanRecord;
    diagnostics: PlanRecordDiagnostics;
}

export function countStories(levels: LevelElement[]): number {
    return levels.filter(level => {
        const name = level.name.toLowerCase();
        return !NON_STORY_LEVEL_KEYWORDS.some(k => name.includes(k));
    }).length;
}

/**
 * Project Name, then Building Name, then the model title without its file extension
 */
export function resolvePlanName(model: DesignModel): { name: string; source: PlanRecordDiagnostics['planNameSource'] } {
    const projectName = model.getAttribute(ATTRIBUTE.projectName);
    if (projectName) return { name: projectName, source: 'project' };

    const buildingName = model.getAttribute(ATTRIBUTE.buildingName);
    if (buildingName) return { name: buildingName, source: 'building' };

    const title = model.getTitle().trim().replace(MODEL_FILE_EXTENSION, '').trim();
    if (title) return { name: title, source: 'title' };

    return { name: '', source: 'none' };
}

export function buildPlanRecordWithDiagnostics(model: DesignModel): PlanRecordBuild {
    const planName = resolvePlanName(model);
    const extents = calculatePlanExtents(model.getWalls());
    const levels = model.getLevels();
    const spaces = classifySpaces(model.getSpatialRegions(), model.getDoors());
    const report = findFloorAreaReport(model.getReports());

    const record: PlanRecord = {
        planName: planName.name,
        specLevel: model.getAttribute(ATTRIBUTE.specLevel),
        clientName: model.getAttribute(ATTRIBUTE.clientName),
        clientDivision: model.getAttribute(ATTRIBUTE.clientDivision),
        clientSubdivision: model.getAttribute(ATTRIBUTE.clientSubdivision),
        garageLoading: model.getAttribute(ATTRIBUTE.garageLoading),
        overallWidth: extents.width,
        overallDepth: extents.depth,
        stories: countStories(levels),
        bedrooms: spaces.bedrooms,
        bathrooms: spaces.bathrooms,
        garageBays: spaces.garageBays,
        livingArea: report ? extractLivingArea(report.rows) : 0,
        totalArea: report ? extractTotalArea(report.rows) : 0
    };

    const diagnostics: PlanRecordDiagnostics = {
        wallCount: extents.wallCount,
        levelCount: levels.length,
        floorAreaReport: report ? report.title : null,
        ignoredRegions: spaces.ignoredRegions,
        garageBaysFromDoors: spaces.garageBaysFromDoors,
        planNameSource: planName.source
    };

    if (!report) {
        logger.warn('No floor area report with values found; living and total area set to 0');
    }
    if (extents.wallCount === 0) {
        logger.warn('No walls with a bounding box; overall dimensions set to 0\'-0"');
    }
    logger.debug('Plan record built', { ...diagnostics });

    return { record, diagnostics };
}

export function buildPlanRecord(model: DesignModel): PlanRecord {
    return buildPlanRecordWithDiagnostics(model).record;
}
