/**
 * Space Classifier
 *
 * Counts bedrooms, bathrooms and garage bays from room names. Matching is a
 * substring heuristic over the lower-cased name, driven by the rule tables
 * below so each rule can be tested and extended on its own.
 */

import type { DoorElement, SpatialRegion } from '../../types';

// ============================================================================
// TYPES
// ============================================================================

export type SpaceCategory = 'bedroom' | 'full_bath' | 'half_bath' | 'garage';

export interface SpaceRule {
    category: SpaceCategory;
    /** name must contain every one of these */
    requireAll: string[];
    /** and, when non-empty, at least one of these */
    requireAny: string[];
    /** and none of these */
    exclude: string[];
}

export interface GarageBayRule {
    pattern: RegExp;
    bays: number;
}

export interface RegionMatch {
    name: string;
    categories: SpaceCategory[];
    garageBays: number;
}

export interface SpaceCounts {
    bedrooms: number;
    fullBaths: number;
    halfBaths: number;
    bathrooms: number; // fullBaths + 0.5 * halfBaths
    garageBays: number;
    garageBaysFromDoors: boolean;
    ignoredRegions: number; // area <= 0
    matches: RegionMatch[];
}

// ============================================================================
// RULES
// ============================================================================

export const SPACE_RULES: SpaceRule[] = [
    { category: 'bedroom', requireAll: [], requireAny: ['bedroom', 'bed'], exclude: [] },
    { category: 'half_bath', requireAll: ['bath'], requireAny: ['powder', 'half'], exclude: [] },
    { category: 'full_bath', requireAll: ['bath'], requireAny: [], exclude: ['powder', 'half'] },
    { category: 'garage', requireAll: ['garage'], requireAny: [], exclude: [] },
];

// First match wins. Whole words only, so "stone" or "money" never count as a bay.
export const GARAGE_BAY_RULES: GarageBayRule[] = [
    { pattern: /\b(three|3)\b/, bays: 3 },
    { pattern: /\b(two|2)\b/, bays: 2 },
    { pattern: /\b(one|1)\b/, bays: 1 },
];

const GARAGE_DOOR_KEYWORD = 'garage';

// ============================================================================
// MATCHING
// ============================================================================

export function matchesRule(normalizedName: string, rule: SpaceRule): boolean {
    if (!rule.requireAll.every(k => normalizedName.includes(k))) return false;
    if (rule.requireAny.length > 0 && !rule.requireAny.some(k => normalizedName.includes(k))) return false;
    return !rule.exclude.some(k => normalizedName.includes(k));
}

/**
 * Bays named by a garage room: "Three Car Garage" → 3, "2-Car Garage" → 2.
 * A garage name without a bay word contributes 0.
 */
export function garageBaysFromName(normalizedName: string): number {
    const rule = GARAGE_BAY_RULES.find(r => r.pattern.test(normalizedName));
    return rule ? rule.bays : 0;
}

/**
 * Categories a single room name falls into. A room may match several
 * categories ("Bed/Bath Suite"), but each category at most once.
 */
export function classifySpaceName(name: string): RegionMatch {
    const normalized = name.toLowerCase();
    const categories = SPACE_RULES.filter(rule => matchesRule(normalized, rule)).map(rule => rule.category);

    return {
        name,
        categories,
        garageBays: categories.includes('garage') ? garageBaysFromName(normalized) : 0
    };
}

/**
 * Count bedrooms, bathrooms and garage bays over all placed rooms.
 * Garage bays are summed across rooms. When no room yields a bay, each door
 * whose type name mentions a garage counts as one bay.
 */
export function classifySpaces(regions: SpatialRegion[], doors: DoorElement[] = []): SpaceCounts {
    const counts: SpaceCounts = {
        bedrooms: 0,
        fullBaths: 0,
        halfBaths: 0,
        bathrooms: 0,
        garageBays: 0,
        garageBaysFromDoors: false,
        ignoredRegions: 0,
        matches: []
    };

    for (const region of regions) {
        if (!(region.area > 0)) {
            counts.ignoredRegions++;
            continue;
        }

        const match = classifySpaceName(region.name);
        if (match.categories.length === 0) continue;

        counts.matches.push(match);
        if (match.categories.includes('bedroom')) counts.bedrooms++;
        if (match.categories.includes('full_bath')) counts.fullBaths++;
        if (match.categories.includes('half_bath')) counts.halfBaths++;
        counts.garageBays += match.garageBays;
    }

    if (counts.garageBays === 0) {
        const garageDoors = doors.filter(d => d.typeName.toLowerCase().includes(GARAGE_DOOR_KEYWORD)).length;
        if (garageDoors > 0) {
            counts.garageBays = garageDoors;
            counts.garageBaysFromDoors = true;
        }
    }

    counts.bathrooms = counts.fullBaths + counts.halfBaths * 0.5;

    return counts;
}
