/**
 * Bounding Box Calculator
 *
 * Overall building extents from the walls' individual bounding boxes.
 * Coordinates are in the model's internal unit (decimal feet).
 */

import type { BoundingBox, WallElement } from '../../types';
import { ZERO_DIMENSION, formatDimension } from './dimension-formatter';

export interface PlanExtents {
    widthFeet: number; // along X
    depthFeet: number; // along Y
    width: string;
    depth: string;
    wallCount: number; // walls that contributed a box
}

function isFiniteBox(box: BoundingBox): boolean {
    return [box.min.x, box.min.y, box.min.z, box.max.x, box.max.y, box.max.z].every(v => Number.isFinite(v));
}

/**
 * Component-wise min/max over all boxes. Null when there are none.
 */
export function unionBoundingBoxes(boxes: BoundingBox[]): BoundingBox | null {
    let result: BoundingBox | null = null;

    for (const box of boxes) {
        if (!isFiniteBox(box)) continue;

        if (!result) {
            result = { min: { ...box.min }, max: { ...box.max } };
            continue;
        }

        result = {
            min: {
                x: Math.min(result.min.x, box.min.x),
                y: Math.min(result.min.y, box.min.y),
                z: Math.min(result.min.z, box.min.z)
            },
            max: {
                x: Math.max(result.max.x, box.max.x),
                y: Math.max(result.max.y, box.max.y),
                z: Math.max(result.max.z, box.max.z)
            }
        };
    }

    return result;
}

/**
 * Width/depth of the wall envelope, formatted. 0'-0" for both when the
 * model has no walls with a bounding box.
 */
export function calculatePlanExtents(walls: WallElement[]): PlanExtents {
    const boxes = walls
        .map(w => w.boundingBox)
        .filter((b): b is BoundingBox => b !== null && isFiniteBox(b));

    const bbox = unionBoundingBoxes(boxes);
    if (!bbox) {
        return { widthFeet: 0, depthFeet: 0, width: ZERO_DIMENSION, depth: ZERO_DIMENSION, wallCount: 0 };
    }

    const widthFeet = bbox.max.x - bbox.min.x;
    const depthFeet = bbox.max.y - bbox.min.y;

    return {
        widthFeet,
        depthFeet,
        width: formatDimension(widthFeet),
        depth: formatDimension(depthFeet),
        wallCount: boxes.length
    };
}
