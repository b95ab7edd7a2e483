import type {
    AttributeValue,
    DoorElement,
    LevelElement,
    SpatialRegion,
    TabularReport,
    WallElement
} from '../../types';

/**
 * Read-only view of the host design model.
 * Everything returned is plain data; nothing holds on to host objects.
 */
export interface DesignModel {
    getTitle(): string;
    /** Attribute text, trimmed. Numbers are rendered as text; missing → '' */
    getAttribute(name: string): string;
    hasAttribute(name: string): boolean;
    getWalls(): WallElement[];
    getLevels(): LevelElement[];
    getSpatialRegions(): SpatialRegion[];
    getDoors(): DoorElement[];
    getReports(): TabularReport[];
}

export interface WritableDesignModel extends DesignModel {
    /** Adds an empty attribute. No-op when it already exists. */
    defineAttribute(name: string): void;
    /** False when the attribute does not exist */
    setAttribute(name: string, value: AttributeValue): boolean;
    save(): Promise<void>;
}

// Project-level attribute names as they appear in the model
export const ATTRIBUTE = {
    projectName: 'Project Name',
    buildingName: 'Building Name',
    specLevel: 'Spec Level',
    clientName: 'Client Name',
    clientDivision: 'Client Division',
    clientSubdivision: 'Client Subdivision',
    garageLoading: 'Garage Loading',
} as const;

// Custom attributes a fresh model lacks; the rest are built in
export const CUSTOM_ATTRIBUTES: readonly string[] = [
    ATTRIBUTE.specLevel,
    ATTRIBUTE.clientDivision,
    ATTRIBUTE.clientSubdivision,
    ATTRIBUTE.garageLoading,
];
