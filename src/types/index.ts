// Plan record: one building design variant as stored in the plans table
export interface PlanRecord {
  planName: string;
  specLevel: string;
  clientName: string;
  clientDivision: string;
  clientSubdivision: string;
  garageLoading: string; // optional in the model, '' when unset

  overallWidth: string; // formatted, e.g. 65'-8 1/2"
  overallDepth: string;

  stories: number;
  bedrooms: number;
  bathrooms: number; // half-bath granularity (2.5)
  garageBays: number;

  livingArea: number; // SF
  totalArea: number; // SF
}

// Identifies a plan in the remote store. No two rows may share it.
export interface PlanNaturalKey {
  planName: string;
  specLevel: string;
  clientSubdivision: string;
}

export type RequiredPlanField = 'planName' | 'specLevel' | 'clientName' | 'clientDivision' | 'clientSubdivision';

// === MODEL COLLABORATOR DATA ===

export interface Point3D {
  x: number;
  y: number;
  z: number;
}

export interface BoundingBox {
  min: Point3D;
  max: Point3D;
}

export interface WallElement {
  id: string;
  boundingBox: BoundingBox | null; // null when the host can't compute one
}

export interface LevelElement {
  name: string;
  elevation?: number;
}

// Room-equivalent. area <= 0 marks an unplaced/invalid region.
export interface SpatialRegion {
  name: string;
  area: number; // SF
}

export interface DoorElement {
  typeName: string;
}

// A printed schedule: rows of text cells. Column 0 is the label, the last column the value.
export type ReportRow = string[];

export interface TabularReport {
  title: string;
  rows: ReportRow[];
}

export type AttributeValue = string | number;

// === COMMAND OUTCOMES ===

export type CommandOutcome = 'succeeded' | 'cancelled' | 'failed';

export type NotificationLevel = 'success' | 'info' | 'warning' | 'error';

export interface Notification {
  level: NotificationLevel;
  title: string;
  message: string;
}

export interface CommandResult {
  outcome: CommandOutcome;
  notification: Notification;
}
