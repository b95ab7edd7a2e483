import type { PlanRecord } from '../../types';
import {
    ModelSnapshotSchema,
    PlanRecordSchema,
    ProjectOptionsSchema,
    formatZodIssues,
    getMissingRequiredFields,
    isPlanRecordComplete
} from '../validation';

const record: PlanRecord = {
    planName: 'Aspen',
    specLevel: 'Standard',
    clientName: 'Client A',
    clientDivision: 'Division 1',
    clientSubdivision: 'Willow Creek',
    garageLoading: '',
    overallWidth: `40'-6"`,
    overallDepth: `32'-0"`,
    stories: 1,
    bedrooms: 3,
    bathrooms: 2,
    garageBays: 2,
    livingArea: 1400,
    totalArea: 1800
};

describe('Validation', () => {
    describe('ModelSnapshotSchema', () => {
        it('should fill defaults for an empty snapshot', () => {
            expect(ModelSnapshotSchema.parse({})).toEqual({
                title: '',
                attributes: {},
                walls: [],
                levels: [],
                rooms: [],
                doors: [],
                reports: []
            });
        });

        it('should keep unknown top-level keys', () => {
            expect(ModelSnapshotSchema.parse({ exportedBy: 'exporter 1.2' })).toMatchObject({ exportedBy: 'exporter 1.2' });
        });

        it('should default a missing z coordinate to 0', () => {
            const parsed = ModelSnapshotSchema.parse({
                walls: [{ id: 'w1', boundingBox: { min: { x: 0, y: 0 }, max: { x: 10, y: 5 } } }]
            });

            expect(parsed.walls[0].boundingBox).toEqual({ min: { x: 0, y: 0, z: 0 }, max: { x: 10, y: 5, z: 0 } });
        });

        it('should reject a room without an area', () => {
            const result = ModelSnapshotSchema.safeParse({ rooms: [{ name: 'Bedroom' }] });

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(formatZodIssues(result.error)).toEqual(['rooms.0.area: Required']);
            }
        });
    });

    describe('ProjectOptionsSchema', () => {
        it('should reject blank options', () => {
            const result = ProjectOptionsSchema.safeParse({
                specLevels: ['  '],
                clientNames: ['Client A'],
                clientDivisions: ['Division 1'],
                garageLoadings: ['Front']
            });

            expect(result.success).toBe(false);
        });
    });

    describe('PlanRecordSchema', () => {
        it('should accept half-bath counts', () => {
            expect(PlanRecordSchema.safeParse({ ...record, bathrooms: 2.5 }).success).toBe(true);
        });

        it('should reject quarter baths and negative counts', () => {
            expect(PlanRecordSchema.safeParse({ ...record, bathrooms: 1.25 }).success).toBe(false);
            expect(PlanRecordSchema.safeParse({ ...record, bedrooms: -1 }).success).toBe(false);
        });
    });

    describe('getMissingRequiredFields', () => {
        it('should list blank required fields in order', () => {
            expect(getMissingRequiredFields({ ...record, planName: '', clientDivision: '   ' })).toEqual([
                'Plan Name',
                'Client Division'
            ]);
        });

        it('should not require garage loading', () => {
            expect(isPlanRecordComplete(record)).toBe(true);
        });

        it('should reject a record with full numeric fields but a blank key field', () => {
            expect(isPlanRecordComplete({ ...record, clientSubdivision: '' })).toBe(false);
        });
    });
});
