import { SnapshotDesignModel } from '../../model/snapshot-model';
import type { ModelSnapshotInput } from '../../validation';
import { buildPlanRecord, buildPlanRecordWithDiagnostics, countStories, resolvePlanName } from '../plan-record-builder';

const box = (minX: number, minY: number, maxX: number, maxY: number) => ({
    min: { x: minX, y: minY, z: 0 },
    max: { x: maxX, y: maxY, z: 10 }
});

const aspen: ModelSnapshotInput = {
    title: 'Aspen.rvt',
    attributes: {
        'Project Name': 'Aspen',
        'Spec Level': 'Premium',
        'Client Name': 'Client A',
        'Client Division': 'Division 1',
        'Client Subdivision': 'Willow Creek',
        'Garage Loading': 'Side'
    },
    walls: [
        { id: 'w1', boundingBox: box(0, 0, 40.5, 1) },
        { id: 'w2', boundingBox: box(0, -2, 1, 30) },
        { id: 'w3' }
    ],
    levels: [{ name: 'Foundation' }, { name: 'Level 1' }, { name: 'Level 2' }, { name: 'Roof' }, { name: 'Top Plate' }],
    rooms: [
        { name: 'Primary Bedroom', area: 150 },
        { name: 'Bedroom 2', area: 120 },
        { name: 'Bed 3', area: 110 },
        { name: 'Powder Bath', area: 30 },
        { name: 'Bath 2', area: 60 },
        { name: 'Primary Bath', area: 80 },
        { name: 'Two Car Garage', area: 400 },
        { name: 'Bedroom 4', area: 0 }
    ],
    reports: [
        { title: 'Door Schedule', rows: [['D1', '3070']] },
        { title: 'Floor Areas - Draft', rows: [['Living', '0 SF']] },
        {
            title: 'Floor Areas',
            rows: [
                ['Living', ''],
                ['First Floor', '900 SF'],
                ['Second Floor', '500 SF'],
                ['', '1400 SF'],
                ['Garage', '420 SF'],
                ['Total Covered', '2206 SF']
            ]
        }
    ]
};

describe('plan-record-builder', () => {
    let consoleLogSpy: jest.SpyInstance;
    let consoleWarnSpy: jest.SpyInstance;

    beforeEach(() => {
        consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
        consoleWarnSpy = jest.spyOn(console, 'warn').mockImplementation();
    });

    afterEach(() => {
        consoleLogSpy.mockRestore();
        consoleWarnSpy.mockRestore();
    });

    describe('countStories', () => {
        it('should skip roof, foundation, base and plate levels', () => {
            expect(
                countStories([
                    { name: 'Base Level' },
                    { name: 'FOUNDATION' },
                    { name: 'Level 1' },
                    { name: 'Level 2' },
                    { name: 'Plate Height' },
                    { name: 'Roof Bearing' }
                ])
            ).toBe(2);
        });
    });

    describe('resolvePlanName', () => {
        it('should prefer the project name', () => {
            const model = SnapshotDesignModel.fromSnapshot({
                title: 'file.rvt',
                attributes: { 'Project Name': 'Aspen', 'Building Name': 'Birch' }
            });
            expect(resolvePlanName(model)).toEqual({ name: 'Aspen', source: 'project' });
        });

        it('should fall back to the building name', () => {
            const model = SnapshotDesignModel.fromSnapshot({
                title: 'file.rvt',
                attributes: { 'Project Name': '  ', 'Building Name': 'Birch' }
            });
            expect(resolvePlanName(model)).toEqual({ name: 'Birch', source: 'building' });
        });

        it('should fall back to the title without its extension', () => {
            const model = SnapshotDesignModel.fromSnapshot({ title: 'Cedar.RVT' });
            expect(resolvePlanName(model)).toEqual({ name: 'Cedar', source: 'title' });
        });

        it('should yield an empty name when nothing is set', () => {
            const model = SnapshotDesignModel.fromSnapshot({});
            expect(resolvePlanName(model)).toEqual({ name: '', source: 'none' });
        });
    });

    describe('buildPlanRecord', () => {
        it('should assemble every field from the model', () => {
            const record = buildPlanRecord(SnapshotDesignModel.fromSnapshot(aspen));

            expect(record).toEqual({
                planName: 'Aspen',
                specLevel: 'Premium',
                clientName: 'Client A',
                clientDivision: 'Division 1',
                clientSubdivision: 'Willow Creek',
                garageLoading: 'Side',
                overallWidth: `40'-6"`,
                overallDepth: `32'-0"`,
                stories: 2,
                bedrooms: 3,
                bathrooms: 2.5,
                garageBays: 2,
                livingArea: 1400,
                totalArea: 2206
            });
        });

        it('should report diagnostics', () => {
            const { diagnostics } = buildPlanRecordWithDiagnostics(SnapshotDesignModel.fromSnapshot(aspen));

            expect(diagnostics).toEqual({
                wallCount: 2,
                levelCount: 5,
                floorAreaReport: 'Floor Areas',
                ignoredRegions: 1,
                garageBaysFromDoors: false,
                planNameSource: 'project'
            });
        });

        it('should default every derived value on an empty model', () => {
            const record = buildPlanRecord(SnapshotDesignModel.fromSnapshot({}));

            expect(record).toEqual({
                planName: '',
                specLevel: '',
                clientName: '',
                clientDivision: '',
                clientSubdivision: '',
                garageLoading: '',
                overallWidth: `0'-0"`,
                overallDepth: `0'-0"`,
                stories: 0,
                bedrooms: 0,
                bathrooms: 0,
                garageBays: 0,
                livingArea: 0,
                totalArea: 0
            });
            expect(consoleWarnSpy).toHaveBeenCalledTimes(2);
        });

        it('should count garage doors when garage rooms name no bays', () => {
            const { record, diagnostics } = buildPlanRecordWithDiagnostics(
                SnapshotDesignModel.fromSnapshot({
                    rooms: [{ name: 'Garage', area: 420 }],
                    doors: [{ typeName: 'Garage Door 16x7' }, { typeName: 'Garage Door 9x7' }, { typeName: 'Entry 3070' }]
                })
            );

            expect(record.garageBays).toBe(2);
            expect(diagnostics.garageBaysFromDoors).toBe(true);
        });
    });
});
