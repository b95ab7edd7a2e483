import {
    SPACE_RULES,
    classifySpaceName,
    classifySpaces,
    garageBaysFromName,
    matchesRule
} from '../space-classifier';

describe('space-classifier', () => {
    describe('rules', () => {
        const rule = (category: string) => {
            const found = SPACE_RULES.find(r => r.category === category);
            if (!found) throw new Error(`no rule for ${category}`);
            return found;
        };

        it('should match bedrooms on "bedroom" or "bed"', () => {
            expect(matchesRule('primary bedroom', rule('bedroom'))).toBe(true);
            expect(matchesRule('bed 3', rule('bedroom'))).toBe(true);
            expect(matchesRule('study', rule('bedroom'))).toBe(false);
        });

        it('should split baths into half and full', () => {
            expect(matchesRule('powder bath', rule('half_bath'))).toBe(true);
            expect(matchesRule('half bath', rule('half_bath'))).toBe(true);
            expect(matchesRule('powder bath', rule('full_bath'))).toBe(false);
            expect(matchesRule('bath 2', rule('full_bath'))).toBe(true);
            expect(matchesRule('powder', rule('half_bath'))).toBe(false);
        });
    });

    describe('garageBaysFromName', () => {
        it('should read bay words and digits', () => {
            expect(garageBaysFromName('three car garage')).toBe(3);
            expect(garageBaysFromName('two car garage')).toBe(2);
            expect(garageBaysFromName('2 car garage')).toBe(2);
            expect(garageBaysFromName('3-car garage')).toBe(3);
            expect(garageBaysFromName('one car garage')).toBe(1);
        });

        it('should prefer the larger count when several words appear', () => {
            expect(garageBaysFromName('garage two + one')).toBe(2);
        });

        it('should ignore bay words embedded in other words', () => {
            expect(garageBaysFromName('stone garage')).toBe(0);
            expect(garageBaysFromName('garage - oneida')).toBe(0);
            expect(garageBaysFromName('garage')).toBe(0);
        });
    });

    describe('classifySpaceName', () => {
        it('should allow one room to match several categories once each', () => {
            expect(classifySpaceName('Bed/Bath Suite')).toEqual({
                name: 'Bed/Bath Suite',
                categories: ['bedroom', 'full_bath'],
                garageBays: 0
            });
        });

        it('should be case-insensitive', () => {
            expect(classifySpaceName('TWO CAR GARAGE').garageBays).toBe(2);
        });
    });

    describe('classifySpaces', () => {
        it('should count the mixed example plan', () => {
            const result = classifySpaces([
                { name: 'Primary Bedroom', area: 150 },
                { name: 'Half Bath', area: 30 },
                { name: 'Bath 2', area: 60 },
                { name: '2 Car Garage', area: 400 }
            ]);

            expect(result.bedrooms).toBe(1);
            expect(result.fullBaths).toBe(1);
            expect(result.halfBaths).toBe(1);
            expect(result.bathrooms).toBe(1.5);
            expect(result.garageBays).toBe(2);
        });

        it('should ignore regions with zero or negative area', () => {
            const result = classifySpaces([
                { name: 'Bedroom 2', area: 0 },
                { name: 'Bedroom 3', area: -12 },
                { name: 'Bedroom 4', area: 120 }
            ]);

            expect(result.bedrooms).toBe(1);
            expect(result.ignoredRegions).toBe(2);
        });

        it('should sum garage bays across regions', () => {
            const result = classifySpaces([
                { name: 'Two Car Garage', area: 420 },
                { name: 'Garage Two', area: 400 }
            ]);

            expect(result.garageBays).toBe(4);
            expect(result.garageBaysFromDoors).toBe(false);
        });

        it('should fall back to garage doors when no room names a bay count', () => {
            const result = classifySpaces(
                [{ name: 'Garage', area: 440 }],
                [{ typeName: 'Garage Door 9x7' }, { typeName: 'GARAGE DOOR 9x7' }, { typeName: 'Entry 36x80' }]
            );

            expect(result.garageBays).toBe(2);
            expect(result.garageBaysFromDoors).toBe(true);
        });

        it('should not use doors when rooms already yield bays', () => {
            const result = classifySpaces(
                [{ name: 'One Car Garage', area: 260 }],
                [{ typeName: 'Garage Door 16x7' }, { typeName: 'Garage Door 9x7' }]
            );

            expect(result.garageBays).toBe(1);
            expect(result.garageBaysFromDoors).toBe(false);
        });

        it('should report zero for an empty plan', () => {
            const result = classifySpaces([]);

            expect(result).toMatchObject({ bedrooms: 0, bathrooms: 0, garageBays: 0, matches: [] });
        });
    });
});
