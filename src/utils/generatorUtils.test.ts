import { describe, it, expect } from 'vitest';
import { DEFAULT_GENERATOR_OPTIONS, generateBugtrap, generateMap, seededRandom } from './generatorUtils';
import { gridFrom } from '../test/gridFixtures';
import { CELL_FREE, CELL_OCCUPIED } from '../types';

describe('Map generator', () => {
    it('builds a bug trap opening towards higher columns', () => {
        const data = generateBugtrap(new Uint8Array(81), 9, 9, { width: 5, length: 4, thickness: 1, aperture: 0 });
        const expected = gridFrom([
            '.........',
            '.........',
            '..####...',
            '..#......',
            '..#......',
            '..#......',
            '..####...',
            '.........',
            '.........',
        ]).toData();
        expect(Array.from(data)).toEqual(Array.from(expected));
    });

    it('leaves the aperture open in the back wall', () => {
        const data = generateBugtrap(new Uint8Array(81), 9, 9, { width: 5, length: 4, thickness: 1, aperture: 1 });
        expect(data[3 * 9 + 2]).toBe(CELL_OCCUPIED);
        expect(data[4 * 9 + 2]).toBe(CELL_FREE);
        expect(data[5 * 9 + 2]).toBe(CELL_OCCUPIED);
    });

    it('walls in the border', () => {
        const data = generateMap(6, 5, { ...DEFAULT_GENERATOR_OPTIONS, count: 0 });
        for (let col = 0; col < 5; col++) {
            expect(data[col]).toBe(CELL_OCCUPIED);
            expect(data[5 * 5 + col]).toBe(CELL_OCCUPIED);
        }
        expect(data[2 * 5 + 2]).toBe(CELL_FREE);
    });

    it('carves a maze reaching every odd cell', () => {
        const data = generateMap(7, 7, { ...DEFAULT_GENERATOR_OPTIONS, mode: 'maze' }, seededRandom(3));
        for (const row of [1, 3, 5]) {
            for (const col of [1, 3, 5]) {
                expect(data[row * 7 + col]).toBe(CELL_FREE);
            }
        }
        expect(data[0]).toBe(CELL_OCCUPIED);
        expect(data[6 * 7 + 6]).toBe(CELL_OCCUPIED);
        // A spanning tree over 9 cells opens 8 walls
        expect(data.filter((code) => code === CELL_FREE)).toHaveLength(17);
    });

    it('reproduces a map from its seed', () => {
        const first = generateMap(24, 22, DEFAULT_GENERATOR_OPTIONS, seededRandom(42));
        const second = generateMap(24, 22, DEFAULT_GENERATOR_OPTIONS, seededRandom(42));
        expect(Array.from(second)).toEqual(Array.from(first));
    });

    it('produces values in [0, 1)', () => {
        const random = seededRandom(7);
        for (let i = 0; i < 100; i++) {
            const value = random();
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
        }
    });
});
