import { describe, it, expect } from 'vitest';
import JSZip from 'jszip';
import { generateCSV, generateJSON, generateRouteCSV } from './exportUtils';
import { generatePGM, generateRosBundle, generateYAML } from './rosExporter';
import { renderMap } from './mapRenderer';
import { parseCSV } from './csvParser';
import { OccupancyGrid } from '../grid/OccupancyGrid';
import { RouteDriver } from '../planner/routeDriver';
import { gridFrom } from '../test/gridFixtures';

const tracedGrid = () => {
    const grid = gridFrom([
        '...',
        '.#.',
    ]);
    grid.assignTargets({ row: 0, col: 0 }, { row: 1, col: 2 });
    grid.markVisited({ row: 0, col: 1 });
    return grid;
};

describe('CSV export', () => {
    it('writes targets as comments and one code per cell', () => {
        expect(generateCSV(tracedGrid())).toBe('# start,0,0\n# goal,1,2\n3,2,0\n0,1,4\n');
    });

    it('loads back as the map without the route', () => {
        const source = parseCSV(generateCSV(tracedGrid()));
        expect(Array.from(source.data)).toEqual([0, 0, 0, 0, 1, 0]);
        expect(source.start).toEqual({ row: 0, col: 0 });
        expect(source.goal).toEqual({ row: 1, col: 2 });
    });

    it('keeps both comment lines when the start is the goal', () => {
        const grid = OccupancyGrid.empty(2, 2);
        const target = { row: 1, col: 1 };
        grid.assignTargets(target, target);

        const csv = generateCSV(grid, { start: target, goal: target });
        expect(csv).toBe('# start,1,1\n# goal,1,1\n0,0\n0,4\n');

        const reloaded = OccupancyGrid.fromSource(parseCSV(csv));
        expect(reloaded.find('goal')).toEqual(target);
    });

    it('lists the route with the command sent at each step', () => {
        const csv = generateRouteCSV([
            { position: { row: 0, col: 1 }, move: 'right' },
            { position: { row: 0, col: 1 }, move: 'reached-goal' },
        ]);
        expect(csv).toBe('step,row,col,command\n0,0,1,RIGHT\n1,0,1,GOAL\n');
    });

    it('serializes a plan result as JSON', async () => {
        const result = await new RouteDriver().plan(OccupancyGrid.empty(2, 2), { row: 0, col: 0 }, { row: 1, col: 0 });
        const json = JSON.parse(generateJSON(result));

        expect(json.status).toBe('completed');
        expect(json.stepCount).toBe(1);
        expect(json.route).toEqual([
            { row: 1, col: 0, command: 'DOWN' },
            { row: 1, col: 0, command: 'GOAL' },
        ]);
        expect(json.error).toBeUndefined();
        expect(json.startedAt).toBe(result.startedAt.toISOString());
    });
});

describe('Map rendering', () => {
    it('draws two characters per cell', () => {
        expect(renderMap(tracedGrid())).toBe('S .   \n  ||E ');
    });
});

describe('ROS Exporter', () => {
    it('generates correct PGM header', () => {
        const pgm = generatePGM(tracedGrid());

        const lines = pgm.split('\n');
        expect(lines[0]).toBe('P2');
        expect(lines[1]).toBe('3 2');
        expect(lines[2]).toBe('255');
    });

    it('maps obstacles to black and everything else to white', () => {
        expect(generatePGM(tracedGrid())).toBe('P2\n3 2\n255\n254 254 254 254 0 254\n');
    });

    it('wraps pixel lines at 70 characters', () => {
        const lines = generatePGM(OccupancyGrid.empty(1, 20)).split('\n');
        expect(lines[3].split(' ')).toHaveLength(17);
        expect(lines[4]).toBe('254 254 254');
    });

    it('bundles the image and its YAML', async () => {
        const zip = await JSZip.loadAsync(await generateRosBundle(tracedGrid(), 0.1));

        expect(Object.keys(zip.files).sort()).toEqual(['map.pgm', 'map.yaml']);
        expect(await zip.file('map.yaml')?.async('string')).toBe(generateYAML(0.1));
        expect(await zip.file('map.pgm')?.async('string')).toBe(generatePGM(tracedGrid()));
    });
});
