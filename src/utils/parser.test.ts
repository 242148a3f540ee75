import { describe, it, expect } from 'vitest';
import { CoordinateSchema, GridImportSchema, parseGridJSON } from './validators';
import { parseCSV } from './csvParser';
import { parseMap } from '../grid/mapLoader';
import { MapFormatError } from '../errors';

describe('Validators', () => {
    it('validates a correct grid object', () => {
        const valid = {
            rows: 2,
            cols: 2,
            cells: [[0, 1], [3, 4]],
            start: { row: 1, col: 0 },
        };
        expect(GridImportSchema.parse(valid)).toEqual(valid);
    });

    it('rejects invalid dimensions', () => {
        const invalid = { rows: -10, cols: 2, cells: [] };
        expect(() => GridImportSchema.parse(invalid)).toThrow();
    });

    it('rejects ragged rows', () => {
        expect(() => parseGridJSON({ rows: 2, cols: 2, cells: [[0, 0], [0]] })).toThrow(
            'Invalid map JSON: cells.1: Expected 2 columns, got 1'
        );
    });

    it('parses coordinates typed on the command line', () => {
        expect(CoordinateSchema.parse('2,2')).toEqual({ row: 2, col: 2 });
        expect(CoordinateSchema.parse(' 21 , 19 ')).toEqual({ row: 21, col: 19 });
        expect(CoordinateSchema.safeParse('2;2').success).toBe(false);
        expect(CoordinateSchema.safeParse('-1,2').success).toBe(false);
    });

    it('converts JSON cells and picks up the markers', () => {
        const source = parseGridJSON({ rows: 2, cols: 3, cells: [[3, 0, 7], [2, 1, 4]] });
        expect(Array.from(source.data)).toEqual([0, 0, 1, 0, 1, 0]);
        expect(source.start).toEqual({ row: 0, col: 0 });
        expect(source.goal).toEqual({ row: 1, col: 2 });
    });
});

describe('CSV Parser', () => {
    it('reads comment targets and cell codes', () => {
        const source = parseCSV('# start,0,0\n# goal,1,2\n0,1,0\n2,0,9\n');
        expect(source.rows).toBe(2);
        expect(source.cols).toBe(3);
        expect(Array.from(source.data)).toEqual([0, 1, 0, 0, 0, 1]);
        expect(source.start).toEqual({ row: 0, col: 0 });
        expect(source.goal).toEqual({ row: 1, col: 2 });
    });

    it('takes targets from marker cells when there are no comment lines', () => {
        const source = parseCSV('3,0\r\n0,4\r\n');
        expect(source.start).toEqual({ row: 0, col: 0 });
        expect(source.goal).toEqual({ row: 1, col: 1 });
        expect(Array.from(source.data)).toEqual([0, 0, 0, 0]);
    });

    it('prefers comment lines over marker cells', () => {
        const source = parseCSV('# start,1,0\n3,0\n0,0\n');
        expect(source.start).toEqual({ row: 1, col: 0 });
    });

    it('rejects malformed input', () => {
        expect(() => parseCSV('')).toThrow('CSV file contains no data rows');
        expect(() => parseCSV('0,0\n0\n')).toThrow('Row 2 has 1 columns, expected 2');
        expect(() => parseCSV('0,x\n')).toThrow('Invalid value at row 1, column 2: "x"');
        expect(() => parseCSV('3,3\n')).toThrow('Second start marker at row 1, column 2');
    });

    it('rejects cell values that are not whole integers', () => {
        expect(() => parseCSV('0,1.5\n')).toThrow('Invalid value at row 1, column 2: "1.5"');
        expect(() => parseCSV('2abc,0\n')).toThrow('Invalid value at row 1, column 1: "2abc"');
        expect(() => parseCSV('0,,0\n')).toThrow(MapFormatError);
    });

    it('rejects target lines with malformed coordinates', () => {
        expect(() => parseCSV('# start,1.5,0\n0,0\n')).toThrow('Invalid start line: "# start,1.5,0"');
        expect(() => parseCSV('# goal,0,2abc\n0,0\n')).toThrow('Invalid goal line: "# goal,0,2abc"');
        expect(() => parseCSV('# goal,1\n0,0\n')).toThrow(MapFormatError);
    });

    it('ignores other comment lines', () => {
        expect(parseCSV('# exported map\n0,0\n').start).toBeUndefined();
    });
});

describe('parseMap', () => {
    it('chooses the format from the file name', () => {
        const json = parseMap('{"rows":1,"cols":2,"cells":[[0,1]]}', 'small.JSON');
        expect(Array.from(json.data)).toEqual([0, 1]);

        const csv = parseMap('1,0\n', 'small.csv');
        expect(Array.from(csv.data)).toEqual([1, 0]);
    });

    it('reports broken JSON as a map format error', () => {
        expect(() => parseMap('{rows', 'broken.json')).toThrow(MapFormatError);
        expect(() => parseMap('{rows', 'broken.json')).toThrow('broken.json is not valid JSON');
    });
});
