import { CELL_FREE, CELL_GOAL, CELL_OCCUPIED, CELL_START, CELL_VISITED, type GridSource, type Position } from '../types';
import { MapFormatError } from '../errors';

// Whole-field integers only: "1.5", "2abc" and "" are rejected
const toInteger = (text: string): number | undefined => {
    const trimmed = text.trim();
    if (!/^[+-]?\d+$/.test(trimmed)) return undefined;
    return Number(trimmed);
};

/**
 * Parses a CSV file containing occupancy grid data
 * Format:
 *   # start,row,col (optional)
 *   # goal,row,col (optional)
 *   val,val,val,...
 *   val,val,val,...
 *   ...
 * Values: 0 free, 3 start, 4 goal, 2 a previous route trace (loaded as free),
 * any other integer is an obstacle.
 */
export function parseCSV(csvText: string): GridSource {
    const lines = csvText.trim().split(/\r?\n/);
    const dataRows: string[] = [];
    let start: Position | undefined;
    let goal: Position | undefined;

    // Parse comment lines and collect data rows
    for (const line of lines) {
        const trimmed = line.trim();
        if (!trimmed) continue;

        if (trimmed.startsWith('#')) {
            const parts = trimmed.substring(1).trim().split(',');
            const type = parts[0].trim();
            if (type === 'start' || type === 'goal') {
                const row = parts.length === 3 ? toInteger(parts[1]) : undefined;
                const col = parts.length === 3 ? toInteger(parts[2]) : undefined;
                if (row === undefined || col === undefined || row < 0 || col < 0) {
                    throw new MapFormatError(`Invalid ${type} line: "${trimmed}"`);
                }
                if (type === 'start') {
                    start = { row, col };
                } else {
                    goal = { row, col };
                }
            }
        } else {
            dataRows.push(trimmed);
        }
    }

    if (dataRows.length === 0) {
        throw new MapFormatError('CSV file contains no data rows');
    }

    // Determine dimensions from first row
    const cols = dataRows[0].split(',').length;
    const rows = dataRows.length;

    const data = new Uint8Array(cols * rows);
    let startMarker: Position | undefined;
    let goalMarker: Position | undefined;

    for (let row = 0; row < rows; row++) {
        const values = dataRows[row].split(',');
        if (values.length !== cols) {
            throw new MapFormatError(`Row ${row + 1} has ${values.length} columns, expected ${cols}`);
        }

        for (let col = 0; col < cols; col++) {
            const val = toInteger(values[col]);
            if (val === undefined) {
                throw new MapFormatError(`Invalid value at row ${row + 1}, column ${col + 1}: "${values[col]}"`);
            }

            let code: number = CELL_OCCUPIED;
            if (val === CELL_FREE || val === CELL_VISITED) {
                code = CELL_FREE;
            } else if (val === CELL_START) {
                if (startMarker) throw new MapFormatError(`Second start marker at row ${row + 1}, column ${col + 1}`);
                startMarker = { row, col };
                code = CELL_FREE;
            } else if (val === CELL_GOAL) {
                if (goalMarker) throw new MapFormatError(`Second goal marker at row ${row + 1}, column ${col + 1}`);
                goalMarker = { row, col };
                code = CELL_FREE;
            }
            data[row * cols + col] = code;
        }
    }

    return {
        rows,
        cols,
        data,
        // Comment lines win over markers in the cells
        start: start ?? startMarker,
        goal: goal ?? goalMarker,
    };
}
