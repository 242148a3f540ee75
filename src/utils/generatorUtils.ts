import { CELL_OCCUPIED, CELL_FREE, type GridData, type Position } from '../types';

export type ShapeType = 'rect' | 'square' | 'triangle' | 'circle' | 'cross' | 'room';

export interface BugtrapOptions {
    width: number; // extent along the rows
    length: number; // extent along the columns
    thickness: number;
    aperture: number; // gap in the back wall, 0 for none
}

export interface GeneratorOptions {
    mode: 'shapes' | 'maze' | 'bugtrap';
    shapes: ShapeType[];
    count: number;
    minSize: number;
    maxSize: number;
    spacing: number;
    allowOverlap: boolean;
    border: boolean;
    bugtrap: BugtrapOptions;
}

/** Returns a float in [0, 1). Defaults to Math.random. */
export type RandomSource = () => number;

export const DEFAULT_GENERATOR_OPTIONS: GeneratorOptions = {
    mode: 'shapes',
    shapes: ['rect', 'square', 'circle', 'triangle', 'cross', 'room'],
    count: 10,
    minSize: 2,
    maxSize: 5,
    spacing: 1,
    allowOverlap: false,
    border: true,
    bugtrap: { width: 9, length: 7, thickness: 1, aperture: 0 },
};

/**
 * Seedable generator (mulberry32) so generated maps can be reproduced.
 */
export function seededRandom(seed: number): RandomSource {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export function generateMap(
    rows: number,
    cols: number,
    options: GeneratorOptions,
    random: RandomSource = Math.random
): GridData {
    let data: GridData;
    if (options.mode === 'maze') {
        data = generateMaze(rows, cols, random);
    } else if (options.mode === 'bugtrap') {
        data = generateBugtrap(new Uint8Array(rows * cols).fill(CELL_FREE), rows, cols, options.bugtrap);
    } else {
        data = generateShapes(rows, cols, options, random);
    }

    if (options.border && options.mode !== 'maze') {
        for (let row = 0; row < rows; row++) {
            for (let col = 0; col < cols; col++) {
                if (row === 0 || col === 0 || row === rows - 1 || col === cols - 1) {
                    data[row * cols + col] = CELL_OCCUPIED;
                }
            }
        }
    }
    return data;
}

function generateShapes(rows: number, cols: number, options: GeneratorOptions, random: RandomSource): GridData {
    const data = new Uint8Array(rows * cols).fill(CELL_FREE);
    const maxAttempts = options.count * 100;
    let attempts = 0;
    let placedCount = 0;

    const inside = (p: Position) => p.row >= 0 && p.row < rows && p.col >= 0 && p.col < cols;

    const isValid = (points: Position[]): boolean => {
        if (options.allowOverlap) return true;
        for (const p of points) {
            if (!inside(p)) continue;
            const range = options.spacing;
            for (let dRow = -range; dRow <= range; dRow++) {
                for (let dCol = -range; dCol <= range; dCol++) {
                    const n = { row: p.row + dRow, col: p.col + dCol };
                    if (inside(n) && data[n.row * cols + n.col] === CELL_OCCUPIED) return false;
                }
            }
        }
        return true;
    };

    while (placedCount < options.count && attempts < maxAttempts && options.shapes.length > 0) {
        attempts++;
        const shapeType = options.shapes[Math.floor(random() * options.shapes.length)];
        const points = generateShape(shapeType, rows, cols, options.minSize, options.maxSize, random);

        if (isValid(points)) {
            for (const p of points) {
                if (inside(p)) data[p.row * cols + p.col] = CELL_OCCUPIED;
            }
            placedCount++;
        }
    }
    return data;
}

// Recursive backtracker over odd cells, walls on even ones
function generateMaze(rows: number, cols: number, random: RandomSource): GridData {
    const maze = new Uint8Array(rows * cols).fill(CELL_OCCUPIED);
    const stack: Position[] = [];
    const visited = new Set<string>();

    if (rows < 3 || cols < 3) return maze; // Too small

    stack.push({ row: 1, col: 1 });
    visited.add('1,1');
    maze[cols + 1] = CELL_FREE;

    const dirs = [
        { dRow: -2, dCol: 0 },
        { dRow: 0, dCol: 2 },
        { dRow: 2, dCol: 0 },
        { dRow: 0, dCol: -2 },
    ];

    while (stack.length > 0) {
        const current = stack[stack.length - 1];

        const neighbors = [];
        for (const d of dirs) {
            const row = current.row + d.dRow;
            const col = current.col + d.dCol;

            // Leave a 1-cell border
            if (row > 0 && row < rows - 1 && col > 0 && col < cols - 1 && !visited.has(`${row},${col}`)) {
                neighbors.push({ row, col, d });
            }
        }

        if (neighbors.length > 0) {
            const chosen = neighbors[Math.floor(random() * neighbors.length)];

            // Open the wall between current and chosen, then the neighbor itself
            maze[(current.row + chosen.d.dRow / 2) * cols + current.col + chosen.d.dCol / 2] = CELL_FREE;
            maze[chosen.row * cols + chosen.col] = CELL_FREE;

            visited.add(`${chosen.row},${chosen.col}`);
            stack.push({ row: chosen.row, col: chosen.col });
        } else {
            stack.pop();
        }
    }

    return maze;
}

/**
 * U-shaped trap centred in the grid, opening to the right (towards higher columns).
 * A goal placed to the left of the back wall drives a greedy walker into the pocket.
 */
export function generateBugtrap(data: GridData, rows: number, cols: number, opts: BugtrapOptions): GridData {
    const cRow = Math.floor(rows / 2);
    const cCol = Math.floor(cols / 2);

    const w = opts.width;
    const l = opts.length;
    const t = opts.thickness;

    const row0 = cRow - Math.floor(w / 2);
    const col0 = cCol - Math.floor(l / 2);

    const fill = (row: number, col: number) => {
        if (row >= 0 && row < rows && col >= 0 && col < cols) data[row * cols + col] = CELL_OCCUPIED;
    };

    // Top and bottom walls
    const rowBottom = row0 + w - t;
    for (let dRow = 0; dRow < t; dRow++) {
        for (let dCol = 0; dCol < l; dCol++) {
            fill(row0 + dRow, col0 + dCol);
            fill(rowBottom + dRow, col0 + dCol);
        }
    }

    // Back wall, with the aperture centred on it
    const halfAp = Math.floor(opts.aperture / 2);
    for (let dCol = 0; dCol < t; dCol++) {
        for (let dRow = 0; dRow < w; dRow++) {
            const row = row0 + dRow;
            if (opts.aperture > 0 && row >= cRow - halfAp && row < cRow + halfAp + (opts.aperture % 2)) {
                continue; // Gap
            }
            fill(row, col0 + dCol);
        }
    }

    return data;
}

function generateShape(type: ShapeType, rows: number, cols: number, min: number, max: number, random: RandomSource): Position[] {
    const points: Position[] = [];
    const cRow = Math.floor(random() * rows);
    const cCol = Math.floor(random() * cols);
    const size = Math.floor(random() * (max - min + 1)) + min;
    const size2 = Math.floor(random() * (max - min + 1)) + min; // For rect/room

    if (type === 'rect' || type === 'square') {
        const sw = size;
        const sh = type === 'square' ? size : size2;
        const row0 = cRow - Math.floor(sh / 2);
        const col0 = cCol - Math.floor(sw / 2);
        for (let r = 0; r < sh; r++) {
            for (let c = 0; c < sw; c++) {
                points.push({ row: row0 + r, col: col0 + c });
            }
        }
    } else if (type === 'circle') {
        const radius = Math.floor(size / 2);
        for (let r = -radius; r <= radius; r++) {
            for (let c = -radius; c <= radius; c++) {
                if (r * r + c * c <= radius * radius) {
                    points.push({ row: cRow + r, col: cCol + c });
                }
            }
        }
    } else if (type === 'triangle') {
        const row0 = cRow - Math.floor(size / 2);
        for (let r = 0; r < size; r++) {
            const half = Math.floor(r / 2);
            for (let c = -half; c <= half; c++) {
                points.push({ row: row0 + r, col: cCol + c });
            }
        }
    } else if (type === 'cross') {
        const thickness = Math.max(1, Math.floor(size / 3));
        // Horizontal bar
        const row0 = cRow - Math.floor(thickness / 2);
        const col0 = cCol - Math.floor(size / 2);
        for (let c = 0; c < size; c++) {
            for (let r = 0; r < thickness; r++) points.push({ row: row0 + r, col: col0 + c });
        }
        // Vertical bar
        const row1 = cRow - Math.floor(size / 2);
        const col1 = cCol - Math.floor(thickness / 2);
        for (let r = 0; r < size; r++) {
            for (let c = 0; c < thickness; c++) points.push({ row: row1 + r, col: col1 + c });
        }
    } else if (type === 'room') {
        // Hollow rectangle
        const row0 = cRow - Math.floor(size2 / 2);
        const col0 = cCol - Math.floor(size / 2);
        for (let r = 0; r < size2; r++) {
            for (let c = 0; c < size; c++) {
                if (c === 0 || c === size - 1 || r === 0 || r === size2 - 1) {
                    points.push({ row: row0 + r, col: col0 + c });
                }
            }
        }
    }

    return points;
}
