import {
    CELL_FREE,
    CELL_GOAL,
    CELL_OCCUPIED,
    CELL_START,
    CELL_VISITED,
    STATUS_TO_CODE,
    type Cell,
    type CellCode,
    type CellStatus,
    type GridData,
    type GridSource,
    type Position,
} from '../types';
import { BlockedLocationError, InvalidTransitionError, MapFormatError, OutOfBoundsError } from '../errors';

const CODE_TO_STATUS: Record<CellCode, CellStatus> = {
    [CELL_FREE]: 'free',
    [CELL_OCCUPIED]: 'occupied',
    [CELL_VISITED]: 'visited',
    [CELL_START]: 'start',
    [CELL_GOAL]: 'goal',
};

const isCellCode = (value: number): value is CellCode => value in CODE_TO_STATUS;

/**
 * Rectangular occupancy map stored as one status code per cell (row-major).
 *
 * Dimensions never change after construction. The only mutations are
 * target assignment and the Free -> Visited transition applied by the route driver.
 */
export class OccupancyGrid {
    private readonly data: GridData;

    private constructor(readonly rows: number, readonly cols: number, data: GridData) {
        this.data = data;
    }

    /** Builds a grid from raw codes. Unknown codes are rejected. */
    static fromData(rows: number, cols: number, data: ArrayLike<number>): OccupancyGrid {
        if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows <= 0 || cols <= 0) {
            throw new MapFormatError(`Invalid grid dimensions ${rows}x${cols}`);
        }
        if (data.length !== rows * cols) {
            throw new MapFormatError(`Expected ${rows * cols} cells, got ${data.length}`);
        }
        const codes = new Uint8Array(rows * cols);
        for (let i = 0; i < data.length; i++) {
            const value = data[i];
            if (!isCellCode(value)) {
                throw new MapFormatError(`Invalid cell code ${value} at row ${Math.floor(i / cols)}, column ${i % cols}`);
            }
            codes[i] = value;
        }
        return new OccupancyGrid(rows, cols, codes);
    }

    /**
     * Builds a grid from a parsed map and places its targets.
     * Explicit `start`/`goal` take precedence over the ones designated by the map.
     */
    static fromSource(source: GridSource, targets: { start?: Position; goal?: Position } = {}): OccupancyGrid {
        const grid = OccupancyGrid.fromData(source.rows, source.cols, source.data);
        const start = targets.start ?? source.start ?? grid.find('start');
        const goal = targets.goal ?? source.goal ?? grid.find('goal');
        if (!start || !goal) {
            throw new MapFormatError(`Map does not designate a ${start ? 'goal' : 'start'} location`);
        }
        grid.assignTargets(start, goal);
        return grid;
    }

    static empty(rows: number, cols: number): OccupancyGrid {
        return OccupancyGrid.fromData(rows, cols, new Uint8Array(rows * cols));
    }

    get size(): number {
        return this.rows * this.cols;
    }

    inBounds({ row, col }: Position): boolean {
        return Number.isInteger(row) && Number.isInteger(col)
            && row >= 0 && row < this.rows && col >= 0 && col < this.cols;
    }

    cellAt(position: Position): Cell {
        return { row: position.row, col: position.col, status: CODE_TO_STATUS[this.codeAt(position)] };
    }

    statusAt(position: Position): CellStatus {
        return CODE_TO_STATUS[this.codeAt(position)];
    }

    /** In bounds and neither occupied nor already visited. */
    isTraversable(position: Position): boolean {
        if (!this.inBounds(position)) return false;
        const code = this.data[this.index(position)];
        return code === CELL_FREE || code === CELL_START || code === CELL_GOAL;
    }

    /**
     * Free -> Visited. Start and Goal keep their tag (returns false), so the goal
     * stays traversable until the route reaches it.
     */
    markVisited(position: Position): boolean {
        const code = this.codeAt(position);
        if (code === CELL_START || code === CELL_GOAL) return false;
        if (code !== CELL_FREE) {
            throw new InvalidTransitionError(position, CODE_TO_STATUS[code]);
        }
        this.data[this.index(position)] = CELL_VISITED;
        return true;
    }

    /**
     * Places the start and goal markers, clearing any previous ones.
     * Both locations must be in bounds and not occupied.
     */
    assignTargets(start: Position, goal: Position): void {
        for (const [target, position] of [['start', start], ['goal', goal]] as const) {
            if (this.codeAt(position) === CELL_OCCUPIED) {
                throw new BlockedLocationError(target, position);
            }
        }
        for (let i = 0; i < this.data.length; i++) {
            if (this.data[i] === CELL_START || this.data[i] === CELL_GOAL) this.data[i] = CELL_FREE;
        }
        this.data[this.index(start)] = CELL_START;
        // start == goal keeps the goal tag; the route is then just the terminal entry
        this.data[this.index(goal)] = CELL_GOAL;
    }

    find(status: CellStatus): Position | undefined {
        const code = STATUS_TO_CODE[status];
        const i = this.data.indexOf(code);
        return i === -1 ? undefined : { row: Math.floor(i / this.cols), col: i % this.cols };
    }

    *cells(): IterableIterator<Cell> {
        for (let row = 0; row < this.rows; row++) {
            for (let col = 0; col < this.cols; col++) {
                yield this.cellAt({ row, col });
            }
        }
    }

    /** Copy of the underlying codes, row-major. */
    toData(): GridData {
        return new Uint8Array(this.data);
    }

    clone(): OccupancyGrid {
        return new OccupancyGrid(this.rows, this.cols, new Uint8Array(this.data));
    }

    private codeAt(position: Position): CellCode {
        if (!this.inBounds(position)) {
            throw new OutOfBoundsError(position, this.rows, this.cols);
        }
        const code = this.data[this.index(position)];
        return isCellCode(code) ? code : CELL_OCCUPIED;
    }

    private index({ row, col }: Position): number {
        return row * this.cols + col;
    }
}
