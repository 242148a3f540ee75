// Status codes as they appear in map files and exports
export const CELL_FREE = 0;
export const CELL_OCCUPIED = 1;
export const CELL_VISITED = 2;
export const CELL_START = 3;
export const CELL_GOAL = 4;

export type CellCode =
    | typeof CELL_FREE
    | typeof CELL_OCCUPIED
    | typeof CELL_VISITED
    | typeof CELL_START
    | typeof CELL_GOAL;

export type CellStatus = 'free' | 'occupied' | 'start' | 'goal' | 'visited';

export const STATUS_TO_CODE: Record<CellStatus, CellCode> = {
    free: CELL_FREE,
    occupied: CELL_OCCUPIED,
    visited: CELL_VISITED,
    start: CELL_START,
    goal: CELL_GOAL,
};

/**
 * Grid coordinate. `row` is the vertical axis (grows downwards),
 * `col` the horizontal one (grows to the right).
 */
export interface Position {
    row: number;
    col: number;
}

export interface Cell extends Position {
    status: CellStatus;
}

export type Direction = 'up' | 'down' | 'left' | 'right';
export type Move = Direction | 'reached-goal';

export interface RouteEntry {
    position: Position;
    move: Move;
}

export type Route = readonly RouteEntry[];

export type GridData = Uint8Array; // Flattened 1D array of CellCode, row-major

export interface GridSource {
    rows: number;
    cols: number;
    data: GridData;
    // Targets designated by the map file itself, if any
    start?: Position;
    goal?: Position;
}

export type PlanStatus = 'completed' | 'deadlocked' | 'controller-failed';

export type DriverState = 'idle' | 'stepping' | 'awaiting-ack' | PlanStatus;

export const samePosition = (a: Position, b: Position): boolean =>
    a.row === b.row && a.col === b.col;

export const positionKey = (p: Position): string => `${p.row},${p.col}`;
