import type { Position } from './types';

export type PlannerErrorCode =
    | 'OUT_OF_BOUNDS'
    | 'DEADLOCK'
    | 'CONTROLLER'
    | 'INVALID_TRANSITION'
    | 'MAP_FORMAT'
    | 'BLOCKED_LOCATION'
    | 'CONFIG';

export abstract class PlannerError extends Error {
    abstract readonly code: PlannerErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class OutOfBoundsError extends PlannerError {
    readonly code = 'OUT_OF_BOUNDS';

    constructor(readonly position: Position, readonly rows: number, readonly cols: number) {
        super(`Position (${position.row}, ${position.col}) is outside the ${rows}x${cols} grid`);
    }
}

export type DeadlockReason = 'no-candidate' | 'step-limit';

export class DeadlockError extends PlannerError {
    readonly code = 'DEADLOCK';

    constructor(readonly position: Position, readonly step: number, readonly reason: DeadlockReason = 'no-candidate') {
        super(reason === 'step-limit'
            ? `Step limit reached at (${position.row}, ${position.col}) after ${step} steps`
            : `No traversable move from (${position.row}, ${position.col}) at step ${step}`);
    }
}

export class ControllerError extends PlannerError {
    readonly code = 'CONTROLLER';
    // Set by the route driver once it knows where the run stopped
    step?: number;
}

export class InvalidTransitionError extends PlannerError {
    readonly code = 'INVALID_TRANSITION';

    constructor(readonly position: Position, readonly from: string) {
        super(`Cannot mark ${from} cell (${position.row}, ${position.col}) as visited`);
    }
}

export class MapFormatError extends PlannerError {
    readonly code = 'MAP_FORMAT';
}

export class BlockedLocationError extends PlannerError {
    readonly code = 'BLOCKED_LOCATION';

    constructor(readonly target: 'start' | 'goal', readonly position: Position) {
        super(`The ${target} location (${position.row}, ${position.col}) is occupied`);
    }
}

export class ConfigError extends PlannerError {
    readonly code = 'CONFIG';
}
