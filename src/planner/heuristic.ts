import type { Direction, Move, Position } from '../types';
import { samePosition } from '../types';

export type Axis = 'row' | 'col';

/**
 * Order of the two candidates that move away from the goal.
 * - `reverse-secondary-first`: primary, secondary, -secondary, -primary
 * - `reverse-primary-first`: primary, secondary, -primary, -secondary
 */
export type FallbackOrder = 'reverse-secondary-first' | 'reverse-primary-first';

export interface HeuristicOptions {
    fallbackOrder?: FallbackOrder;
}

export type Decision =
    | { kind: 'move'; move: Direction; to: Position }
    | { kind: 'reached-goal'; move: Extract<Move, 'reached-goal'> }
    | { kind: 'deadlock'; candidates: Direction[] };

export const DIRECTION_OFFSETS: Record<Direction, { dRow: number; dCol: number }> = {
    up: { dRow: -1, dCol: 0 },
    down: { dRow: 1, dCol: 0 },
    left: { dRow: 0, dCol: -1 },
    right: { dRow: 0, dCol: 1 },
};

export function step(from: Position, direction: Direction): Position {
    const { dRow, dCol } = DIRECTION_OFFSETS[direction];
    return { row: from.row + dRow, col: from.col + dCol };
}

const REVERSE: Record<Direction, Direction> = {
    up: 'down',
    down: 'up',
    left: 'right',
    right: 'left',
};

// A zero delta counts as positive: down on the row axis, right on the column axis
const towards = (axis: Axis, delta: number): Direction => {
    if (axis === 'row') return delta < 0 ? 'up' : 'down';
    return delta < 0 ? 'left' : 'right';
};

/**
 * The axis with the larger remaining distance. Ties go to the row axis.
 */
export function primaryAxis(deltaRow: number, deltaCol: number): Axis {
    return Math.abs(deltaRow) >= Math.abs(deltaCol) ? 'row' : 'col';
}

/**
 * Ordered candidate moves for a remaining distance of (deltaRow, deltaCol).
 */
export function candidateMoves(
    deltaRow: number,
    deltaCol: number,
    fallbackOrder: FallbackOrder = 'reverse-secondary-first'
): Direction[] {
    const primary = primaryAxis(deltaRow, deltaCol);
    const secondary: Axis = primary === 'row' ? 'col' : 'row';
    const deltaOf = (axis: Axis) => (axis === 'row' ? deltaRow : deltaCol);

    const forwardPrimary = towards(primary, deltaOf(primary));
    const forwardSecondary = towards(secondary, deltaOf(secondary));

    return fallbackOrder === 'reverse-primary-first'
        ? [forwardPrimary, forwardSecondary, REVERSE[forwardPrimary], REVERSE[forwardSecondary]]
        : [forwardPrimary, forwardSecondary, REVERSE[forwardSecondary], REVERSE[forwardPrimary]];
}

/**
 * Decides the next move from `current` towards `goal`.
 *
 * Stateless: every bit of route history must be folded into `isTraversable`
 * (visited cells report false). No candidate traversable means deadlock.
 */
export function decideNextMove(
    current: Position,
    goal: Position,
    isTraversable: (position: Position) => boolean,
    options: HeuristicOptions = {}
): Decision {
    if (samePosition(current, goal)) {
        return { kind: 'reached-goal', move: 'reached-goal' };
    }

    const candidates = candidateMoves(goal.row - current.row, goal.col - current.col, options.fallbackOrder);
    for (const move of candidates) {
        const to = step(current, move);
        if (isTraversable(to)) {
            return { kind: 'move', move, to };
        }
    }
    return { kind: 'deadlock', candidates };
}
