import {
    positionKey,
    type DriverState,
    type PlanStatus,
    type Position,
    type Route,
    type RouteEntry,
} from '../types';
import type { OccupancyGrid } from '../grid/OccupancyGrid';
import { ControllerError, DeadlockError, OutOfBoundsError } from '../errors';
import { StepProtocolAdapter } from '../protocol/stepProtocol';
import { createComponentLogger } from '../logging';
import { decideNextMove, type FallbackOrder } from './heuristic';

const log = createComponentLogger('planner.driver');

export interface PlanResult {
    status: PlanStatus;
    route: Route;
    /** Directional moves taken; the terminal entry is not counted */
    stepCount: number;
    startedAt: Date;
    finishedAt: Date;
    elapsedMs: number;
    /** The run's own copy of the grid, with the route marked as visited */
    grid: OccupancyGrid;
    error?: DeadlockError | ControllerError;
}

export interface RouteDriverOptions {
    adapter?: StepProtocolAdapter;
    fallbackOrder?: FallbackOrder;
    /** Iteration cap. Defaults to the number of cells in the grid. */
    maxSteps?: number;
    onStep?: (entry: RouteEntry, stepIndex: number) => void;
    onStateChange?: (state: DriverState) => void;
}

/**
 * Runs the heuristic one step at a time, owning the route and the visited set.
 *
 * When the adapter has a controller attached, every move (and the final GOAL)
 * is acknowledged before the next decision is taken.
 */
export class RouteDriver {
    private currentState: DriverState = 'idle';
    private readonly adapter: StepProtocolAdapter;

    constructor(private readonly options: RouteDriverOptions = {}) {
        this.adapter = options.adapter ?? StepProtocolAdapter.disabled();
    }

    get state(): DriverState {
        return this.currentState;
    }

    async plan(source: OccupancyGrid, start: Position, goal: Position): Promise<PlanResult> {
        for (const position of [start, goal]) {
            if (!source.inBounds(position)) {
                throw new OutOfBoundsError(position, source.rows, source.cols);
            }
        }

        const grid = source.clone();
        // Throws BlockedLocationError for an occupied start or goal
        grid.assignTargets(start, goal);
        const visited = new Set<string>([positionKey(start)]);
        const route: RouteEntry[] = [];
        const maxSteps = this.options.maxSteps ?? grid.size;
        const startedAt = new Date();
        let current = start;
        let stepCount = 0;

        const isTraversable = (p: Position) => grid.isTraversable(p) && !visited.has(positionKey(p));

        const finish = (status: PlanStatus, error?: DeadlockError | ControllerError): PlanResult => {
            this.transition(status);
            const finishedAt = new Date();
            return {
                status,
                route: Object.freeze(route.slice()),
                stepCount,
                startedAt,
                finishedAt,
                elapsedMs: finishedAt.getTime() - startedAt.getTime(),
                grid,
                error,
            };
        };

        this.transition('stepping');
        log.info('Planning route', { start, goal, rows: grid.rows, cols: grid.cols });

        while (true) {
            const decision = decideNextMove(current, goal, isTraversable, {
                fallbackOrder: this.options.fallbackOrder,
            });

            if (decision.kind === 'deadlock') {
                const error = new DeadlockError(current, stepCount);
                log.warn(error.message, { tried: decision.candidates });
                return finish('deadlocked', error);
            }
            if (decision.kind === 'move' && stepCount >= maxSteps) {
                const error = new DeadlockError(current, stepCount, 'step-limit');
                log.warn(error.message);
                return finish('deadlocked', error);
            }

            const entry: RouteEntry = decision.kind === 'move'
                ? { position: decision.to, move: decision.move }
                : { position: current, move: decision.move };
            route.push(entry);

            if (decision.kind === 'move') {
                visited.add(positionKey(decision.to));
                grid.markVisited(decision.to);
                current = decision.to;
                stepCount++;
            }
            log.info(`Step ${route.length - 1}: ${entry.move}`, { position: entry.position });
            this.options.onStep?.(entry, route.length - 1);

            const failure = await this.acknowledge(entry, stepCount);
            if (failure) return finish('controller-failed', failure);

            if (decision.kind === 'reached-goal') {
                log.info('Goal reached', { steps: stepCount });
                return finish('completed');
            }
        }
    }

    private async acknowledge(entry: RouteEntry, stepCount: number): Promise<ControllerError | undefined> {
        if (!this.adapter.enabled) return undefined;

        this.transition('awaiting-ack');
        try {
            await this.adapter.sendAndAwait(entry.move);
        } catch (error) {
            const failure = error instanceof ControllerError
                ? error
                : new ControllerError('Controller exchange failed', { cause: error });
            failure.step = stepCount;
            log.error(`Controller failed after step ${stepCount}`, failure);
            return failure;
        }
        this.transition('stepping');
        return undefined;
    }

    private transition(next: DriverState): void {
        this.currentState = next;
        this.options.onStateChange?.(next);
    }
}
