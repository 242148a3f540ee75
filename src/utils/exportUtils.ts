import type { Position, Route } from '../types';
import type { OccupancyGrid } from '../grid/OccupancyGrid';
import type { PlanResult } from '../planner/routeDriver';
import { toToken } from '../protocol/stepProtocol';

/**
 * Annotated grid as CSV: one status code per cell (0 free, 1 obstacle, 2 route,
 * 3 start, 4 goal), preceded by start/goal comment lines. Explicit targets win over
 * the tags. Loading it back with parseCSV yields the input map with the route cleared.
 */
export const generateCSV = (grid: OccupancyGrid, targets: { start?: Position; goal?: Position } = {}): string => {
    let csv = '';
    // A start on the goal cell carries only the goal tag
    const start = targets.start ?? grid.find('start');
    const goal = targets.goal ?? grid.find('goal');
    if (start) csv += `# start,${start.row},${start.col}\n`;
    if (goal) csv += `# goal,${goal.row},${goal.col}\n`;

    const data = grid.toData();
    for (let row = 0; row < grid.rows; row++) {
        csv += Array.from(data.subarray(row * grid.cols, (row + 1) * grid.cols)).join(',') + '\n';
    }
    return csv;
};

export const generateRouteCSV = (route: Route): string => {
    let csv = 'step,row,col,command\n';
    route.forEach((entry, step) => {
        csv += `${step},${entry.position.row},${entry.position.col},${toToken(entry.move)}\n`;
    });
    return csv;
};

export const generateJSON = (result: PlanResult): string => {
    const serializable = {
        status: result.status,
        stepCount: result.stepCount,
        startedAt: result.startedAt.toISOString(),
        finishedAt: result.finishedAt.toISOString(),
        elapsedMs: result.elapsedMs,
        route: result.route.map((entry) => ({ ...entry.position, command: toToken(entry.move) })),
        error: result.error ? { code: result.error.code, message: result.error.message } : undefined,
    };
    return JSON.stringify(serializable, null, 2);
};
