import { writeFile } from 'fs/promises';
import type { GenerateConfig, PlannerConfig } from './config';
import { loadMap } from './grid/mapLoader';
import { OccupancyGrid } from './grid/OccupancyGrid';
import { RouteDriver, type PlanResult } from './planner/routeDriver';
import { StepProtocolAdapter, type StepChannel } from './protocol/stepProtocol';
import { WebSocketStepChannel, type WebSocketEndpoints } from './protocol/wsChannel';
import { generateCSV, generateJSON, generateRouteCSV } from './utils/exportUtils';
import { generateRosBundle } from './utils/rosExporter';
import { renderMap } from './utils/mapRenderer';
import { DEFAULT_GENERATOR_OPTIONS, generateMap, seededRandom } from './utils/generatorUtils';
import { createComponentLogger } from './logging';
import { CELL_FREE, type RouteEntry } from './types';

const log = createComponentLogger('app');

export interface PlannerDependencies {
    connect?: (endpoints: WebSocketEndpoints) => Promise<StepChannel>;
    /** Where rendered maps go. Defaults to stdout. */
    print?: (text: string) => void;
    onStep?: (entry: RouteEntry, stepIndex: number) => void;
}

/**
 * Loads the configured map, plans the route (streaming it to the controller when
 * enabled) and writes the requested renderings and exports.
 */
export async function runPlanner(config: PlannerConfig, deps: PlannerDependencies = {}): Promise<PlanResult> {
    const print = deps.print ?? ((text: string) => process.stdout.write(text + '\n'));

    const source = await loadMap(config.dir, config.map);
    const grid = OccupancyGrid.fromSource(source, { start: config.init, goal: config.goal });

    if (config.render) print(renderMap(grid));

    let adapter = StepProtocolAdapter.disabled();
    if (config.controller) {
        const connect = deps.connect ?? WebSocketStepChannel.connect;
        const channel = await connect({
            url: config.url,
            target: config.target,
            response: config.response,
            connectTimeoutMs: config.connectTimeoutMs,
        });
        adapter = new StepProtocolAdapter(channel, { ackTimeoutMs: config.ackTimeoutMs });
    }

    const driver = new RouteDriver({
        adapter,
        fallbackOrder: config.fallbackOrder,
        maxSteps: config.maxSteps,
        onStep: deps.onStep,
    });

    let result: PlanResult;
    try {
        result = await driver.plan(grid, config.init, config.goal);
    } finally {
        await adapter.close();
    }

    if (config.render) print(renderMap(result.grid));
    await writeExports(config, result);

    log.info('Run finished', {
        status: result.status,
        steps: result.stepCount,
        elapsedMs: result.elapsedMs,
    });
    return result;
}

async function writeExports(config: PlannerConfig, result: PlanResult): Promise<void> {
    if (config.export) {
        const file = config.export;
        const lower = file.toLowerCase();
        if (lower.endsWith('.zip')) {
            await writeFile(file, await generateRosBundle(result.grid));
        } else if (lower.endsWith('.json')) {
            await writeFile(file, generateJSON(result));
        } else {
            await writeFile(file, generateCSV(result.grid, { start: config.init, goal: config.goal }));
        }
        log.info('Export written', { file });
    }
    if (config.exportRoute) {
        await writeFile(config.exportRoute, generateRouteCSV(result.route));
        log.info('Route written', { file: config.exportRoute });
    }
}

/**
 * Generates a map and returns it as CSV, also writing it to `config.out` when set.
 */
export async function runGenerator(config: GenerateConfig): Promise<string> {
    const random = config.seed === undefined ? Math.random : seededRandom(config.seed);
    const data = generateMap(config.rows, config.cols, {
        ...DEFAULT_GENERATOR_OPTIONS,
        mode: config.mode,
        count: config.count,
        minSize: config.minSize,
        maxSize: config.maxSize,
    }, random);

    // Targets may land on generated obstacles; clear them first
    for (const position of [config.init, config.goal]) {
        if (position && position.row < config.rows && position.col < config.cols) {
            data[position.row * config.cols + position.col] = CELL_FREE;
        }
    }
    const grid = OccupancyGrid.fromData(config.rows, config.cols, data);
    let targets = {};
    if (config.init && config.goal) {
        grid.assignTargets(config.init, config.goal);
        targets = { start: config.init, goal: config.goal };
    }

    const csv = generateCSV(grid, targets);
    if (config.out) {
        await writeFile(config.out, csv);
        log.info('Map written', { file: config.out, mode: config.mode });
    }
    return csv;
}
