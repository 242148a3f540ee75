/**
 * Command line entry point.
 *
 * Usage:
 *   tsx src/cli.ts plan [--dir ./maps] [--map map11.csv] [--init 2,2] [--goal 21,19]
 *                       [--controller] [--url ws://127.0.0.1:10000]
 *                       [--target /robot/controller:i] [--response /robot/controller:o]
 *                       [--ack-timeout ms] [--max-steps n] [--render]
 *                       [--export file.csv|file.json|file.zip] [--export-route file.csv]
 *   tsx src/cli.ts generate [--rows 24] [--cols 22] [--mode shapes|maze|bugtrap]
 *                           [--seed n] [--init r,c --goal r,c] [--out file.csv]
 */

import { parseArgs } from 'util';
import { pathToFileURL } from 'url';
import { resolveConfig, resolveGenerateConfig } from './config';
import { runGenerator, runPlanner } from './app';
import { ConfigError, PlannerError } from './errors';
import { createComponentLogger, initLogging } from './logging';
import type { PlanStatus } from './types';

const log = createComponentLogger('cli');

export const EXIT_CODES: Record<PlanStatus | 'error', number> = {
    'completed': 0,
    'error': 1,
    'deadlocked': 2,
    'controller-failed': 3,
};

const PLAN_OPTIONS = {
    'dir': { type: 'string' },
    'map': { type: 'string' },
    'init': { type: 'string' },
    'goal': { type: 'string' },
    'controller': { type: 'boolean' },
    'url': { type: 'string' },
    'target': { type: 'string' },
    'response': { type: 'string' },
    'ack-timeout': { type: 'string' },
    'connect-timeout': { type: 'string' },
    'max-steps': { type: 'string' },
    'fallback': { type: 'string' },
    'log-level': { type: 'string' },
    'render': { type: 'boolean' },
    'export': { type: 'string' },
    'export-route': { type: 'string' },
} as const;

const GENERATE_OPTIONS = {
    'rows': { type: 'string' },
    'cols': { type: 'string' },
    'mode': { type: 'string' },
    'seed': { type: 'string' },
    'count': { type: 'string' },
    'min-size': { type: 'string' },
    'max-size': { type: 'string' },
    'init': { type: 'string' },
    'goal': { type: 'string' },
    'out': { type: 'string' },
    'log-level': { type: 'string' },
} as const;

function parseOptions<T>(parse: () => T): T {
    try {
        return parse();
    } catch (error) {
        throw new ConfigError(error instanceof Error ? error.message : String(error), { cause: error });
    }
}

async function plan(args: string[]): Promise<number> {
    const { values } = parseOptions(() => parseArgs({ args, options: PLAN_OPTIONS, strict: true }));
    const config = resolveConfig({
        dir: values.dir,
        map: values.map,
        init: values.init,
        goal: values.goal,
        controller: values.controller,
        url: values.url,
        target: values.target,
        response: values.response,
        ackTimeoutMs: values['ack-timeout'],
        connectTimeoutMs: values['connect-timeout'],
        maxSteps: values['max-steps'],
        fallbackOrder: values.fallback,
        logLevel: values['log-level'],
        render: values.render,
        export: values.export,
        exportRoute: values['export-route'],
    });
    initLogging({ minLevel: config.logLevel });

    log.info('Configuration', {
        map: `${config.dir}/${config.map}`,
        init: config.init,
        goal: config.goal,
        controller: config.controller,
    });

    const result = await runPlanner(config);

    log.info('Summary', {
        status: result.status,
        startedAt: result.startedAt.toISOString(),
        finishedAt: result.finishedAt.toISOString(),
        elapsedMs: result.elapsedMs,
        steps: result.stepCount,
    });
    if (result.error) {
        log.error(`Goal not achieved: ${result.status}`, result.error);
    }
    return EXIT_CODES[result.status];
}

async function generate(args: string[]): Promise<number> {
    const { values } = parseOptions(() => parseArgs({ args, options: GENERATE_OPTIONS, strict: true }));
    const config = resolveGenerateConfig({
        rows: values.rows,
        cols: values.cols,
        mode: values.mode,
        seed: values.seed,
        count: values.count,
        minSize: values['min-size'],
        maxSize: values['max-size'],
        init: values.init,
        goal: values.goal,
        out: values.out,
        logLevel: values['log-level'],
    });
    initLogging({ minLevel: config.logLevel });

    const csv = await runGenerator(config);
    if (!config.out) process.stdout.write(csv);
    return EXIT_CODES.completed;
}

export async function main(argv: string[]): Promise<number> {
    const [command = 'plan', ...rest] = argv;
    try {
        switch (command) {
            case 'plan':
                return await plan(rest);
            case 'generate':
                return await generate(rest);
            default:
                // Bare options mean "plan"
                if (command.startsWith('--')) return await plan(argv);
                log.error(`Unknown command "${command}". Expected "plan" or "generate".`);
                return EXIT_CODES.error;
        }
    } catch (error) {
        if (error instanceof PlannerError) {
            log.error(`${error.code}: ${error.message}`);
        } else {
            log.fatal('Unexpected failure', error);
        }
        return EXIT_CODES.error;
    }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
    main(process.argv.slice(2)).then(
        (code) => {
            process.exitCode = code;
        },
        (error: unknown) => {
            console.error(error);
            process.exitCode = EXIT_CODES.error;
        }
    );
}
