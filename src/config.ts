import { z } from 'zod';
import { CoordinateSchema, describeIssue } from './utils/validators';
import { ConfigError } from './errors';
import { LOG_LEVELS, isLogLevel } from './logging';

// Accepts numbers or their textual form as typed on the command line
const integer = (min: number, max: number = Number.MAX_SAFE_INTEGER) =>
    z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().int().min(min).max(max));

const choice = <U extends string, T extends [U, ...U[]]>(values: T) => z.string().pipe(z.enum(values));

const booleanFlag = z
    .union([z.boolean(), z.enum(['true', 'false', '1', '0', 'yes', 'no'])])
    .transform((value) => value === true || value === 'true' || value === '1' || value === 'yes');

const LogLevelSchema = z
    .string()
    .refine(isLogLevel, { message: `Expected one of ${Object.keys(LOG_LEVELS).join(', ')}` });

export const PlannerConfigSchema = z.object({
    dir: z.string().min(1).default('./maps'),
    map: z.string().min(1).default('map11.csv'),
    init: CoordinateSchema.default('2,2'),
    goal: CoordinateSchema.default('21,19'),
    controller: booleanFlag.default(false),
    url: z.string().url().default('ws://127.0.0.1:10000'),
    target: z.string().min(1).default('/robot/controller:i'),
    response: z.string().min(1).default('/robot/controller:o'),
    ackTimeoutMs: integer(1).optional(),
    connectTimeoutMs: integer(1).default(10_000),
    maxSteps: integer(0).optional(),
    fallbackOrder: choice(['reverse-secondary-first', 'reverse-primary-first']).default('reverse-secondary-first'),
    logLevel: LogLevelSchema.default('info'),
    render: booleanFlag.default(false),
    export: z.string().min(1).optional(),
    exportRoute: z.string().min(1).optional(),
});

export type PlannerConfig = z.infer<typeof PlannerConfigSchema>;
export type PlannerConfigInput = z.input<typeof PlannerConfigSchema>;

/** Applies defaults and validates. Throws ConfigError naming the first bad field. */
export function resolveConfig(input: PlannerConfigInput = {}): PlannerConfig {
    const result = PlannerConfigSchema.safeParse(input);
    if (!result.success) {
        throw new ConfigError(`Invalid configuration: ${describeIssue(result.error)}`);
    }
    return result.data;
}

export const GenerateConfigSchema = z.object({
    rows: integer(3, 2000).default(24),
    cols: integer(3, 2000).default(22),
    mode: choice(['shapes', 'maze', 'bugtrap']).default('shapes'),
    seed: integer(0).optional(),
    count: integer(0).default(10),
    minSize: integer(1).default(2),
    maxSize: integer(1).default(5),
    init: CoordinateSchema.optional(),
    goal: CoordinateSchema.optional(),
    out: z.string().min(1).optional(),
    logLevel: LogLevelSchema.default('info'),
}).refine((config) => config.minSize <= config.maxSize, {
    message: 'minSize must not exceed maxSize',
    path: ['minSize'],
});

export type GenerateConfig = z.infer<typeof GenerateConfigSchema>;
export type GenerateConfigInput = z.input<typeof GenerateConfigSchema>;

export function resolveGenerateConfig(input: GenerateConfigInput = {}): GenerateConfig {
    const result = GenerateConfigSchema.safeParse(input);
    if (!result.success) {
        throw new ConfigError(`Invalid configuration: ${describeIssue(result.error)}`);
    }
    return result.data;
}
