import { z } from 'zod';
import type { GridSource } from '../types';
import { CELL_FREE, CELL_GOAL, CELL_OCCUPIED, CELL_START, CELL_VISITED } from '../types';
import { MapFormatError } from '../errors';

export const PositionSchema = z.object({
    row: z.number().int().nonnegative(),
    col: z.number().int().nonnegative(),
});

/** "row,col" as typed on the command line, e.g. "2,2" */
export const CoordinateSchema = z
    .string()
    .regex(/^\s*\d+\s*,\s*\d+\s*$/, 'Expected a "row,col" pair of non-negative integers')
    .transform((value) => {
        const [row, col] = value.split(',').map((part) => parseInt(part.trim(), 10));
        return { row, col };
    });

export const GridImportSchema = z
    .object({
        rows: z.number().int().positive().max(2000), // Safety cap
        cols: z.number().int().positive().max(2000),
        cells: z.array(z.array(z.number().int())),
        start: PositionSchema.optional(),
        goal: PositionSchema.optional(),
    })
    .superRefine((grid, ctx) => {
        if (grid.cells.length !== grid.rows) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['cells'],
                message: `Expected ${grid.rows} rows, got ${grid.cells.length}`,
            });
        }
        grid.cells.forEach((row, index) => {
            if (row.length !== grid.cols) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['cells', index],
                    message: `Expected ${grid.cols} columns, got ${row.length}`,
                });
            }
        });
    });

export type GridImportType = z.infer<typeof GridImportSchema>;

export const describeIssue = (error: z.ZodError): string => {
    const issue = error.issues[0];
    if (!issue) return error.message;
    return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
};

/**
 * Validates a JSON map and converts it to a grid source.
 * Cell values follow the CSV convention (0 free, 2 trace, 3 start, 4 goal, else obstacle).
 */
export function parseGridJSON(json: unknown): GridSource {
    const result = GridImportSchema.safeParse(json);
    if (!result.success) {
        throw new MapFormatError(`Invalid map JSON: ${describeIssue(result.error)}`);
    }
    const { rows, cols, cells } = result.data;
    const data = new Uint8Array(rows * cols);
    let start = result.data.start;
    let goal = result.data.goal;

    cells.forEach((values, row) => {
        values.forEach((val, col) => {
            if (val === CELL_START) start ??= { row, col };
            if (val === CELL_GOAL) goal ??= { row, col };
            const free = val === CELL_FREE || val === CELL_VISITED || val === CELL_START || val === CELL_GOAL;
            data[row * cols + col] = free ? CELL_FREE : CELL_OCCUPIED;
        });
    });

    return { rows, cols, data, start, goal };
}
