import type { CellStatus } from '../types';
import type { OccupancyGrid } from '../grid/OccupancyGrid';

const SYMBOLS: Record<CellStatus, string> = {
    free: '  ',
    occupied: '||',
    visited: '. ',
    start: 'S ',
    goal: 'E ',
};

/**
 * Renders the grid as text, one line per row, two characters per cell.
 * Trailing blanks are kept so columns stay aligned.
 */
export function renderMap(grid: OccupancyGrid): string {
    const lines: string[] = [];
    for (let row = 0; row < grid.rows; row++) {
        let line = '';
        for (let col = 0; col < grid.cols; col++) {
            line += SYMBOLS[grid.statusAt({ row, col })];
        }
        lines.push(line);
    }
    return lines.join('\n');
}
