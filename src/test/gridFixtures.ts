import { OccupancyGrid } from '../grid/OccupancyGrid';
import { CELL_FREE, CELL_OCCUPIED } from '../types';

/**
 * Builds a grid from a picture: '#' is an obstacle, anything else is free.
 */
export function gridFrom(picture: string[]): OccupancyGrid {
    const rows = picture.length;
    const cols = picture[0].length;
    const data = new Uint8Array(rows * cols);
    picture.forEach((line, row) => {
        if (line.length !== cols) throw new Error(`Fixture row ${row} has ${line.length} columns, expected ${cols}`);
        for (let col = 0; col < cols; col++) {
            data[row * cols + col] = line[col] === '#' ? CELL_OCCUPIED : CELL_FREE;
        }
    });
    return OccupancyGrid.fromData(rows, cols, data);
}
