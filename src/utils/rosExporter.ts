import JSZip from 'jszip';
import type { OccupancyGrid } from '../grid/OccupancyGrid';

/**
 * Generates a PGM (P2 format) string from the grid.
 * ROS map_server:
 * - Obstacle -> 0 (Black)
 * - Everything traversable, including the route and targets -> 254 (White)
 */
export function generatePGM(grid: OccupancyGrid): string {
    let pgm = `P2\n${grid.cols} ${grid.rows}\n255\n`;

    // P2 recommends lines of at most 70 characters
    let line = '';

    for (const cell of grid.cells()) {
        const val = cell.status === 'occupied' ? 0 : 254;

        const segment = val.toString() + ' ';
        if (line.length + segment.length > 70) {
            pgm += line.trim() + '\n';
            line = segment;
        } else {
            line += segment;
        }
    }

    if (line.length > 0) {
        pgm += line.trim() + '\n';
    }

    return pgm;
}

/**
 * Generates the YAML configuration file for ROS map_server.
 */
export function generateYAML(resolution: number, imageFilename: string = 'map.pgm'): string {
    return `image: ${imageFilename}
resolution: ${resolution}
origin: [0, 0, 0]
negate: 0
occupied_thresh: 0.65
free_thresh: 0.196
`;
}

/** map.pgm + map.yaml zipped together, ready for map_server. */
export async function generateRosBundle(grid: OccupancyGrid, resolution: number = 0.05): Promise<Buffer> {
    const zip = new JSZip();
    zip.file('map.pgm', generatePGM(grid));
    zip.file('map.yaml', generateYAML(resolution, 'map.pgm'));
    return zip.generateAsync({ type: 'nodebuffer' });
}
