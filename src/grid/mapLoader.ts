import { readFile } from 'fs/promises';
import path from 'path';
import type { GridSource } from '../types';
import { MapFormatError } from '../errors';
import { parseCSV } from '../utils/csvParser';
import { parseGridJSON } from '../utils/validators';
import { createComponentLogger } from '../logging';

const log = createComponentLogger('grid.loader');

/** Parses map text, choosing the format by file name. */
export function parseMap(text: string, fileName: string): GridSource {
    if (fileName.toLowerCase().endsWith('.json')) {
        let json: unknown;
        try {
            json = JSON.parse(text);
        } catch (error) {
            throw new MapFormatError(`${fileName} is not valid JSON`, { cause: error });
        }
        return parseGridJSON(json);
    }
    return parseCSV(text);
}

export async function loadMap(dir: string, mapId: string): Promise<GridSource> {
    const file = path.resolve(dir, mapId);
    let text: string;
    try {
        text = await readFile(file, 'utf8');
    } catch (error) {
        throw new MapFormatError(`Cannot read map ${file}`, { cause: error });
    }

    const source = parseMap(text, file);
    log.info('Map loaded', { file, rows: source.rows, cols: source.cols });
    return source;
}
