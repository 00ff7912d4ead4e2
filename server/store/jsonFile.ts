import fs from 'fs';
import path from 'path';
import { ConfigurationError, NotFoundError } from '../types/errors';

/**
 * Writes `data` as pretty JSON through a temporary file renamed over the target.
 * On failure the temporary file is removed and the error rethrown.
 */
export function writeJsonFile(filePath: string, data: unknown): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const tmpPath = `${filePath}.tmp`;
    try {
        fs.writeFileSync(tmpPath, JSON.stringify(data, null, 2), 'utf8');
        fs.renameSync(tmpPath, filePath);
    } catch (error) {
        fs.rmSync(tmpPath, { force: true });
        throw error;
    }
}

/**
 * Reads and parses a JSON file. A missing file is a NotFoundError (`notFoundCode`),
 * malformed JSON a ConfigurationError (`invalidCode`).
 */
export function readJsonFile(filePath: string, notFoundCode: string, invalidCode: string): unknown {
    if (!fs.existsSync(filePath)) {
        throw new NotFoundError(notFoundCode, `No file at ${filePath}`);
    }

    const raw = fs.readFileSync(filePath, 'utf8');
    try {
        return JSON.parse(raw);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(invalidCode, `${filePath} is not valid JSON: ${reason}`);
    }
}
