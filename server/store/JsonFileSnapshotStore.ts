import { GameSnapshot } from '../types/GameTypes';
import { parseSnapshot } from '../engine/Snapshot';
import { env } from '../config/env';
import { createLogger, Logger } from '../utils/logger';
import { SnapshotStore } from './SnapshotStore';
import { readJsonFile, writeJsonFile } from './jsonFile';

/**
 * Stores the snapshot as pretty-printed JSON in a single file.
 * Writes go to a temporary file first and are renamed over the target.
 */
export class JsonFileSnapshotStore implements SnapshotStore {
    private readonly logger: Logger;

    constructor(public readonly filePath: string = env.SNAPSHOT_PATH, logger?: Logger) {
        this.logger = logger ?? createLogger('JsonFileSnapshotStore');
    }

    public save(snapshot: GameSnapshot): void {
        writeJsonFile(this.filePath, snapshot);
        this.logger.info(`Snapshot saved to ${this.filePath} (round ${snapshot.round}, ${snapshot.phase})`);
    }

    public load(): GameSnapshot {
        const data = readJsonFile(this.filePath, 'SNAPSHOT_NOT_FOUND', 'INVALID_SNAPSHOT');
        const snapshot = parseSnapshot(data);
        this.logger.info(`Snapshot loaded from ${this.filePath}`);
        return snapshot;
    }
}
