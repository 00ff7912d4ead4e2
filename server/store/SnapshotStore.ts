import { GameSnapshot } from '../types/GameTypes';

/**
 * Persistence backend for game snapshots. The engine only needs these two calls;
 * the storage medium is up to the implementation.
 */
export interface SnapshotStore {
    save(snapshot: GameSnapshot): void;
    /** Throws NotFoundError when nothing has been saved yet. */
    load(): GameSnapshot;
}
