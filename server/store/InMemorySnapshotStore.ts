import { GameSnapshot } from '../types/GameTypes';
import { NotFoundError } from '../types/errors';
import { SnapshotStore } from './SnapshotStore';

/** Keeps the last saved snapshot in memory. Used as the default backend and in tests. */
export class InMemorySnapshotStore implements SnapshotStore {
    private latest: GameSnapshot | null = null;
    private saves: number = 0;

    public get saveCount(): number {
        return this.saves;
    }

    public save(snapshot: GameSnapshot): void {
        this.latest = snapshot;
        this.saves++;
    }

    public load(): GameSnapshot {
        if (!this.latest) {
            throw new NotFoundError('SNAPSHOT_NOT_FOUND', 'No snapshot has been saved');
        }
        return this.latest;
    }
}
