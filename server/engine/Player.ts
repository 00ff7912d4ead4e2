import {
    GamePhase,
    PlayerRole,
    PlayerSnapshot,
    PlayerStatus,
    StatusContext,
    StatusRecord,
    Team,
} from '../types/GameTypes';
import { InvalidStateError } from '../types/errors';
import { teamOf } from '../roles';

const SETUP_CONTEXT: StatusContext = { round: 0, phase: GamePhase.SETUP };

/** What GameState hands out to callers: every read, none of the mutators. */
export interface ReadonlyPlayer {
    readonly number: number;
    readonly name: string;
    readonly role: PlayerRole | null;
    readonly team: Team | null;
    readonly isAlive: boolean;
    readonly roleLocked: boolean;
    readonly statusHistory: readonly StatusRecord[];
    toSnapshot(): PlayerSnapshot;
}

/**
 * A seat at the table. Mutated only by GameState; publishes no events of its own.
 */
export class Player implements ReadonlyPlayer {
    private _role: PlayerRole | null = null;
    private _isAlive: boolean = true;
    private _roleLocked: boolean = false;
    private _statusHistory: readonly StatusRecord[] = [];
    private readonly _view: ReadonlyPlayer;

    constructor(public readonly number: number, public readonly name: string) {
        this._view = createView(this);
        this.record(SETUP_CONTEXT, 'registered');
    }

    /** Live, frozen view without the mutators; the same object on every call. */
    public get view(): ReadonlyPlayer {
        return this._view;
    }

    public get role(): PlayerRole | null {
        return this._role;
    }

    /** Derived from the role; null until roles are dealt. */
    public get team(): Team | null {
        return this._role ? teamOf(this._role) : null;
    }

    public get isAlive(): boolean {
        return this._isAlive;
    }

    public get roleLocked(): boolean {
        return this._roleLocked;
    }

    public get statusHistory(): readonly StatusRecord[] {
        return this._statusHistory;
    }

    /**
     * Sets the role. Allowed while the role is unlocked (before the game starts) and the player is alive.
     */
    public assignRole(role: PlayerRole, context: StatusContext = SETUP_CONTEXT): void {
        if (this._roleLocked) {
            throw new InvalidStateError('ROLE_LOCKED', `Role of ${this.name} cannot change after the game has started`);
        }
        if (!this._isAlive) {
            throw new InvalidStateError('PLAYER_DEAD', `Cannot assign a role to ${this.name}: player is dead`);
        }
        this._role = role;
        this.record(context, `role assigned: ${role}`);
    }

    public lockRole(): void {
        this._roleLocked = true;
    }

    /**
     * Clears the role and lock, revives the player. History is kept.
     */
    public resetForNewGame(): void {
        this._role = null;
        this._roleLocked = false;
        this._isAlive = true;
        this.record(SETUP_CONTEXT, 'reset');
    }

    /**
     * Marks the player dead. Returns false when the player was already dead (no-op).
     */
    public kill(context: StatusContext = SETUP_CONTEXT, reason: string = 'killed'): boolean {
        if (!this._isAlive) return false;
        this._isAlive = false;
        this.record(context, reason);
        return true;
    }

    /** Test scaffolding; normal play never brings a player back. */
    public resurrect(context: StatusContext = SETUP_CONTEXT): boolean {
        if (this._isAlive) return false;
        this._isAlive = true;
        this.record(context, 'resurrected');
        return true;
    }

    public toSnapshot(): PlayerSnapshot {
        return {
            number: this.number,
            name: this.name,
            role: this._role,
            isAlive: this._isAlive,
            statusHistory: this._statusHistory.map(record => ({ ...record })),
        };
    }

    /**
     * Rebuilds a player from a snapshot. `roleLocked` follows whether the snapshot was taken mid-game.
     */
    public static fromSnapshot(snapshot: PlayerSnapshot, roleLocked: boolean): Player {
        const player = new Player(snapshot.number, snapshot.name);
        player._role = snapshot.role;
        player._isAlive = snapshot.isAlive;
        player._roleLocked = roleLocked;
        player._statusHistory = Object.freeze(snapshot.statusHistory.map(record => Object.freeze({ ...record })));
        return player;
    }

    private record(context: StatusContext, reason: string): void {
        const status: PlayerStatus = this._isAlive ? 'ALIVE' : 'DEAD';
        const entry: StatusRecord = Object.freeze({
            round: context.round,
            phase: context.phase,
            status,
            role: this._role,
            reason,
            timestamp: new Date().toISOString(),
        });
        this._statusHistory = Object.freeze([...this._statusHistory, entry]);
    }
}

function createView(player: Player): ReadonlyPlayer {
    return Object.freeze({
        get number() { return player.number; },
        get name() { return player.name; },
        get role() { return player.role; },
        get team() { return player.team; },
        get isAlive() { return player.isAlive; },
        get roleLocked() { return player.roleLocked; },
        get statusHistory() { return player.statusHistory; },
        toSnapshot: () => player.toSnapshot(),
    });
}
