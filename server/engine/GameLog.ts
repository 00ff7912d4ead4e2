import { AnyGameEvent, DeathCause, GameActionType, GameEventType } from '../types/GameTypes';
import { GAME_CONFIG } from '../config/game.config';
import { EventBus, Subscription } from './EventBus';

export interface GameLogEntry {
    round: number;
    type: GameEventType;
    message: string;
    timestamp: string;
}

export interface GameLogOptions {
    /** Oldest entries are dropped past this size. Defaults to the event history size. */
    maxEntries?: number;
}

const DEATH_VERB: Record<DeathCause, string> = {
    execution: 'was executed',
    werewolf_attack: 'was killed by the werewolves',
    gm: 'died',
};

const ACTION_LABEL: Record<GameActionType, string> = {
    execution: 'Execution',
    attack: 'Werewolf attack',
    guard: 'Guard',
    inspect: 'Seer',
};

/**
 * Keeps a GM-readable log of the game by listening to the event bus.
 */
export class GameLog {
    private _entries: GameLogEntry[] = [];
    private round: number = 0;
    private subscription: Subscription | null;
    private readonly maxEntries: number;

    constructor(private readonly bus: EventBus, options: GameLogOptions = {}) {
        this.maxEntries = options.maxEntries ?? GAME_CONFIG.eventHistorySize;
        this.subscription = bus.subscribe(event => this.handleEvent(event));
    }

    public get entries(): readonly GameLogEntry[] {
        return this._entries;
    }

    /** One line per entry, e.g. `[round 2] Alice died (WEREWOLF)`. */
    public lines(): string[] {
        return this._entries.map(entry => `[round ${entry.round}] ${entry.message}`);
    }

    public clear(): void {
        this._entries = [];
    }

    public dispose(): void {
        if (this.subscription) {
            this.bus.unsubscribe(this.subscription);
            this.subscription = null;
        }
    }

    private handleEvent(event: AnyGameEvent): void {
        const message = this.describe(event);
        if (message === null) return;
        this._entries.push({ round: this.round, type: event.type, message, timestamp: event.timestamp });
        if (this._entries.length > this.maxEntries) {
            this._entries.splice(0, this._entries.length - this.maxEntries);
        }
    }

    private describe(event: AnyGameEvent): string | null {
        const phaseNames = GAME_CONFIG.phaseNames;

        switch (event.type) {
            case GameEventType.PLAYER_ADDED:
                return `Player #${event.data.number} ${event.data.playerName} joined`;
            case GameEventType.PLAYER_REMOVED:
                return `Player ${event.data.playerName} left`;
            case GameEventType.REGULATION_UPDATED:
                return `Regulation set for ${event.data.totalPlayers} players`;
            case GameEventType.REGULATION_SAVED:
                return `Regulation preset "${event.data.name}" saved`;
            case GameEventType.ROLES_ASSIGNED:
                return `Roles dealt to ${event.data.assignments.length} players`;
            case GameEventType.GAME_STARTED:
                this.round = event.data.round;
                return `Game started with ${event.data.playerCount} players`;
            case GameEventType.ACTION_RECORDED:
                return `${ACTION_LABEL[event.data.action.type]}: ${event.data.action.target ?? 'nobody'}`;
            case GameEventType.PHASE_CHANGED:
                this.round = event.data.round;
                return `${phaseNames[event.data.fromPhase]} → ${phaseNames[event.data.toPhase]}`;
            case GameEventType.ROUND_CHANGED:
                this.round = event.data.round;
                return `Round ${event.data.round} begins (${event.data.discussionTime} min discussion)`;
            case GameEventType.PLAYER_DIED:
                return `${event.data.playerName} ${DEATH_VERB[event.data.cause]} (${event.data.role ?? 'no role'})`;
            case GameEventType.PLAYER_RESURRECTED:
                return `${event.data.playerName} was brought back`;
            case GameEventType.GAME_ENDED:
                return event.data.outcome === 'DRAW'
                    ? 'Game over: draw'
                    : `Game over: ${event.data.outcome} team wins`;
            case GameEventType.GAME_STATE_RESET:
                this.round = 0;
                return 'Game reset';
            case GameEventType.GAME_STATE_RESTORED:
                this.round = event.data.round;
                return `State restored at ${phaseNames[event.data.phase]}`;
            case GameEventType.ERROR:
                return `Listener error on ${event.data.originalEventType}: ${event.data.errorMessage}`;
            default:
                return assertNever(event);
        }
    }
}

function assertNever(value: never): never {
    throw new Error(`Unhandled event: ${JSON.stringify(value)}`);
}
