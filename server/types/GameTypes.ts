export enum PlayerRole {
    VILLAGER = 'VILLAGER',
    WEREWOLF = 'WEREWOLF',
    GUARD = 'GUARD',
    SEER = 'SEER',
    MEDIUM = 'MEDIUM',
    MADMAN = 'MADMAN',
}

export enum Team {
    VILLAGE = 'VILLAGE',
    WEREWOLF = 'WEREWOLF',
}

export enum GamePhase {
    SETUP = 'SETUP',
    DAY_DISCUSSION = 'DAY_DISCUSSION',
    DAY_VOTE = 'DAY_VOTE',
    NIGHT = 'NIGHT',
}

/** Result of a finished game. DRAW means both teams were wiped out by the same action. */
export type GameOutcome = Team | 'DRAW';

export type TeamCounts = Record<Team, number>;

export type PlayerStatus = 'ALIVE' | 'DEAD';

/** Where in the game a status change happened. */
export interface StatusContext {
    round: number;
    phase: GamePhase;
}

export interface StatusRecord extends StatusContext {
    readonly status: PlayerStatus;
    readonly role: PlayerRole | null;
    readonly reason: string;
    readonly timestamp: string;
}

/**
 * Role quota for one game. Roles missing from `roles` count as zero.
 * `minPlayers` / `maxPlayers` override the global player bounds.
 */
export interface Regulation {
    roles: Partial<Record<PlayerRole, number>>;
    minPlayers?: number;
    maxPlayers?: number;
    /**
     * Discussion minutes per round, first entry for round 1.
     * Rounds past the end of the list reuse the last entry.
     */
    roundTimes?: number[];
}

/** What removed a player from the game. `gm` is a direct kill by the game master. */
export type DeathCause = 'execution' | 'werewolf_attack' | 'gm';

export type GameActionType = 'execution' | 'attack' | 'guard' | 'inspect';

/** A decision the GM entered for the current round. `target` is null for "nobody". */
export interface GameAction {
    readonly round: number;
    readonly phase: GamePhase;
    readonly type: GameActionType;
    readonly target: string | null;
    readonly timestamp: string;
}

export interface PlayerSnapshot {
    readonly number: number;
    readonly name: string;
    readonly role: PlayerRole | null;
    readonly isAlive: boolean;
    readonly statusHistory: readonly StatusRecord[];
}

export interface GameSnapshot {
    readonly version: 1;
    readonly phase: GamePhase;
    readonly round: number;
    readonly gameActive: boolean;
    readonly regulation: Regulation | null;
    readonly players: readonly PlayerSnapshot[];
    readonly actions: readonly GameAction[];
    readonly takenAt: string;
}

export enum GameEventType {
    PLAYER_ADDED = 'PLAYER_ADDED',
    PLAYER_REMOVED = 'PLAYER_REMOVED',
    REGULATION_UPDATED = 'REGULATION_UPDATED',
    REGULATION_SAVED = 'REGULATION_SAVED',
    ROLES_ASSIGNED = 'ROLES_ASSIGNED',
    GAME_STARTED = 'GAME_STARTED',
    ACTION_RECORDED = 'ACTION_RECORDED',
    PHASE_CHANGED = 'PHASE_CHANGED',
    ROUND_CHANGED = 'ROUND_CHANGED',
    PLAYER_DIED = 'PLAYER_DIED',
    PLAYER_RESURRECTED = 'PLAYER_RESURRECTED',
    GAME_ENDED = 'GAME_ENDED',
    GAME_STATE_RESET = 'GAME_STATE_RESET',
    GAME_STATE_RESTORED = 'GAME_STATE_RESTORED',
    ERROR = 'ERROR',
}

/**
 * Payload carried by each event type.
 */
export interface GameEventPayloads {
    [GameEventType.PLAYER_ADDED]: { playerName: string; number: number };
    [GameEventType.PLAYER_REMOVED]: { playerName: string; number: number };
    [GameEventType.REGULATION_UPDATED]: { regulation: Regulation; totalPlayers: number };
    [GameEventType.REGULATION_SAVED]: { name: string; totalPlayers: number };
    [GameEventType.ROLES_ASSIGNED]: { assignments: { playerName: string; role: PlayerRole }[] };
    [GameEventType.GAME_STARTED]: { round: number; phase: GamePhase; playerCount: number; discussionTime: number };
    [GameEventType.ACTION_RECORDED]: { action: GameAction };
    [GameEventType.PHASE_CHANGED]: { fromPhase: GamePhase; toPhase: GamePhase; round: number };
    [GameEventType.ROUND_CHANGED]: { round: number; phase: GamePhase; discussionTime: number };
    [GameEventType.PLAYER_DIED]: {
        playerName: string;
        number: number;
        role: PlayerRole | null;
        team: Team | null;
        phase: GamePhase;
        round: number;
        cause: DeathCause;
    };
    [GameEventType.PLAYER_RESURRECTED]: { playerName: string; number: number; round: number };
    [GameEventType.GAME_ENDED]: {
        outcome: GameOutcome;
        winningTeam: Team | null;
        finalRound: number;
        teamCounts: TeamCounts;
    };
    [GameEventType.GAME_STATE_RESET]: { playerCount: number };
    [GameEventType.GAME_STATE_RESTORED]: { phase: GamePhase; round: number; gameActive: boolean };
    [GameEventType.ERROR]: {
        errorName: string;
        errorMessage: string;
        originalEventType: GameEventType;
        subscriptionId: number;
    };
}

export interface GameEvent<K extends GameEventType = GameEventType> {
    readonly id: string;
    readonly type: K;
    readonly data: GameEventPayloads[K];
    readonly source: string;
    readonly timestamp: string;
}

/** Union of every concrete event; `switch (event.type)` narrows `event.data`. */
export type AnyGameEvent = { [K in GameEventType]: GameEvent<K> }[GameEventType];

/** The concrete event for one type, e.g. `GameEventOf<GameEventType.PLAYER_DIED>`. */
export type GameEventOf<K extends GameEventType> = Extract<AnyGameEvent, { type: K }>;

export type GameEventListener = (event: AnyGameEvent) => void;
