import {
    AnyGameEvent,
    DeathCause,
    GameAction,
    GameActionType,
    GameEventType,
    GamePhase,
    GameSnapshot,
    PlayerRole,
    Regulation,
    StatusContext,
    Team,
    TeamCounts,
} from '../types/GameTypes';
import { ConfigurationError, InvalidStateError, InvalidTransitionError, NotFoundError } from '../types/errors';
import { assertRegulationFits, buildRolePool, parseRegulation, roundTimeFor, totalPlayers } from '../config/regulation';
import { GAME_CONFIG } from '../config/game.config';
import { getRole } from '../roles';
import { SnapshotStore } from '../store/SnapshotStore';
import { createLogger, Logger } from '../utils/logger';
import { RandomFn, defaultRandom, shuffle } from '../utils/random';
import { deepFreeze } from '../utils/freeze';
import { EventBus, createGameEvent } from './EventBus';
import { Player, ReadonlyPlayer } from './Player';
import { crossesRoundBoundary, isLegalTransition, nextPhase } from './PhaseMachine';
import { parseSnapshot } from './Snapshot';
import { WinEvaluator } from './WinEvaluator';

export interface GameStateOptions {
    regulation?: Regulation;
    /** RNG used to deal roles; inject a seeded one in tests. */
    random?: RandomFn;
    logger?: Logger;
    evaluator?: WinEvaluator;
}

/** Targets the GM enters at night. `null` means the role chose nobody. */
export interface NightActions {
    attack: string | null;
    guard: string | null;
    /** Seer's target; leave out when there is no Seer. */
    inspect?: string | null;
}

export interface NightResult {
    /** Name of the attacked player who died, null when nobody did. */
    victim: string | null;
    /** True when the attack hit the guarded player and was blocked. */
    guarded: boolean;
    inspection: { playerName: string; team: Team } | null;
}

const SOURCE = 'game_state';

const PHASES_PER_ROUND = 3;

const DEATH_REASON: Record<DeathCause, string> = {
    execution: 'executed',
    werewolf_attack: 'attacked',
    gm: 'killed',
};

/**
 * Authoritative state of one game, driven by the GM.
 *
 * Flow: SETUP → (startGame) → DAY_DISCUSSION → DAY_VOTE → NIGHT → DAY_DISCUSSION ...
 * The round goes up when night ends. The game stops for good once a team has nobody alive;
 * only `reset()` or `restore()` brings it back to a playable state.
 *
 * Every meaningful change is published on the injected EventBus.
 */
export class GameState {
    private _players: Player[] = [];
    private _phase: GamePhase = GamePhase.SETUP;
    private _round: number = 0;
    private _regulation: Readonly<Regulation> | null = null;
    private _gameActive: boolean = false;
    private _actions: GameAction[] = [];

    private readonly random: RandomFn;
    private readonly logger: Logger;
    private readonly evaluator: WinEvaluator;

    constructor(private readonly bus: EventBus, options: GameStateOptions = {}) {
        this.random = options.random ?? defaultRandom;
        this.logger = options.logger ?? createLogger('GameState');
        this.evaluator = options.evaluator ?? new WinEvaluator();
        if (options.regulation) {
            this._regulation = parseRegulation(options.regulation);
        }
    }

    public get players(): readonly ReadonlyPlayer[] {
        return this._players.map(p => p.view);
    }

    public get currentPhase(): GamePhase {
        return this._phase;
    }

    public get currentRound(): number {
        return this._round;
    }

    public get regulation(): Readonly<Regulation> | null {
        return this._regulation;
    }

    public get gameActive(): boolean {
        return this._gameActive;
    }

    public get eventBus(): EventBus {
        return this.bus;
    }

    // ---- Roster & regulation (setup only) ----

    /**
     * Registers a player. The seat number defaults to one more than the highest taken.
     */
    public addPlayer(name: string, number?: number): ReadonlyPlayer {
        this.ensureSetup('add players');

        const trimmed = name.trim();
        if (trimmed.length === 0) {
            throw new ConfigurationError('INVALID_PLAYER_NAME', 'Player name must not be empty');
        }
        if (this.findPlayer(trimmed)) {
            throw new InvalidStateError('DUPLICATE_PLAYER_NAME', `Player ${trimmed} already exists`);
        }

        const maxPlayers = this._regulation?.maxPlayers ?? GAME_CONFIG.players.max;
        if (this._players.length >= maxPlayers) {
            throw new ConfigurationError('ROSTER_FULL', `Roster is full (${maxPlayers} players)`);
        }

        let seat: number;
        if (number === undefined) {
            seat = this._players.reduce((max, p) => Math.max(max, p.number), 0) + 1;
        } else {
            if (!Number.isInteger(number) || number < 1) {
                throw new ConfigurationError('INVALID_PLAYER_NUMBER', `Player number must be a positive integer (got ${number})`);
            }
            if (this._players.some(p => p.number === number)) {
                throw new InvalidStateError('DUPLICATE_PLAYER_NUMBER', `Seat ${number} is already taken`);
            }
            seat = number;
        }

        const player = new Player(seat, trimmed);
        this._players.push(player);
        this.publish(createGameEvent(GameEventType.PLAYER_ADDED, { playerName: player.name, number: player.number }, SOURCE));
        this.logger.info(`Added player #${player.number} ${player.name}`);
        return player.view;
    }

    public removePlayer(name: string): void {
        this.ensureSetup('remove players');
        const player = this.mustFind(name);

        this._players = this._players.filter(p => p !== player);
        this.publish(createGameEvent(GameEventType.PLAYER_REMOVED, { playerName: player.name, number: player.number }, SOURCE));
        this.logger.info(`Removed player ${player.name}`);
    }

    public setRegulation(regulation: Regulation): void {
        this.ensureSetup('change the regulation');
        const parsed = parseRegulation(regulation);
        this._regulation = parsed;
        this.publish(createGameEvent(GameEventType.REGULATION_UPDATED, {
            regulation: parsed,
            totalPlayers: totalPlayers(parsed),
        }, SOURCE));
        this.logger.info(`Regulation set for ${totalPlayers(parsed)} players`);
    }

    // ---- Start ----

    /**
     * Deals the roles and opens round 1 with the day discussion.
     * Every check runs before the first mutation; a failed start leaves the game in SETUP.
     */
    public startGame(): void {
        if (this._gameActive) {
            throw new InvalidStateError('GAME_ALREADY_ACTIVE', 'The game has already started');
        }
        if (this._phase !== GamePhase.SETUP) {
            throw new InvalidStateError('GAME_FINISHED', 'The game is over; reset it before starting a new one');
        }
        const regulation = this._regulation;
        if (!regulation) {
            throw new ConfigurationError('NO_REGULATION', 'Cannot start: no regulation set');
        }
        assertRegulationFits(regulation, this._players.length);

        const blocked = this._players.find(p => !p.isAlive || p.roleLocked);
        if (blocked) {
            throw new InvalidStateError('PLAYER_NOT_READY', `Cannot start: ${blocked.name} cannot receive a role`);
        }

        const roles = shuffle(buildRolePool(regulation), this.random);
        this._players.forEach((player, index) => {
            player.assignRole(roles[index]);
            player.lockRole();
        });

        this._gameActive = true;
        this._round = 1;
        this._phase = GamePhase.DAY_DISCUSSION;

        this.publish(createGameEvent(GameEventType.ROLES_ASSIGNED, {
            assignments: this._players.map((p, index) => ({ playerName: p.name, role: roles[index] })),
        }, SOURCE));
        this.publish(createGameEvent(GameEventType.GAME_STARTED, {
            round: this._round,
            phase: this._phase,
            playerCount: this._players.length,
            discussionTime: this.getRoundTime(),
        }, SOURCE));
        this.publish(createGameEvent(GameEventType.PHASE_CHANGED, {
            fromPhase: GamePhase.SETUP,
            toPhase: this._phase,
            round: this._round,
        }, SOURCE));
        this.logger.info(`Game started with ${this._players.length} players`);
    }

    // ---- Phase & round ----

    /**
     * Moves to `newPhase`, which must be the successor of the current phase.
     * Returns false (and logs a warning) when the game has already ended.
     */
    public changePhase(newPhase: GamePhase): boolean {
        if (!this.ensureRunning(`change phase to ${newPhase}`)) return false;

        const from = this._phase;
        if (!isLegalTransition(from, newPhase)) {
            throw new InvalidTransitionError(
                'ILLEGAL_TRANSITION',
                `Cannot move from ${from} to ${newPhase}; the next phase is ${nextPhase(from)}`
            );
        }

        const newRound = crossesRoundBoundary(from, newPhase);
        this._phase = newPhase;
        if (newRound) this._round++;

        this.publish(createGameEvent(GameEventType.PHASE_CHANGED, {
            fromPhase: from,
            toPhase: newPhase,
            round: this._round,
        }, SOURCE));
        if (newRound) {
            this.publish(createGameEvent(GameEventType.ROUND_CHANGED, {
                round: this._round,
                phase: this._phase,
                discussionTime: this.getRoundTime(),
            }, SOURCE));
        }

        this.logger.info(`Phase → ${newPhase} (round ${this._round})`);
        return true;
    }

    /** Moves to whatever phase comes next. */
    public advancePhase(): boolean {
        if (!this.ensureRunning('advance the phase')) return false;
        return this.changePhase(nextPhase(this._phase));
    }

    /**
     * Walks the phases until the day discussion of the next round, one cycle at most.
     * Returns false when the game ends on the way, e.g. a listener kills the last werewolf.
     */
    public nextRound(): boolean {
        if (!this.ensureRunning('advance the round')) return false;

        const target = this._round + 1;
        for (let step = 0; step < PHASES_PER_ROUND && this._round < target; step++) {
            if (!this._gameActive || !this.changePhase(nextPhase(this._phase))) return false;
        }
        return this._gameActive && this._round === target;
    }

    // ---- Deaths ----

    /**
     * Kills one player and checks whether that ended the game.
     * Killing a dead player is a no-op that still returns true.
     * Returns false (with a warning) once the game has ended.
     */
    public killPlayer(name: string, cause: DeathCause = 'gm'): boolean {
        const player = this.mustFind(name);
        if (!this.ensureRunning(`kill ${player.name}`)) return false;

        if (!player.isAlive) {
            this.logger.debug(`Player ${player.name} is already dead`);
            return true;
        }

        this.markDead(player, cause);
        this.checkGameEndCondition();
        return true;
    }

    /**
     * Kills several players as one action (e.g. execution plus a linked death) and checks
     * the end condition once, after all of them. This is the only way to reach a DRAW.
     * Returns the names of the players that actually died.
     */
    public killPlayers(names: readonly string[], cause: DeathCause = 'gm'): string[] {
        const targets = names.map(name => this.mustFind(name));
        if (!this.ensureRunning('kill players')) return [];

        const died: string[] = [];
        for (const player of new Set(targets)) {
            if (!player.isAlive) continue;
            this.markDead(player, cause);
            died.push(player.name);
        }

        if (died.length > 0) {
            this.checkGameEndCondition();
        }
        return died;
    }

    /** Test scaffolding: brings a dead player back while the game is running. */
    public resurrectPlayer(name: string): boolean {
        const player = this.mustFind(name);
        if (!this.ensureRunning(`resurrect ${player.name}`)) return false;

        if (!player.resurrect(this.statusContext())) return false;
        this.publish(createGameEvent(GameEventType.PLAYER_RESURRECTED, {
            playerName: player.name,
            number: player.number,
            round: this._round,
        }, SOURCE));
        return true;
    }

    // ---- Day vote & night ----

    /**
     * Applies the day vote: records the execution, kills the target (null: nobody) and
     * moves on to NIGHT unless the execution ended the game.
     */
    public executePlayer(name: string | null): boolean {
        const target = name === null ? null : this.mustFind(name);
        if (!this.ensureRunning('execute a player')) return false;
        this.ensurePhase(GamePhase.DAY_VOTE, 'execute a player');
        if (target) this.ensureAlive(target);

        this.recordAction('execution', target);
        if (target) {
            this.markDead(target, 'execution');
            this.checkGameEndCondition();
        }

        if (this._gameActive) this.changePhase(GamePhase.NIGHT);
        return true;
    }

    /**
     * Resolves the night: records every action, gives the Seer result, kills the attack
     * target unless the Guard protected that same player, then starts the next round
     * while the game lasts. Every target is checked before anything changes.
     * Returns null (with a warning) once the game has ended.
     */
    public resolveNight(actions: NightActions): NightResult | null {
        const attack = actions.attack === null ? null : this.mustFind(actions.attack);
        const guard = actions.guard === null ? null : this.mustFind(actions.guard);
        const inspect = actions.inspect === undefined || actions.inspect === null ? null : this.mustFind(actions.inspect);
        if (!this.ensureRunning('resolve the night')) return null;
        this.ensurePhase(GamePhase.NIGHT, 'resolve the night');
        for (const target of [attack, guard, inspect]) {
            if (target) this.ensureAlive(target);
        }

        this.recordAction('attack', attack);
        this.recordAction('guard', guard);
        if (actions.inspect !== undefined) this.recordAction('inspect', inspect);

        const inspection = inspect ? { playerName: inspect.name, team: this.getSeerResult(inspect.name) } : null;
        const guarded = attack !== null && attack === guard;
        const victim = attack !== null && !guarded ? attack : null;

        if (victim) {
            this.markDead(victim, 'werewolf_attack');
            this.checkGameEndCondition();
        } else {
            this.logger.info(guarded ? `Attack on ${guard?.name} was blocked` : 'Nobody was attacked');
        }

        if (this._gameActive) this.nextRound();
        return { victim: victim ? victim.name : null, guarded, inspection };
    }

    // ---- Queries ----

    public getPlayer(name: string): ReadonlyPlayer | undefined {
        return this.findPlayer(name)?.view;
    }

    public requirePlayer(name: string): ReadonlyPlayer {
        return this.mustFind(name).view;
    }

    public getAlivePlayers(): ReadonlyPlayer[] {
        return this.aliveSeats().map(p => p.view);
    }

    public getAlivePlayerNames(): string[] {
        return this.getAlivePlayers().map(p => p.name).sort();
    }

    /** Alive players per team. Players without a role are not counted. */
    public getTeamCounts(): TeamCounts {
        const counts: TeamCounts = { [Team.VILLAGE]: 0, [Team.WEREWOLF]: 0 };
        for (const player of this._players) {
            if (player.isAlive && player.team) {
                counts[player.team]++;
            }
        }
        return counts;
    }

    /** How many players hold each role, dead or alive. */
    public getRoleCounts(): Record<PlayerRole, number> {
        const counts: Record<PlayerRole, number> = {
            [PlayerRole.VILLAGER]: 0,
            [PlayerRole.WEREWOLF]: 0,
            [PlayerRole.GUARD]: 0,
            [PlayerRole.SEER]: 0,
            [PlayerRole.MEDIUM]: 0,
            [PlayerRole.MADMAN]: 0,
        };
        for (const player of this._players) {
            if (player.role) counts[player.role]++;
        }
        return counts;
    }

    /** Alive players the GM has to wake up at night, in seat order. */
    public getNightActors(): ReadonlyPlayer[] {
        return this.aliveSeats()
            .filter(p => p.role !== null && getRole(p.role).hasNightAction)
            .sort((a, b) => a.number - b.number)
            .map(p => p.view);
    }

    /** Team the Seer is told for `name`. A Madman shows as village. */
    public getSeerResult(name: string): Team {
        const player = this.mustFind(name);
        if (!player.role) {
            throw new InvalidStateError('ROLE_NOT_ASSIGNED', `${player.name} has no role yet`);
        }
        return getRole(player.role).seenAs;
    }

    /** Discussion minutes for `round` (default: the current round). */
    public getRoundTime(round: number = this._round): number {
        return roundTimeFor(this._regulation, round);
    }

    /** Actions entered by the GM, oldest first; pass a round to get only that round. */
    public getActionHistory(round?: number): readonly GameAction[] {
        return round === undefined ? [...this._actions] : this._actions.filter(a => a.round === round);
    }

    // ---- Lifecycle ----

    /**
     * Ends any running game and goes back to SETUP with the same roster and regulation.
     */
    public reset(): void {
        this._gameActive = false;
        this._phase = GamePhase.SETUP;
        this._round = 0;
        this._actions = [];
        for (const player of this._players) {
            player.resetForNewGame();
        }

        this.publish(createGameEvent(GameEventType.GAME_STATE_RESET, { playerCount: this._players.length }, SOURCE));
        this.logger.info('Game state reset');
    }

    /**
     * Deep, frozen copy of the current state. Later changes to the game do not affect it.
     */
    public save(): GameSnapshot {
        const regulation = this._regulation;
        return deepFreeze({
            version: 1 as const,
            phase: this._phase,
            round: this._round,
            gameActive: this._gameActive,
            regulation: regulation ? { ...regulation, roles: { ...regulation.roles } } : null,
            players: this._players.map(p => p.toSnapshot()),
            actions: this._actions.map(a => ({ ...a })),
            takenAt: new Date().toISOString(),
        });
    }

    /**
     * Replaces the whole state with the snapshot. The snapshot is validated and every
     * new value built before any field is assigned, so a rejected snapshot changes nothing.
     */
    public restore(input: GameSnapshot): void {
        const snapshot = parseSnapshot(input);
        const regulation = snapshot.regulation ? parseRegulation(snapshot.regulation) : null;
        const started = snapshot.phase !== GamePhase.SETUP;
        const players = snapshot.players.map(p => Player.fromSnapshot(p, started));
        const actions = snapshot.actions.map(a => Object.freeze({ ...a }));

        this._players = players;
        this._phase = snapshot.phase;
        this._round = snapshot.round;
        this._regulation = regulation;
        this._gameActive = snapshot.gameActive;
        this._actions = actions;

        this.publish(createGameEvent(GameEventType.GAME_STATE_RESTORED, {
            phase: this._phase,
            round: this._round,
            gameActive: this._gameActive,
        }, SOURCE));
        this.logger.info(`State restored: round ${this._round}, ${this._phase}, ${players.length} players`);
    }

    public saveTo(store: SnapshotStore): GameSnapshot {
        const snapshot = this.save();
        store.save(snapshot);
        return snapshot;
    }

    public restoreFrom(store: SnapshotStore): void {
        this.restore(store.load());
    }

    // ---- Internals ----

    private publish(event: AnyGameEvent): void {
        this.bus.publish(event);
    }

    private aliveSeats(): Player[] {
        return this._players.filter(p => p.isAlive);
    }

    private findPlayer(name: string): Player | undefined {
        return this._players.find(p => p.name === name.trim());
    }

    private mustFind(name: string): Player {
        const player = this.findPlayer(name);
        if (!player) {
            throw new NotFoundError('PLAYER_NOT_FOUND', `Player ${name} not found`);
        }
        return player;
    }

    private statusContext(): StatusContext {
        return { round: this._round, phase: this._phase };
    }

    private ensureSetup(action: string): void {
        if (this._phase !== GamePhase.SETUP) {
            throw new InvalidStateError('GAME_STARTED', `Cannot ${action} after the game has started`);
        }
    }

    /**
     * Guard for in-game operations. Before the start this is an error; after the end it is
     * a logged no-op, since callers may still be finishing the action that ended the game.
     */
    private ensureRunning(action: string): boolean {
        if (this._gameActive) return true;
        if (this._phase === GamePhase.SETUP) {
            throw new InvalidStateError('GAME_NOT_STARTED', `Cannot ${action}: the game has not started`);
        }
        this.logger.warn(`Cannot ${action}: game is not active`);
        return false;
    }

    private ensurePhase(phase: GamePhase, action: string): void {
        if (this._phase !== phase) {
            throw new InvalidStateError('WRONG_PHASE', `Cannot ${action} during ${this._phase}; wait for ${phase}`);
        }
    }

    private ensureAlive(player: Player): void {
        if (!player.isAlive) {
            throw new InvalidStateError('TARGET_DEAD', `${player.name} is already dead`);
        }
    }

    private recordAction(type: GameActionType, target: Player | null): void {
        const action: GameAction = Object.freeze({
            round: this._round,
            phase: this._phase,
            type,
            target: target ? target.name : null,
            timestamp: new Date().toISOString(),
        });
        this._actions.push(action);
        this.publish(createGameEvent(GameEventType.ACTION_RECORDED, { action }, SOURCE));
    }

    private markDead(player: Player, cause: DeathCause): void {
        player.kill(this.statusContext(), `${DEATH_REASON[cause]} during ${this._phase}`);
        this.publish(createGameEvent(GameEventType.PLAYER_DIED, {
            playerName: player.name,
            number: player.number,
            role: player.role,
            team: player.team,
            phase: this._phase,
            round: this._round,
            cause,
        }, SOURCE));
        this.logger.info(`Player ${player.name} died (${player.role ?? 'no role'})`);
    }

    private checkGameEndCondition(): void {
        const teamCounts = this.getTeamCounts();
        const outcome = this.evaluator.evaluate(teamCounts);
        if (!outcome) return;

        this._gameActive = false;
        this.publish(createGameEvent(GameEventType.GAME_ENDED, {
            outcome,
            winningTeam: this.evaluator.winningTeam(outcome),
            finalRound: this._round,
            teamCounts,
        }, SOURCE));
        this.logger.info(`Game over! ${outcome === 'DRAW' ? 'Draw' : `${outcome} wins`} in round ${this._round}`);
    }
}
