import { z } from 'zod';
import { PlayerRole, Regulation } from '../types/GameTypes';
import { ConfigurationError } from '../types/errors';
import { ALL_ROLES } from '../roles';
import { GAME_CONFIG } from './game.config';

// Counts are checked for sign when the game starts (assertRegulationFits), not on parse.
const roleCount = z.number().int();

export const regulationSchema = z
    .object({
        roles: z.object({
            [PlayerRole.VILLAGER]: roleCount.optional(),
            [PlayerRole.WEREWOLF]: roleCount.optional(),
            [PlayerRole.GUARD]: roleCount.optional(),
            [PlayerRole.SEER]: roleCount.optional(),
            [PlayerRole.MEDIUM]: roleCount.optional(),
            [PlayerRole.MADMAN]: roleCount.optional(),
        }).strict(),
        minPlayers: z.number().int().positive().optional(),
        maxPlayers: z.number().int().positive().optional(),
        roundTimes: z.array(z.number().int().min(1).max(60)).optional(),
    })
    .strict();

export function roleCountOf(regulation: Regulation, role: PlayerRole): number {
    return regulation.roles[role] ?? 0;
}

export function totalPlayers(regulation: Regulation): number {
    return ALL_ROLES.reduce((sum, role) => sum + roleCountOf(regulation, role), 0);
}

export function playerBounds(regulation: Regulation): { min: number; max: number } {
    return {
        min: regulation.minPlayers ?? GAME_CONFIG.players.min,
        max: regulation.maxPlayers ?? GAME_CONFIG.players.max,
    };
}

/**
 * Parses untrusted input into a frozen Regulation.
 * Throws ConfigurationError on unknown roles, non-integer counts, inverted bounds
 * or round times outside 1-60 minutes.
 */
export function parseRegulation(input: unknown): Readonly<Regulation> {
    const result = regulationSchema.safeParse(input);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue.path.length > 0 ? issue.path.join('.') : 'regulation';
        throw new ConfigurationError('INVALID_REGULATION', `Invalid regulation at ${where}: ${issue.message}`);
    }

    const regulation: Regulation = { roles: { ...result.data.roles } };
    if (result.data.minPlayers !== undefined) regulation.minPlayers = result.data.minPlayers;
    if (result.data.maxPlayers !== undefined) regulation.maxPlayers = result.data.maxPlayers;
    if (result.data.roundTimes !== undefined) regulation.roundTimes = [...result.data.roundTimes];

    const bounds = playerBounds(regulation);
    if (bounds.min > bounds.max) {
        throw new ConfigurationError('INVALID_BOUNDS', `minPlayers (${bounds.min}) is greater than maxPlayers (${bounds.max})`);
    }

    Object.freeze(regulation.roles);
    if (regulation.roundTimes) Object.freeze(regulation.roundTimes);
    return Object.freeze(regulation);
}

/**
 * Checks that the regulation can start a game with `playerCount` players.
 */
export function assertRegulationFits(regulation: Regulation, playerCount: number): void {
    for (const role of ALL_ROLES) {
        const count = roleCountOf(regulation, role);
        if (count < 0) {
            throw new ConfigurationError('NEGATIVE_ROLE_COUNT', `Role count for ${role} must not be negative (got ${count})`);
        }
    }

    const { min, max } = playerBounds(regulation);
    if (playerCount < min || playerCount > max) {
        throw new ConfigurationError(
            'PLAYER_COUNT_OUT_OF_BOUNDS',
            `Player count ${playerCount} is outside the allowed range ${min}-${max}`
        );
    }

    const required = totalPlayers(regulation);
    if (required !== playerCount) {
        throw new ConfigurationError(
            'PLAYER_COUNT_MISMATCH',
            `Regulation requires ${required} players but ${playerCount} are registered`
        );
    }
}

/**
 * Expands the regulation into one role token per seat, in canonical role order.
 */
export function buildRolePool(regulation: Regulation): PlayerRole[] {
    const pool: PlayerRole[] = [];
    for (const role of ALL_ROLES) {
        for (let i = 0; i < roleCountOf(regulation, role); i++) {
            pool.push(role);
        }
    }
    return pool;
}

export function defaultRegulationFor(playerCount: number): Readonly<Regulation> | null {
    const regulations: Record<number, Regulation> = GAME_CONFIG.defaultRegulations;
    const regulation = regulations[playerCount];
    return regulation ? parseRegulation(regulation) : null;
}

/**
 * Discussion minutes for `round`. Rounds past the configured list reuse its last entry;
 * without round times the global default applies. Round 0 (setup) reads as round 1.
 */
export function roundTimeFor(regulation: Regulation | null, round: number): number {
    const times = regulation?.roundTimes ?? [];
    if (times.length === 0) return GAME_CONFIG.defaultDiscussionTime;
    const index = Math.min(Math.max(round, 1), times.length) - 1;
    return times[index];
}
