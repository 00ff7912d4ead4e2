import { z } from 'zod';
import { GamePhase, GameSnapshot, PlayerRole, Team, TeamCounts } from '../types/GameTypes';
import { ConfigurationError } from '../types/errors';
import { regulationSchema } from '../config/regulation';
import { teamOf } from '../roles';
import { WinEvaluator } from './WinEvaluator';

const statusRecordSchema = z.object({
    round: z.number().int().nonnegative(),
    phase: z.nativeEnum(GamePhase),
    status: z.enum(['ALIVE', 'DEAD']),
    role: z.nativeEnum(PlayerRole).nullable(),
    reason: z.string(),
    timestamp: z.string(),
});

const playerSnapshotSchema = z.object({
    number: z.number().int().positive(),
    name: z.string().min(1),
    role: z.nativeEnum(PlayerRole).nullable(),
    isAlive: z.boolean(),
    statusHistory: z.array(statusRecordSchema),
});

const actionSchema = z.object({
    round: z.number().int().nonnegative(),
    phase: z.nativeEnum(GamePhase),
    type: z.enum(['execution', 'attack', 'guard', 'inspect']),
    target: z.string().nullable(),
    timestamp: z.string(),
});

export const snapshotSchema = z.object({
    version: z.literal(1),
    phase: z.nativeEnum(GamePhase),
    round: z.number().int().nonnegative(),
    gameActive: z.boolean(),
    regulation: regulationSchema.nullable(),
    players: z.array(playerSnapshotSchema),
    actions: z.array(actionSchema).default([]),
    takenAt: z.string(),
});

/**
 * Validates untrusted snapshot data (e.g. read back from disk) and checks that it
 * describes a reachable game state: an active game still has both teams alive.
 * Throws ConfigurationError otherwise. Snapshots without `actions` load with an empty list.
 */
export function parseSnapshot(input: unknown): GameSnapshot {
    const result = snapshotSchema.safeParse(input);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new ConfigurationError('INVALID_SNAPSHOT', `Invalid snapshot at ${issue.path.join('.') || 'root'}: ${issue.message}`);
    }

    const snapshot = result.data;
    const inconsistent = (message: string) => new ConfigurationError('INCONSISTENT_SNAPSHOT', message);

    if ((snapshot.phase === GamePhase.SETUP) !== (snapshot.round === 0)) {
        throw inconsistent(`Round ${snapshot.round} does not match phase ${snapshot.phase}`);
    }
    if (snapshot.gameActive && snapshot.phase === GamePhase.SETUP) {
        throw inconsistent('An active game cannot be in SETUP');
    }

    const names = new Set(snapshot.players.map(p => p.name));
    if (names.size !== snapshot.players.length) {
        throw inconsistent('Player names must be unique');
    }
    const numbers = new Set(snapshot.players.map(p => p.number));
    if (numbers.size !== snapshot.players.length) {
        throw inconsistent('Player numbers must be unique');
    }

    if (snapshot.phase !== GamePhase.SETUP) {
        const unassigned = snapshot.players.find(p => p.role === null);
        if (unassigned) {
            throw inconsistent(`Player ${unassigned.name} has no role in a started game`);
        }
    } else {
        const dead = snapshot.players.find(p => !p.isAlive);
        if (dead) {
            throw inconsistent(`Player ${dead.name} cannot be dead before the game starts`);
        }
    }

    if (snapshot.gameActive) {
        const counts: TeamCounts = { [Team.VILLAGE]: 0, [Team.WEREWOLF]: 0 };
        for (const player of snapshot.players) {
            if (player.isAlive && player.role) counts[teamOf(player.role)]++;
        }
        const outcome = new WinEvaluator().evaluate(counts);
        if (outcome) {
            throw inconsistent(`An active game cannot already be decided (${outcome})`);
        }
    }

    return snapshot;
}
