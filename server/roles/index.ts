import { PlayerRole, Team } from '../types/GameTypes';
import { Role } from './Role';
import { Villager } from './Villager';
import { Werewolf } from './Werewolf';
import { Guard } from './Guard';
import { Seer } from './Seer';
import { Medium } from './Medium';
import { Madman } from './Madman';

// Keyed by every PlayerRole: adding a role without a class fails to compile.
const ROLE_REGISTRY: Record<PlayerRole, Role> = {
    [PlayerRole.VILLAGER]: new Villager(),
    [PlayerRole.WEREWOLF]: new Werewolf(),
    [PlayerRole.GUARD]: new Guard(),
    [PlayerRole.SEER]: new Seer(),
    [PlayerRole.MEDIUM]: new Medium(),
    [PlayerRole.MADMAN]: new Madman(),
};

/** Canonical role order, used when building the role pool and in logs. */
export const ALL_ROLES: readonly PlayerRole[] = [
    PlayerRole.WEREWOLF,
    PlayerRole.MADMAN,
    PlayerRole.SEER,
    PlayerRole.MEDIUM,
    PlayerRole.GUARD,
    PlayerRole.VILLAGER,
];

export function getRole(role: PlayerRole): Role {
    return ROLE_REGISTRY[role];
}

export function teamOf(role: PlayerRole): Team {
    return ROLE_REGISTRY[role].team;
}

export function isPlayerRole(value: string): value is PlayerRole {
    return Object.prototype.hasOwnProperty.call(ROLE_REGISTRY, value);
}

export { Role };
