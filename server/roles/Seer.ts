import { Role } from './Role';
import { PlayerRole, Team } from '../types/GameTypes';

export class Seer extends Role {
    id = PlayerRole.SEER;
    displayName = 'Seer';
    description = 'Each night, inspects one player and learns whether they are a werewolf.';
    team = Team.VILLAGE;
    hasNightAction = true;
}
