import { Role } from './Role';
import { PlayerRole, Team } from '../types/GameTypes';

export class Medium extends Role {
    id = PlayerRole.MEDIUM;
    displayName = 'Medium';
    description = 'Learns whether the player executed during the day was a werewolf.';
    team = Team.VILLAGE;
    hasNightAction = true;
}
