import { Role } from './Role';
import { PlayerRole, Team } from '../types/GameTypes';

export class Guard extends Role {
    id = PlayerRole.GUARD;
    displayName = 'Guard';
    description = 'Each night, protects one player from the werewolf attack.';
    team = Team.VILLAGE;
    hasNightAction = true;
}
