import { Role } from './Role';
import { PlayerRole, Team } from '../types/GameTypes';

export class Villager extends Role {
    id = PlayerRole.VILLAGER;
    displayName = 'Villager';
    description = 'No special ability. Finds the werewolves through discussion and the day vote.';
    team = Team.VILLAGE;
}
