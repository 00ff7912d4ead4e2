import { Role } from './Role';
import { PlayerRole, Team } from '../types/GameTypes';

export class Werewolf extends Role {
    id = PlayerRole.WEREWOLF;
    displayName = 'Werewolf';
    description = 'Each night the pack wakes up and picks one player to attack.';
    team = Team.WEREWOLF;
    hasNightAction = true;
}
