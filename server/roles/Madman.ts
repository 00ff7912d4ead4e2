import { Role } from './Role';
import { PlayerRole, Team } from '../types/GameTypes';

/**
 * Human on the werewolf side. Counts for the werewolf team but inspects as village.
 */
export class Madman extends Role {
    id = PlayerRole.MADMAN;
    displayName = 'Madman';
    description = 'A human who wins with the werewolves. Appears as a villager to the Seer.';
    team = Team.WEREWOLF;

    get seenAs(): Team {
        return Team.VILLAGE;
    }
}
