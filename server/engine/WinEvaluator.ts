import { GameOutcome, Team, TeamCounts } from '../types/GameTypes';

export class WinEvaluator {
    /**
     * Decides whether the game is over from the alive count of each team.
     * - Both teams wiped out by the same action: DRAW.
     * - No werewolf-team player left: VILLAGE wins.
     * - No village-team player left: WEREWOLF wins.
     * Returns null while both teams still have someone alive.
     */
    public evaluate(counts: TeamCounts): GameOutcome | null {
        const village = counts[Team.VILLAGE];
        const werewolves = counts[Team.WEREWOLF];

        if (village === 0 && werewolves === 0) {
            return 'DRAW';
        }

        if (werewolves === 0) {
            return Team.VILLAGE;
        }

        if (village === 0) {
            return Team.WEREWOLF;
        }

        return null;
    }

    public winningTeam(outcome: GameOutcome): Team | null {
        return outcome === 'DRAW' ? null : outcome;
    }
}
