import { PlayerRole, Team } from '../types/GameTypes';

export abstract class Role {
    abstract id: PlayerRole;
    abstract displayName: string;
    abstract description: string; // one-line guide shown to the GM
    abstract team: Team;

    /**
     * Whether the GM has to wake this role during the night.
     */
    hasNightAction: boolean = false;

    /**
     * Team the Seer sees when inspecting this role.
     * Defaults to the real team; the Madman overrides it.
     */
    get seenAs(): Team {
        return this.team;
    }
}
