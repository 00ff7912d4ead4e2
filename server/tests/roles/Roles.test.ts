import { ALL_ROLES, getRole, isPlayerRole, teamOf } from '../../roles';
import { Madman } from '../../roles/Madman';
import { Seer } from '../../roles/Seer';
import { Werewolf } from '../../roles/Werewolf';
import { PlayerRole, Team } from '../../types/GameTypes';

describe('Roles', () => {

    describe('registry', () => {
        it('should hold one role per PlayerRole, with matching ids', () => {
            expect([...ALL_ROLES].sort()).toEqual(Object.values(PlayerRole).sort());
            for (const id of ALL_ROLES) {
                expect(getRole(id).id).toBe(id);
            }
        });

        it('should put only werewolves and the Madman on the werewolf team', () => {
            const werewolfTeam = ALL_ROLES.filter(role => teamOf(role) === Team.WEREWOLF);
            expect(werewolfTeam).toEqual([PlayerRole.WEREWOLF, PlayerRole.MADMAN]);
        });

        it('should give every role a display name and a GM description', () => {
            expect(getRole(PlayerRole.MEDIUM).displayName).toBe('Medium');
            for (const id of ALL_ROLES) {
                expect(getRole(id).description.length).toBeGreaterThan(0);
            }
        });

        it('should recognise role ids', () => {
            expect(isPlayerRole('SEER')).toBe(true);
            expect(isPlayerRole('WITCH')).toBe(false);
            expect(isPlayerRole('toString')).toBe(false);
        });
    });

    describe('night actions', () => {
        it('should wake werewolves, seer, medium and guard', () => {
            const actors = ALL_ROLES.filter(role => getRole(role).hasNightAction);
            expect(actors).toEqual([PlayerRole.WEREWOLF, PlayerRole.SEER, PlayerRole.MEDIUM, PlayerRole.GUARD]);
        });

        it('should not wake villagers or the Madman', () => {
            expect(getRole(PlayerRole.VILLAGER).hasNightAction).toBe(false);
            expect(getRole(PlayerRole.MADMAN).hasNightAction).toBe(false);
        });
    });

    describe('seer inspection', () => {
        it('should show a werewolf as werewolf', () => {
            expect(new Werewolf().seenAs).toBe(Team.WEREWOLF);
        });

        it('should show the Madman as village even though it plays for the werewolves', () => {
            const madman = new Madman();
            expect(madman.team).toBe(Team.WEREWOLF);
            expect(madman.seenAs).toBe(Team.VILLAGE);
        });

        it('should show village roles as village', () => {
            expect(new Seer().seenAs).toBe(Team.VILLAGE);
            expect(getRole(PlayerRole.GUARD).seenAs).toBe(Team.VILLAGE);
        });
    });
});
