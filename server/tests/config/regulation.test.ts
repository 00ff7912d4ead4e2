import {
    assertRegulationFits,
    buildRolePool,
    defaultRegulationFor,
    parseRegulation,
    roundTimeFor,
    totalPlayers,
} from '../../config/regulation';
import { GAME_CONFIG } from '../../config/game.config';
import { PlayerRole } from '../../types/GameTypes';
import { ConfigurationError } from '../../types/errors';

describe('regulation', () => {

    describe('parseRegulation', () => {
        it('should return a frozen copy', () => {
            const input = { roles: { [PlayerRole.WEREWOLF]: 1, [PlayerRole.VILLAGER]: 3 } };

            const regulation = parseRegulation(input);

            expect(regulation).toEqual(input);
            expect(regulation).not.toBe(input);
            expect(Object.isFrozen(regulation)).toBe(true);
            expect(Object.isFrozen(regulation.roles)).toBe(true);
        });

        it('should reject unknown roles', () => {
            expect(() => parseRegulation({ roles: { WITCH: 1 } })).toThrow(ConfigurationError);
        });

        it('should reject fractional counts', () => {
            expect(() => parseRegulation({ roles: { [PlayerRole.VILLAGER]: 2.5 } }))
                .toThrow(expect.objectContaining({ code: 'INVALID_REGULATION' }));
        });

        it('should reject a minimum above the maximum', () => {
            expect(() => parseRegulation({ roles: {}, minPlayers: 8, maxPlayers: 5 }))
                .toThrow(expect.objectContaining({ code: 'INVALID_BOUNDS' }));
        });

        it('should accept negative counts and leave them to the start check', () => {
            expect(parseRegulation({ roles: { [PlayerRole.WEREWOLF]: -1 } }).roles[PlayerRole.WEREWOLF]).toBe(-1);
        });
    });

    describe('round times', () => {
        it('should keep round times as a frozen copy', () => {
            const input = { roles: { [PlayerRole.VILLAGER]: 3 }, roundTimes: [5, 3] };

            const regulation = parseRegulation(input);
            input.roundTimes.push(1);

            expect(regulation.roundTimes).toEqual([5, 3]);
            expect(Object.isFrozen(regulation.roundTimes)).toBe(true);
        });

        it('should reject minutes outside 1 to 60', () => {
            for (const minutes of [0, 61, 2.5]) {
                expect(() => parseRegulation({ roles: {}, roundTimes: [3, minutes] }))
                    .toThrow(expect.objectContaining({ code: 'INVALID_REGULATION' }));
            }
        });

        it('should pick the entry for the round and repeat the last one', () => {
            const regulation = parseRegulation({ roles: {}, roundTimes: [6, 4, 2] });

            expect(roundTimeFor(regulation, 1)).toBe(6);
            expect(roundTimeFor(regulation, 3)).toBe(2);
            expect(roundTimeFor(regulation, 7)).toBe(2);
            expect(roundTimeFor(regulation, 0)).toBe(6);
        });

        it('should fall back to the configured default', () => {
            expect(roundTimeFor(null, 2)).toBe(GAME_CONFIG.defaultDiscussionTime);
            expect(roundTimeFor(parseRegulation({ roles: {}, roundTimes: [] }), 1)).toBe(GAME_CONFIG.defaultDiscussionTime);
        });
    });

    describe('assertRegulationFits', () => {
        const regulation = { roles: { [PlayerRole.WEREWOLF]: 1, [PlayerRole.SEER]: 1, [PlayerRole.VILLAGER]: 2 } };

        it('should pass when the roles add up to the player count', () => {
            expect(() => assertRegulationFits(regulation, 4)).not.toThrow();
        });

        it('should reject a mismatched player count', () => {
            expect(() => assertRegulationFits(regulation, 5))
                .toThrow('Regulation requires 4 players but 5 are registered');
        });

        it('should reject a negative count before anything else', () => {
            expect(() => assertRegulationFits({ roles: { [PlayerRole.WEREWOLF]: -1, [PlayerRole.VILLAGER]: 1 } }, 0))
                .toThrow(expect.objectContaining({ code: 'NEGATIVE_ROLE_COUNT' }));
        });

        it('should honour the regulation player bounds', () => {
            const bounded = { ...regulation, minPlayers: 5 };
            expect(() => assertRegulationFits(bounded, 4))
                .toThrow('Player count 4 is outside the allowed range 5-20');
        });
    });

    describe('buildRolePool', () => {
        it('should expand counts in canonical role order', () => {
            const pool = buildRolePool({
                roles: { [PlayerRole.VILLAGER]: 2, [PlayerRole.GUARD]: 1, [PlayerRole.WEREWOLF]: 2 },
            });

            expect(pool).toEqual([
                PlayerRole.WEREWOLF,
                PlayerRole.WEREWOLF,
                PlayerRole.GUARD,
                PlayerRole.VILLAGER,
                PlayerRole.VILLAGER,
            ]);
        });

        it('should produce an empty pool for an empty regulation', () => {
            expect(buildRolePool({ roles: {} })).toEqual([]);
            expect(totalPlayers({ roles: {} })).toBe(0);
        });
    });

    describe('defaultRegulationFor', () => {
        it('should give a regulation whose total matches the table size', () => {
            for (const size of Object.keys(GAME_CONFIG.defaultRegulations).map(Number)) {
                const regulation = defaultRegulationFor(size);
                expect(regulation).not.toBeNull();
                if (regulation) {
                    expect(totalPlayers(regulation)).toBe(size);
                }
            }
        });

        it('should return null for sizes without a suggestion', () => {
            expect(defaultRegulationFor(4)).toBeNull();
            expect(defaultRegulationFor(40)).toBeNull();
        });
    });
});
