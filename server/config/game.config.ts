import { GamePhase, PlayerRole, Regulation } from '../types/GameTypes';
import { env } from './env';

export const GAME_CONFIG = {
    // Player limits
    players: {
        min: env.MIN_PLAYERS,
        max: env.MAX_PLAYERS,
    },

    eventHistorySize: env.EVENT_HISTORY_SIZE,

    // Discussion minutes when the regulation sets no round times
    defaultDiscussionTime: env.DEFAULT_DISCUSSION_TIME,

    phaseNames: {
        [GamePhase.SETUP]: 'Setup',
        [GamePhase.DAY_DISCUSSION]: 'Day (discussion)',
        [GamePhase.DAY_VOTE]: 'Day (vote)',
        [GamePhase.NIGHT]: 'Night',
    } satisfies Record<GamePhase, string>,

    // Suggested regulations by player count
    defaultRegulations: {
        5: { roles: { [PlayerRole.WEREWOLF]: 1, [PlayerRole.SEER]: 1, [PlayerRole.VILLAGER]: 3 } },
        6: { roles: { [PlayerRole.WEREWOLF]: 1, [PlayerRole.SEER]: 1, [PlayerRole.GUARD]: 1, [PlayerRole.VILLAGER]: 3 } },
        7: {
            roles: {
                [PlayerRole.WEREWOLF]: 2,
                [PlayerRole.SEER]: 1,
                [PlayerRole.GUARD]: 1,
                [PlayerRole.VILLAGER]: 3,
            },
        },
        8: {
            roles: {
                [PlayerRole.WEREWOLF]: 2,
                [PlayerRole.SEER]: 1,
                [PlayerRole.MEDIUM]: 1,
                [PlayerRole.GUARD]: 1,
                [PlayerRole.VILLAGER]: 3,
            },
        },
        9: {
            roles: {
                [PlayerRole.WEREWOLF]: 2,
                [PlayerRole.MADMAN]: 1,
                [PlayerRole.SEER]: 1,
                [PlayerRole.MEDIUM]: 1,
                [PlayerRole.GUARD]: 1,
                [PlayerRole.VILLAGER]: 3,
            },
        },
        10: {
            roles: {
                [PlayerRole.WEREWOLF]: 2,
                [PlayerRole.MADMAN]: 1,
                [PlayerRole.SEER]: 1,
                [PlayerRole.MEDIUM]: 1,
                [PlayerRole.GUARD]: 1,
                [PlayerRole.VILLAGER]: 4,
            },
        },
        11: {
            roles: {
                [PlayerRole.WEREWOLF]: 3,
                [PlayerRole.MADMAN]: 1,
                [PlayerRole.SEER]: 1,
                [PlayerRole.MEDIUM]: 1,
                [PlayerRole.GUARD]: 1,
                [PlayerRole.VILLAGER]: 4,
            },
        },
        12: {
            roles: {
                [PlayerRole.WEREWOLF]: 3,
                [PlayerRole.MADMAN]: 1,
                [PlayerRole.SEER]: 1,
                [PlayerRole.MEDIUM]: 1,
                [PlayerRole.GUARD]: 1,
                [PlayerRole.VILLAGER]: 5,
            },
        },
    } satisfies Record<number, Regulation>,
};
