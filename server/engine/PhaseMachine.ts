import { GamePhase } from '../types/GameTypes';

// SETUP is left only through startGame and never re-entered.
const SUCCESSOR: Record<GamePhase, GamePhase> = {
    [GamePhase.SETUP]: GamePhase.DAY_DISCUSSION,
    [GamePhase.DAY_DISCUSSION]: GamePhase.DAY_VOTE,
    [GamePhase.DAY_VOTE]: GamePhase.NIGHT,
    [GamePhase.NIGHT]: GamePhase.DAY_DISCUSSION,
};

/** Phase a running round moves to after `phase`. */
export function nextPhase(phase: GamePhase): GamePhase {
    return SUCCESSOR[phase];
}

export function isLegalTransition(from: GamePhase, to: GamePhase): boolean {
    return from !== GamePhase.SETUP && SUCCESSOR[from] === to;
}

/** The round counter moves on when night ends. */
export function crossesRoundBoundary(from: GamePhase, to: GamePhase): boolean {
    return from === GamePhase.NIGHT && to === GamePhase.DAY_DISCUSSION;
}
