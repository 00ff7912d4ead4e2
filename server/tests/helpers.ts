import { EventBus } from '../engine/EventBus';
import { GameState } from '../engine/GameState';
import { AnyGameEvent, GameEventType, Regulation } from '../types/GameTypes';
import { Logger } from '../utils/logger';
import { RandomFn } from '../utils/random';

export type MockLogger = { [K in keyof Logger]: jest.Mock };

export const createTestLogger = (): MockLogger => ({
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
});

/**
 * Makes Fisher-Yates pick j = i at every step, so roles are dealt in pool order:
 * the first seats get WEREWOLF, MADMAN, SEER, MEDIUM, GUARD, then VILLAGER.
 */
export const inOrder: RandomFn = () => 0.999999;

export interface TestGame {
    bus: EventBus;
    game: GameState;
    logger: MockLogger;
    events: AnyGameEvent[];
    typesSeen: () => GameEventType[];
}

/**
 * Builds a game with the given roster and roles. `events` only records what is published
 * after the players have been added.
 */
export const createTestGame = (
    names: string[],
    roles: Regulation['roles'],
    random: RandomFn = inOrder
): TestGame => {
    const bus = new EventBus({ logger: createTestLogger() });
    const logger = createTestLogger();
    const game = new GameState(bus, { random, logger, regulation: { roles } });
    names.forEach(name => game.addPlayer(name));

    const events: AnyGameEvent[] = [];
    bus.subscribe(event => events.push(event));
    return { bus, game, logger, events, typesSeen: () => events.map(e => e.type) };
};
