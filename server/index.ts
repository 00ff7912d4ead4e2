export * from './types/GameTypes';
export * from './types/errors';
export { EventBus, createGameEvent, isEventOf } from './engine/EventBus';
export type { Subscription, EventBusOptions, RecentEventsQuery } from './engine/EventBus';
export { GameState } from './engine/GameState';
export type { GameStateOptions, NightActions, NightResult } from './engine/GameState';
export { Player } from './engine/Player';
export type { ReadonlyPlayer } from './engine/Player';
export { WinEvaluator } from './engine/WinEvaluator';
export { nextPhase, isLegalTransition, crossesRoundBoundary } from './engine/PhaseMachine';
export { parseSnapshot } from './engine/Snapshot';
export { Role, ALL_ROLES, getRole, teamOf, isPlayerRole } from './roles';
export {
    parseRegulation,
    assertRegulationFits,
    buildRolePool,
    defaultRegulationFor,
    totalPlayers,
    roundTimeFor,
} from './config/regulation';
export { GAME_CONFIG } from './config/game.config';
export type { SnapshotStore } from './store/SnapshotStore';
export { InMemorySnapshotStore } from './store/InMemorySnapshotStore';
export { JsonFileSnapshotStore } from './store/JsonFileSnapshotStore';
export type { RegulationPresetStore, RegulationPresetStoreOptions } from './store/RegulationPresetStore';
export { InMemoryRegulationPresetStore } from './store/InMemoryRegulationPresetStore';
export { JsonFileRegulationPresetStore } from './store/JsonFileRegulationPresetStore';
export { GameLog } from './engine/GameLog';
export type { GameLogEntry, GameLogOptions } from './engine/GameLog';
export { createLogger } from './utils/logger';
export type { Logger, LogLevel } from './utils/logger';
export { shuffle, seededRandom, defaultRandom } from './utils/random';
export type { RandomFn } from './utils/random';
