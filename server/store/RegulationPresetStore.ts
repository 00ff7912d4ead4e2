import { GameEventType, Regulation } from '../types/GameTypes';
import { ConfigurationError } from '../types/errors';
import { EventBus, createGameEvent } from '../engine/EventBus';
import { totalPlayers } from '../config/regulation';
import { Logger } from '../utils/logger';

/**
 * Named regulations the GM can reuse between games.
 */
export interface RegulationPresetStore {
    /** Validates and stores `regulation` under `name`, replacing any preset of that name. */
    save(name: string, regulation: Regulation): Readonly<Regulation>;
    /** Throws NotFoundError for an unknown name. */
    load(name: string): Readonly<Regulation>;
    /** Every preset by name; empty when nothing has been saved. */
    list(): Record<string, Readonly<Regulation>>;
}

export interface RegulationPresetStoreOptions {
    /** When given, every save publishes REGULATION_SAVED on it. */
    bus?: EventBus;
    logger?: Logger;
}

export function presetName(name: string): string {
    const trimmed = name.trim();
    if (trimmed.length === 0) {
        throw new ConfigurationError('INVALID_PRESET_NAME', 'Preset name must not be empty');
    }
    return trimmed;
}

export function announcePresetSaved(bus: EventBus | undefined, name: string, regulation: Regulation): void {
    bus?.publish(createGameEvent(GameEventType.REGULATION_SAVED, { name, totalPlayers: totalPlayers(regulation) }, 'regulation_presets'));
}
