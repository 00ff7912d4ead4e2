import { Regulation } from '../types/GameTypes';
import { NotFoundError } from '../types/errors';
import { parseRegulation } from '../config/regulation';
import { createLogger, Logger } from '../utils/logger';
import {
    RegulationPresetStore,
    RegulationPresetStoreOptions,
    announcePresetSaved,
    presetName,
} from './RegulationPresetStore';

export class InMemoryRegulationPresetStore implements RegulationPresetStore {
    private presets = new Map<string, Readonly<Regulation>>();
    private readonly logger: Logger;

    constructor(private readonly options: RegulationPresetStoreOptions = {}) {
        this.logger = options.logger ?? createLogger('InMemoryRegulationPresetStore');
    }

    public save(name: string, regulation: Regulation): Readonly<Regulation> {
        const key = presetName(name);
        const parsed = parseRegulation(regulation);
        this.presets.set(key, parsed);
        this.logger.info(`Preset ${key} saved`);
        announcePresetSaved(this.options.bus, key, parsed);
        return parsed;
    }

    public load(name: string): Readonly<Regulation> {
        const preset = this.presets.get(name.trim());
        if (!preset) {
            throw new NotFoundError('PRESET_NOT_FOUND', `No regulation preset named ${name}`);
        }
        return preset;
    }

    public list(): Record<string, Readonly<Regulation>> {
        return Object.fromEntries(this.presets);
    }
}
