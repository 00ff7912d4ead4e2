import { z } from 'zod';
import { Regulation } from '../types/GameTypes';
import { ConfigurationError, NotFoundError } from '../types/errors';
import { parseRegulation } from '../config/regulation';
import { env } from '../config/env';
import { createLogger, Logger } from '../utils/logger';
import { readJsonFile, writeJsonFile } from './jsonFile';
import {
    RegulationPresetStore,
    RegulationPresetStoreOptions,
    announcePresetSaved,
    presetName,
} from './RegulationPresetStore';

const presetFileSchema = z.record(z.unknown());

/**
 * Keeps every preset in one JSON object keyed by name. Each entry is validated on read.
 */
export class JsonFileRegulationPresetStore implements RegulationPresetStore {
    private readonly logger: Logger;

    constructor(
        public readonly filePath: string = env.REGULATION_PRESETS_PATH,
        private readonly options: RegulationPresetStoreOptions = {}
    ) {
        this.logger = options.logger ?? createLogger('JsonFileRegulationPresetStore');
    }

    public save(name: string, regulation: Regulation): Readonly<Regulation> {
        const key = presetName(name);
        const parsed = parseRegulation(regulation);
        writeJsonFile(this.filePath, { ...this.list(), [key]: parsed });
        this.logger.info(`Preset ${key} saved to ${this.filePath}`);
        announcePresetSaved(this.options.bus, key, parsed);
        return parsed;
    }

    public load(name: string): Readonly<Regulation> {
        const presets = this.list();
        const key = name.trim();
        if (!Object.prototype.hasOwnProperty.call(presets, key)) {
            throw new NotFoundError('PRESET_NOT_FOUND', `No regulation preset named ${name}`);
        }
        return presets[key];
    }

    public list(): Record<string, Readonly<Regulation>> {
        let data: unknown;
        try {
            data = readJsonFile(this.filePath, 'PRESETS_NOT_FOUND', 'INVALID_PRESETS');
        } catch (error) {
            if (error instanceof NotFoundError) return {};
            throw error;
        }

        const result = presetFileSchema.safeParse(data);
        if (!result.success) {
            throw new ConfigurationError('INVALID_PRESETS', `${this.filePath} must hold an object of presets`);
        }

        const presets: Record<string, Readonly<Regulation>> = {};
        for (const [name, value] of Object.entries(result.data)) {
            presets[name] = parseRegulation(value);
        }
        return presets;
    }
}
