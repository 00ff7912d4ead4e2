import fs from 'fs';
import os from 'os';
import path from 'path';
import { EventBus } from '../../engine/EventBus';
import { InMemoryRegulationPresetStore } from '../../store/InMemoryRegulationPresetStore';
import { JsonFileRegulationPresetStore } from '../../store/JsonFileRegulationPresetStore';
import { RegulationPresetStore, RegulationPresetStoreOptions } from '../../store/RegulationPresetStore';
import { AnyGameEvent, GameEventType, PlayerRole } from '../../types/GameTypes';
import { ConfigurationError, NotFoundError } from '../../types/errors';
import { createTestLogger } from '../helpers';

const SMALL = { roles: { [PlayerRole.WEREWOLF]: 1, [PlayerRole.VILLAGER]: 3 } };
const LARGE = {
    roles: { [PlayerRole.WEREWOLF]: 2, [PlayerRole.SEER]: 1, [PlayerRole.GUARD]: 1, [PlayerRole.VILLAGER]: 4 },
    roundTimes: [5, 3],
};

describe.each([
    ['InMemoryRegulationPresetStore', (options: RegulationPresetStoreOptions): RegulationPresetStore =>
        new InMemoryRegulationPresetStore(options)],
    ['JsonFileRegulationPresetStore', (options: RegulationPresetStoreOptions): RegulationPresetStore =>
        new JsonFileRegulationPresetStore(path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'gm-presets-')), 'regulations.json'), options)],
])('%s', (_name, createStore) => {
    let bus: EventBus;
    let events: AnyGameEvent[];
    let store: RegulationPresetStore;

    beforeEach(() => {
        bus = new EventBus({ logger: createTestLogger() });
        events = [];
        bus.subscribe(event => events.push(event));
        store = createStore({ bus, logger: createTestLogger() });
    });

    it('should start empty', () => {
        expect(store.list()).toEqual({});
        expect(() => store.load('small')).toThrow(NotFoundError);
    });

    it('should save and load presets by trimmed name', () => {
        store.save('  small ', SMALL);
        store.save('large', LARGE);

        expect(store.load('small')).toEqual(SMALL);
        expect(store.load(' large')).toEqual(LARGE);
        expect(Object.keys(store.list()).sort()).toEqual(['large', 'small']);
    });

    it('should replace a preset saved under the same name', () => {
        store.save('table', SMALL);
        store.save('table', LARGE);

        expect(store.load('table')).toEqual(LARGE);
        expect(Object.keys(store.list())).toEqual(['table']);
    });

    it('should publish REGULATION_SAVED with the player total', () => {
        store.save('large', LARGE);

        expect(events).toHaveLength(1);
        expect(events[0].type).toBe(GameEventType.REGULATION_SAVED);
        expect(events[0].data).toEqual({ name: 'large', totalPlayers: 8 });
        expect(events[0].source).toBe('regulation_presets');
    });

    it('should reject an empty name or an invalid regulation without saving', () => {
        expect(() => store.save('   ', SMALL)).toThrow(expect.objectContaining({ code: 'INVALID_PRESET_NAME' }));
        expect(() => store.save('odd', { roles: { [PlayerRole.VILLAGER]: 1.5 } }))
            .toThrow(expect.objectContaining({ code: 'INVALID_REGULATION' }));

        expect(store.list()).toEqual({});
        expect(events).toEqual([]);
    });

    it('should not treat object members as preset names', () => {
        store.save('small', SMALL);

        expect(() => store.load('toString')).toThrow(NotFoundError);
    });
});

describe('JsonFileRegulationPresetStore on disk', () => {
    let dir: string;
    let filePath: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gm-presets-'));
        filePath = path.join(dir, 'nested', 'regulations.json');
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should share presets between stores on the same file', () => {
        new JsonFileRegulationPresetStore(filePath, { logger: createTestLogger() }).save('small', SMALL);

        const reopened = new JsonFileRegulationPresetStore(filePath, { logger: createTestLogger() });

        expect(reopened.load('small')).toEqual(SMALL);
        expect(JSON.parse(fs.readFileSync(filePath, 'utf8'))).toEqual({ small: SMALL });
    });

    it('should reject a file that is not an object of presets', () => {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, JSON.stringify([SMALL]), 'utf8');
        const store = new JsonFileRegulationPresetStore(filePath, { logger: createTestLogger() });

        expect(() => store.list()).toThrow(expect.objectContaining({ code: 'INVALID_PRESETS' }));
    });

    it('should reject a stored preset with unknown roles', () => {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, JSON.stringify({ odd: { roles: { WITCH: 1 } } }), 'utf8');
        const store = new JsonFileRegulationPresetStore(filePath, { logger: createTestLogger() });

        expect(() => store.load('odd')).toThrow(ConfigurationError);
    });

    it('should reject malformed JSON', () => {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, '{ broken', 'utf8');
        const store = new JsonFileRegulationPresetStore(filePath, { logger: createTestLogger() });

        expect(() => store.list()).toThrow(expect.objectContaining({ code: 'INVALID_PRESETS' }));
    });
});
