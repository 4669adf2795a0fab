import { ZodError } from 'zod';
import { DEFAULT_CONTENT_DIR, loadEncounterConfig } from '../../src/utils/config.js';

describe('loadEncounterConfig', () => {
    it('falls back to defaults for an empty environment', () => {
        expect(loadEncounterConfig({})).toEqual({
            seed: null,
            contentDir: DEFAULT_CONTENT_DIR,
            eliteChance: 0.15,
            uniqueChance: 0.15,
            maxUniquesPerFloor: 2
        });
    });

    it('points the default content directory at data/', () => {
        expect(DEFAULT_CONTENT_DIR.replace(/\\/g, '/')).toMatch(/\/data\/$/);
    });

    it('coerces numeric variables', () => {
        const config = loadEncounterConfig({
            ENCOUNTER_SEED: 'crypt-7',
            ENCOUNTER_CONTENT_DIR: '/srv/content',
            ENCOUNTER_ELITE_CHANCE: '0.5',
            ENCOUNTER_UNIQUE_CHANCE: '0',
            ENCOUNTER_MAX_UNIQUES_PER_FLOOR: '4'
        });

        expect(config).toEqual({
            seed: 'crypt-7',
            contentDir: '/srv/content',
            eliteChance: 0.5,
            uniqueChance: 0,
            maxUniquesPerFloor: 4
        });
    });

    it('rejects probabilities outside [0, 1]', () => {
        expect(() => loadEncounterConfig({ ENCOUNTER_ELITE_CHANCE: '1.5' })).toThrow(ZodError);
    });

    it('rejects a fractional unique limit', () => {
        expect(() => loadEncounterConfig({ ENCOUNTER_MAX_UNIQUES_PER_FLOOR: '1.5' })).toThrow(ZodError);
    });
});
