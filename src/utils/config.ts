import { fileURLToPath } from 'url';
import { z } from 'zod';

/** data/ at the package root; one level above both src/ and dist/ */
export const DEFAULT_CONTENT_DIR = fileURLToPath(new URL('../../data/', import.meta.url));

const probability = z.coerce.number().min(0).max(1);

const EnvSchema = z.object({
    ENCOUNTER_SEED: z.string().min(1).optional(),
    ENCOUNTER_CONTENT_DIR: z.string().min(1).default(DEFAULT_CONTENT_DIR),
    ENCOUNTER_ELITE_CHANCE: probability.default(0.15),
    ENCOUNTER_UNIQUE_CHANCE: probability.default(0.15),
    ENCOUNTER_MAX_UNIQUES_PER_FLOOR: z.coerce.number().int().nonnegative().default(2)
});

export interface EncounterConfig {
    /** Fixed seed for every draw; a fresh one per call when unset */
    seed: string | null;
    contentDir: string;
    eliteChance: number;
    uniqueChance: number;
    maxUniquesPerFloor: number;
}

/**
 * Read engine settings from the environment. Throws a ZodError naming the
 * offending variable when a value does not parse.
 */
export function loadEncounterConfig(env: NodeJS.ProcessEnv = process.env): EncounterConfig {
    const parsed = EnvSchema.parse(env);
    return {
        seed: parsed.ENCOUNTER_SEED ?? null,
        contentDir: parsed.ENCOUNTER_CONTENT_DIR,
        eliteChance: parsed.ENCOUNTER_ELITE_CHANCE,
        uniqueChance: parsed.ENCOUNTER_UNIQUE_CHANCE,
        maxUniquesPerFloor: parsed.ENCOUNTER_MAX_UNIQUES_PER_FLOOR
    };
}
