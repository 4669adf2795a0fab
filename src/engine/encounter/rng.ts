import seedrandom from 'seedrandom';
import { randomUUID } from 'crypto';

/** Any function returning a float in [0, 1). */
export type RandomSource = () => number;

/**
 * Seeded random source for encounter generation.
 * Every draw the engine makes goes through one of these, so a fixed seed
 * reproduces an exact spawn sequence.
 */
export class EncounterRNG {
    private rng: RandomSource;
    readonly seed: string | null;

    /**
     * @param source - a seed string for seedrandom, or a raw source (tests script draws this way)
     */
    constructor(source: string | RandomSource) {
        if (typeof source === 'string') {
            this.rng = seedrandom(source);
            this.seed = source;
        } else {
            this.rng = source;
            this.seed = null;
        }
    }

    random(): number {
        return this.rng();
    }

    /**
     * Float in [min, max)
     */
    uniform(min: number, max: number): number {
        return min + (max - min) * this.rng();
    }

    /**
     * Integer in [min, max], both inclusive
     */
    randint(min: number, max: number): number {
        if (max < min) {
            throw new Error(`Invalid range: ${min}..${max}`);
        }
        return Math.floor(this.rng() * (max - min + 1)) + min;
    }

    /**
     * Bernoulli trial
     */
    chance(probability: number): boolean {
        return this.rng() < probability;
    }

    choice<T>(items: readonly T[]): T {
        if (items.length === 0) {
            throw new Error('Cannot choose from an empty list');
        }
        return items[Math.floor(this.rng() * items.length)];
    }

    /**
     * Weighted categorical draw. Weights need not sum to 1; when they sum to
     * zero or less the draw is uniform.
     */
    weightedChoice<T>(items: readonly T[], weights: readonly number[]): T {
        if (items.length === 0) {
            throw new Error('Cannot choose from an empty list');
        }
        if (items.length !== weights.length) {
            throw new Error(`Got ${items.length} items but ${weights.length} weights`);
        }

        const total = weights.reduce((sum, w) => sum + Math.max(0, w), 0);
        if (total <= 0) {
            return this.choice(items);
        }

        const roll = this.rng() * total;
        let cumulative = 0;
        for (let i = 0; i < items.length; i++) {
            cumulative += Math.max(0, weights[i]);
            if (roll < cumulative) {
                return items[i];
            }
        }
        // Float drift at the top of the range
        return items[items.length - 1];
    }
}

/**
 * Build an RNG from an optional seed; without one a fresh seed is generated
 * and kept on the instance so the draw can be replayed.
 */
export function createEncounterRNG(seed?: string | null): EncounterRNG {
    return new EncounterRNG(seed ?? randomUUID());
}
