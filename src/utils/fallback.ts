/**
 * Priority-ordered fallback chains
 *
 * A chain is a list of named strategies tried in order; the first one that
 * produces a value wins. A strategy misses by returning null or by throwing,
 * and every miss is reported so the caller can log it.
 *
 * @example
 * const pickArchetype = firstSuccess<number, EnemyArchetype[]>([
 *     { name: 'floor-eligible', attempt: floor => nonEmpty(registry.archetypesForFloor(floor)) },
 *     { name: 'everything', attempt: () => nonEmpty(registry.listArchetypes()) }
 * ]);
 */

import { getErrorMessage } from './logger.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface Strategy<TInput, TResult> {
    readonly name: string;
    attempt(input: TInput): TResult | null;
}

export interface FallbackMiss {
    strategy: string;
    reason: string;
}

export interface FallbackOutcome<TResult> {
    value: TResult;
    /** Name of the strategy that produced the value */
    strategy: string;
    misses: FallbackMiss[];
}

export type FallbackChain<TInput, TResult> = (input: TInput) => FallbackOutcome<TResult> | null;

// ═══════════════════════════════════════════════════════════════════════════
// COMBINATOR
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Compose strategies into a chain. Returns null only when every strategy missed.
 */
export function firstSuccess<TInput, TResult>(
    strategies: ReadonlyArray<Strategy<TInput, TResult>>,
    onMiss?: (miss: FallbackMiss) => void
): FallbackChain<TInput, TResult> {
    return (input: TInput) => {
        const misses: FallbackMiss[] = [];

        for (const strategy of strategies) {
            let value: TResult | null;
            try {
                value = strategy.attempt(input);
            } catch (error) {
                const miss = { strategy: strategy.name, reason: getErrorMessage(error) };
                misses.push(miss);
                onMiss?.(miss);
                continue;
            }

            if (value !== null) {
                return { value, strategy: strategy.name, misses };
            }

            const miss = { strategy: strategy.name, reason: 'no result' };
            misses.push(miss);
            onMiss?.(miss);
        }

        return null;
    };
}

/**
 * Treat an empty list as a miss
 */
export function nonEmpty<T>(items: T[]): T[] | null {
    return items.length > 0 ? items : null;
}
