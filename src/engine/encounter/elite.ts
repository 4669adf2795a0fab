import type { Rgb, SpawnedUnit } from '../../schema/encounter.js';
import type { EncounterRNG } from './rng.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const BASE_ELITE_SPAWN_CHANCE = 0.15;

export const ELITE_MULTIPLIERS = {
    hp: 1.5,
    attack: 1.25,
    defense: 1.2,
    xp: 2.0
} as const;

/** Per-channel tint for elite presentation */
export const ELITE_COLOR_MULTIPLIERS: readonly [number, number, number] = [1.2, 1.15, 1.1];

export const ELITE_NAME_PREFIX = 'Elite ';

// ═══════════════════════════════════════════════════════════════════════════
// SPAWN ROLL
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Banded elite probability: floors 1-2 use the base chance, 3-4 add 0.05,
 * 5 and deeper add 0.10.
 */
export function eliteChanceForFloor(floor: number, baseChance: number = BASE_ELITE_SPAWN_CHANCE): number {
    if (floor <= 2) return baseChance;
    if (floor <= 4) return baseChance + 0.05;
    return baseChance + 0.10;
}

export function isEliteSpawn(
    floor: number,
    rng: EncounterRNG,
    baseChance: number = BASE_ELITE_SPAWN_CHANCE
): boolean {
    return rng.random() < eliteChanceForFloor(floor, baseChance);
}

// ═══════════════════════════════════════════════════════════════════════════
// MODIFIERS
// ═══════════════════════════════════════════════════════════════════════════

export interface EliteStatBlock {
    hp: number;
    attack: number;
    defense: number;
    xp: number;
}

/**
 * Each stat is multiplied, then truncated on its own.
 */
export function applyEliteModifiers(stats: EliteStatBlock): EliteStatBlock {
    return {
        hp: Math.trunc(stats.hp * ELITE_MULTIPLIERS.hp),
        attack: Math.trunc(stats.attack * ELITE_MULTIPLIERS.attack),
        defense: Math.trunc(stats.defense * ELITE_MULTIPLIERS.defense),
        xp: Math.trunc(stats.xp * ELITE_MULTIPLIERS.xp)
    };
}

function tint(color: Rgb): Rgb {
    return [
        Math.min(255, Math.trunc(color[0] * ELITE_COLOR_MULTIPLIERS[0])),
        Math.min(255, Math.trunc(color[1] * ELITE_COLOR_MULTIPLIERS[1])),
        Math.min(255, Math.trunc(color[2] * ELITE_COLOR_MULTIPLIERS[2]))
    ];
}

/**
 * Upgrade a unit in place: boosted stats, full heal, "Elite " prefix and tint.
 *
 * The name prefix is applied once no matter how often this runs. Stats and
 * color are recomputed from the unit's current values on every call.
 */
export function makeEnemyElite(unit: SpawnedUnit): SpawnedUnit {
    const boosted = applyEliteModifiers({
        hp: unit.maxHp,
        attack: unit.attack,
        defense: unit.defense,
        xp: unit.xp
    });

    unit.isElite = true;
    unit.maxHp = boosted.hp;
    unit.hp = boosted.hp;
    unit.attack = boosted.attack;
    unit.defense = boosted.defense;
    unit.xp = boosted.xp;

    if (!unit.name.startsWith(ELITE_NAME_PREFIX)) {
        unit.originalName = unit.name;
        unit.name = `${ELITE_NAME_PREFIX}${unit.name}`;
    }

    unit.color = tint(unit.color);
    return unit;
}
