import { randomUUID } from 'crypto';
import type { EnemyArchetype, Rgb, SpawnedUnit, UnitSide } from '../../schema/encounter.js';

export const DEFAULT_ENEMY_COLOR: Rgb = [200, 80, 80];
export const DEFAULT_ALLY_COLOR: Rgb = [100, 150, 255];

/** Initiative may grow by at most this much per floor */
export const MAX_INITIATIVE_PER_FLOOR = 0.5;

export function copyColor(color: Rgb): Rgb {
    return [color[0], color[1], color[2]];
}

export interface ScaledStats {
    hp: number;
    attack: number;
    defense: number;
    xp: number;
    initiative: number;
}

/**
 * Stats of an archetype at a dungeon floor (floors below 1 count as 1).
 * Every stat is base + rate * (floor - 1), truncated toward zero.
 */
export function computeScaledStats(archetype: EnemyArchetype, floor: number): ScaledStats {
    const steps = Math.max(1, floor) - 1;

    const rawInitiative = archetype.baseInitiative + archetype.initPerFloor * steps;
    const initiativeCap = archetype.baseInitiative + Math.floor(steps * MAX_INITIATIVE_PER_FLOOR);

    return {
        hp: Math.trunc(archetype.baseHp + archetype.hpPerFloor * steps),
        attack: Math.trunc(archetype.baseAttack + archetype.atkPerFloor * steps),
        defense: Math.trunc(archetype.baseDefense + archetype.defPerFloor * steps),
        xp: Math.trunc(archetype.baseXp + archetype.xpPerFloor * steps),
        initiative: Math.trunc(Math.min(rawInitiative, initiativeCap))
    };
}

export interface SpawnOptions {
    id?: string;
    side?: UnitSide;
    label?: string | null;
    partyId?: string | null;
    partyTypeId?: string | null;
    isUnique?: boolean;
}

/**
 * Fresh, full-health unit for an archetype at a floor
 */
export function createSpawnedUnit(archetype: EnemyArchetype, floor: number, options: SpawnOptions = {}): SpawnedUnit {
    const level = Math.max(1, Math.trunc(floor));
    const stats = computeScaledStats(archetype, level);
    const side = options.side ?? 'enemy';

    return {
        id: options.id ?? randomUUID(),
        archetypeId: archetype.id,
        name: archetype.name,
        originalName: null,
        label: options.label ?? null,
        side,
        role: archetype.role,
        aiProfile: archetype.aiProfile,
        floor: level,

        maxHp: stats.hp,
        hp: stats.hp,
        attack: stats.attack,
        defense: stats.defense,
        xp: stats.xp,
        initiative: stats.initiative,
        skillPower: 1.0,

        skillIds: [...archetype.skillIds],
        tags: [...archetype.tags],
        resistances: { ...archetype.resistances },
        uniqueMechanics: [...archetype.uniqueMechanics],

        isElite: false,
        isUnique: options.isUnique ?? false,
        color: copyColor(side === 'ally' ? DEFAULT_ALLY_COLOR : DEFAULT_ENEMY_COLOR),

        partyId: options.partyId ?? null,
        partyTypeId: options.partyTypeId ?? null
    };
}
