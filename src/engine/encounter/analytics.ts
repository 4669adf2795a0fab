import type { EnemyArchetype, EnemyPackTemplate, EnemyRole } from '../../schema/encounter.js';
import { type EnemyRegistry, isFloorEligible } from './registry.js';
import { type ScaledStats, computeScaledStats } from './scaling.js';

export interface ArchetypeSummary {
    id: string;
    name: string;
    role: EnemyRole;
    tier: number;
    difficultyLevel: number;
    spawnRange: [number, number | null];
    tags: string[];
    skillCount: number;
    baseStats: { hp: number; attack: number; defense: number; xp: number };
    scaling: { hpPerFloor: number; atkPerFloor: number; defPerFloor: number };
}

export interface PackSummary {
    id: string;
    name: string;
    tier: number;
    memberCount: number;
    members: Array<{ id: string; name: string; role: EnemyRole }>;
    preferredRoomTag: string | null;
    weight: number;
}

export function summarizeArchetype(archetype: EnemyArchetype): ArchetypeSummary {
    return {
        id: archetype.id,
        name: archetype.name,
        role: archetype.role,
        tier: archetype.tier,
        difficultyLevel: archetype.difficultyLevel,
        spawnRange: [archetype.spawnMinFloor, archetype.spawnMaxFloor],
        tags: [...archetype.tags],
        skillCount: archetype.skillIds.length,
        baseStats: {
            hp: archetype.baseHp,
            attack: archetype.baseAttack,
            defense: archetype.baseDefense,
            xp: archetype.baseXp
        },
        scaling: {
            hpPerFloor: archetype.hpPerFloor,
            atkPerFloor: archetype.atkPerFloor,
            defPerFloor: archetype.defPerFloor
        }
    };
}

/**
 * Packs only hold registered members, so every member resolves.
 */
export function summarizePack(pack: EnemyPackTemplate, registry: EnemyRegistry): PackSummary {
    return {
        id: pack.id,
        name: pack.name,
        tier: pack.tier,
        memberCount: pack.memberArchIds.length,
        members: pack.memberArchIds.map(id => {
            const member = registry.getArchetype(id);
            return { id: member.id, name: member.name, role: member.role };
        }),
        preferredRoomTag: pack.preferredRoomTag,
        weight: pack.weight
    };
}

export interface ArchetypeAtFloor extends ScaledStats {
    id: string;
    name: string;
    floor: number;
    canSpawn: boolean;
}

export function archetypeAtFloor(archetype: EnemyArchetype, floor: number): ArchetypeAtFloor {
    const level = Math.max(1, floor);
    return {
        id: archetype.id,
        name: archetype.name,
        floor: level,
        canSpawn: isFloorEligible(archetype, level),
        ...computeScaledStats(archetype, level)
    };
}

export const DIFFICULTY_BANDS = [
    { label: 'very_easy', max: 20 },
    { label: 'easy', max: 40 },
    { label: 'medium', max: 60 },
    { label: 'hard', max: 80 },
    { label: 'very_hard', max: 100 },
    { label: 'extreme', max: Number.POSITIVE_INFINITY }
] as const;

export type DifficultyBand = typeof DIFFICULTY_BANDS[number]['label'];

export function difficultyBand(difficulty: number): DifficultyBand {
    for (const band of DIFFICULTY_BANDS) {
        if (difficulty <= band.max) return band.label;
    }
    return 'extreme';
}

export function difficultyDistribution(registry: EnemyRegistry): Record<DifficultyBand, number> {
    const distribution: Record<DifficultyBand, number> = {
        very_easy: 0,
        easy: 0,
        medium: 0,
        hard: 0,
        very_hard: 0,
        extreme: 0
    };
    for (const archetype of registry.listArchetypes()) {
        distribution[difficultyBand(archetype.difficultyLevel)] += 1;
    }
    return distribution;
}

export function roleDistribution(registry: EnemyRegistry): Partial<Record<EnemyRole, number>> {
    const distribution: Partial<Record<EnemyRole, number>> = {};
    for (const archetype of registry.listArchetypes()) {
        distribution[archetype.role] = (distribution[archetype.role] ?? 0) + 1;
    }
    return distribution;
}
