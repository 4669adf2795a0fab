import { type EnemyArchetype, type EnemyPackTemplate, tierForDifficulty } from '../../schema/encounter.js';
import type { EnemyRegistry } from './registry.js';

/**
 * Content review over a loaded registry.
 *
 * Hard invariants are enforced at registration, so anything reported here
 * is advisory: the registry stays usable whatever the report says. Errors
 * are things that will misbehave at runtime; warnings are worth a look.
 */

export interface ContentIssues {
    errors: string[];
    warnings: string[];
}

export interface SectionReport {
    total: number;
    valid: number;
    invalid: number;
    errorCount: number;
    warningCount: number;
    issues: Record<string, ContentIssues>;
}

export interface ValidationReport {
    archetypes: SectionReport;
    packs: SectionReport;
    orphanedArchetypes: { count: number; ids: string[] };
    overallValid: boolean;
}

export function validateArchetype(archetype: EnemyArchetype): ContentIssues {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (archetype.name.trim() === '') {
        errors.push('Missing or empty name');
    }
    if (archetype.spawnWeight === 0) {
        errors.push('spawnWeight is 0; the archetype can only appear through a pack or fallback');
    }
    if (archetype.tags.length === 0) {
        warnings.push('No tags defined; tag filters and synergies will skip it');
    }
    const bandTier = tierForDifficulty(archetype.difficultyLevel);
    if (bandTier !== archetype.tier) {
        warnings.push(
            `tier ${archetype.tier} disagrees with difficulty ${archetype.difficultyLevel} (band tier ${bandTier})`
        );
    }

    return { errors, warnings };
}

export function validatePack(pack: EnemyPackTemplate, registry: EnemyRegistry): ContentIssues {
    const errors: string[] = [];
    const warnings: string[] = [];

    const tiers: number[] = [];
    for (const memberId of pack.memberArchIds) {
        const member = registry.findArchetype(memberId);
        if (!member) {
            errors.push(`Member archetype "${memberId}" not found in registry`);
            continue;
        }
        tiers.push(member.tier);
    }

    if (tiers.length > 0 && Math.max(...tiers) - Math.min(...tiers) > 1) {
        const distinct = [...new Set(tiers)].sort();
        warnings.push(`Members span tiers ${distinct.join(', ')}`);
    }

    return { errors, warnings };
}

/** Archetypes no pack lists, sorted by id */
export function findOrphanedArchetypes(registry: EnemyRegistry): string[] {
    const used = new Set(registry.listPacks().flatMap(p => p.memberArchIds));
    return registry.archetypeIds().filter(id => !used.has(id));
}

function summarize(issues: Record<string, ContentIssues>): SectionReport {
    const entries = Object.values(issues);
    const invalid = entries.filter(i => i.errors.length > 0).length;
    return {
        total: entries.length,
        valid: entries.length - invalid,
        invalid,
        errorCount: entries.reduce((sum, i) => sum + i.errors.length, 0),
        warningCount: entries.reduce((sum, i) => sum + i.warnings.length, 0),
        issues
    };
}

export function validateRegistry(registry: EnemyRegistry): ValidationReport {
    const archetypeIssues: Record<string, ContentIssues> = {};
    for (const archetype of registry.listArchetypes()) {
        archetypeIssues[archetype.id] = validateArchetype(archetype);
    }

    const packIssues: Record<string, ContentIssues> = {};
    for (const pack of registry.listPacks()) {
        packIssues[pack.id] = validatePack(pack, registry);
    }

    const archetypes = summarize(archetypeIssues);
    const packs = summarize(packIssues);
    const orphaned = findOrphanedArchetypes(registry);

    return {
        archetypes,
        packs,
        orphanedArchetypes: { count: orphaned.length, ids: orphaned },
        overallValid: archetypes.errorCount === 0 && packs.errorCount === 0
    };
}
