import { z } from 'zod';
import {
    type EnemyArchetype,
    type EnemyArchetypeData,
    type EnemyArchetypeInput,
    EnemyArchetypeSchema,
    type EnemyPackTemplate,
    type EnemyPackTemplateData,
    type EnemyPackTemplateInput,
    EnemyPackTemplateSchema,
    type EnemyRole,
    type EnemyTier
} from '../../schema/encounter.js';
import {
    ContentValidationError,
    DuplicateRegistrationError,
    EmptyRegistryError,
    NotFoundError,
    RegistrySealedError
} from './errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('Registry');

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * True when `floor` lies in the archetype's spawn range; a null max is open-ended
 */
export function isFloorEligible(archetype: EnemyArchetype, floor: number): boolean {
    if (floor < archetype.spawnMinFloor) return false;
    return archetype.spawnMaxFloor === null || floor <= archetype.spawnMaxFloor;
}

function freezeArchetype(data: EnemyArchetypeData): EnemyArchetype {
    return Object.freeze({
        ...data,
        tags: Object.freeze([...data.tags]),
        skillIds: Object.freeze([...data.skillIds]),
        uniqueMechanics: Object.freeze([...data.uniqueMechanics]),
        resistances: Object.freeze({ ...data.resistances })
    });
}

function freezePack(data: EnemyPackTemplateData): EnemyPackTemplate {
    return Object.freeze({ ...data, memberArchIds: Object.freeze([...data.memberArchIds]) });
}

function toContentError(source: string, error: z.ZodError): ContentValidationError {
    return new ContentValidationError(
        source,
        error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
    );
}

function isPackInput(def: EnemyArchetypeInput | EnemyPackTemplateInput): def is EnemyPackTemplateInput {
    return 'memberArchIds' in def;
}

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Archetype and pack definitions, keyed by id.
 *
 * Filled once at startup, then sealed; stored definitions are frozen and
 * every accessor is read-only from then on.
 */
export class EnemyRegistry {
    private archetypes = new Map<string, EnemyArchetype>();
    private packs = new Map<string, EnemyPackTemplate>();
    private sealed = false;

    // ─────────────────────────────────────────────────────────────────────────
    // REGISTRATION
    // ─────────────────────────────────────────────────────────────────────────

    register(def: EnemyArchetypeInput | EnemyPackTemplateInput): EnemyArchetype | EnemyPackTemplate {
        return isPackInput(def) ? this.registerPack(def) : this.registerArchetype(def);
    }

    registerArchetype(input: EnemyArchetypeInput): EnemyArchetype {
        this.assertOpen(input.id);

        const parsed = EnemyArchetypeSchema.safeParse(input);
        if (!parsed.success) {
            throw toContentError(`archetype "${input.id}"`, parsed.error);
        }
        if (this.archetypes.has(parsed.data.id)) {
            throw new DuplicateRegistrationError('archetype', parsed.data.id);
        }

        const archetype = freezeArchetype(parsed.data);
        this.archetypes.set(archetype.id, archetype);
        log.debug(`Registered archetype ${archetype.id} (difficulty ${archetype.difficultyLevel})`);
        return archetype;
    }

    registerPack(input: EnemyPackTemplateInput): EnemyPackTemplate {
        this.assertOpen(input.id);

        const parsed = EnemyPackTemplateSchema.safeParse(input);
        if (!parsed.success) {
            throw toContentError(`pack "${input.id}"`, parsed.error);
        }
        if (this.packs.has(parsed.data.id)) {
            throw new DuplicateRegistrationError('pack', parsed.data.id);
        }
        for (const memberId of parsed.data.memberArchIds) {
            if (!this.archetypes.has(memberId)) {
                throw new NotFoundError('archetype', memberId);
            }
        }

        const pack = freezePack(parsed.data);
        this.packs.set(pack.id, pack);
        log.debug(`Registered pack ${pack.id} (${pack.memberArchIds.length} members)`);
        return pack;
    }

    /**
     * End the startup phase. Fails when no archetype was registered.
     */
    seal(): this {
        if (this.archetypes.size === 0) {
            throw new EmptyRegistryError('Cannot seal a registry without archetypes');
        }
        this.sealed = true;
        return this;
    }

    isSealed(): boolean {
        return this.sealed;
    }

    private assertOpen(id: string): void {
        if (this.sealed) {
            throw new RegistrySealedError(id);
        }
    }

    // ─────────────────────────────────────────────────────────────────────────
    // LOOKUP
    // ─────────────────────────────────────────────────────────────────────────

    getArchetype(id: string): EnemyArchetype {
        const archetype = this.archetypes.get(id);
        if (!archetype) {
            throw new NotFoundError('archetype', id);
        }
        return archetype;
    }

    findArchetype(id: string): EnemyArchetype | null {
        return this.archetypes.get(id) ?? null;
    }

    getPack(id: string): EnemyPackTemplate {
        const pack = this.packs.get(id);
        if (!pack) {
            throw new NotFoundError('pack', id);
        }
        return pack;
    }

    findPack(id: string): EnemyPackTemplate | null {
        return this.packs.get(id) ?? null;
    }

    hasArchetype(id: string): boolean {
        return this.archetypes.has(id);
    }

    /** In registration order */
    listArchetypes(): EnemyArchetype[] {
        return [...this.archetypes.values()];
    }

    listPacks(): EnemyPackTemplate[] {
        return [...this.packs.values()];
    }

    archetypeIds(): string[] {
        return [...this.archetypes.keys()].sort();
    }

    packIds(): string[] {
        return [...this.packs.keys()].sort();
    }

    get archetypeCount(): number {
        return this.archetypes.size;
    }

    get packCount(): number {
        return this.packs.size;
    }

    // ─────────────────────────────────────────────────────────────────────────
    // ARCHETYPE FILTERS
    // ─────────────────────────────────────────────────────────────────────────

    archetypesByTag(tag: string): EnemyArchetype[] {
        return this.listArchetypes().filter(a => a.tags.includes(tag));
    }

    archetypesByRole(role: EnemyRole): EnemyArchetype[] {
        return this.listArchetypes().filter(a => a.role === role);
    }

    archetypesByTier(tier: EnemyTier): EnemyArchetype[] {
        return this.listArchetypes().filter(a => a.tier === tier);
    }

    archetypesBySkill(skillId: string): EnemyArchetype[] {
        return this.listArchetypes().filter(a => a.skillIds.includes(skillId));
    }

    /** Inclusive on both ends */
    archetypesByDifficulty(min: number, max: number): EnemyArchetype[] {
        return this.listArchetypes().filter(a => a.difficultyLevel >= min && a.difficultyLevel <= max);
    }

    /**
     * Archetypes whose spawn range overlaps [minFloor, maxFloor]
     */
    archetypesByFloorRange(minFloor: number, maxFloor: number): EnemyArchetype[] {
        return this.listArchetypes().filter(a =>
            a.spawnMinFloor <= maxFloor && (a.spawnMaxFloor === null || a.spawnMaxFloor >= minFloor)
        );
    }

    archetypesForFloor(floor: number): EnemyArchetype[] {
        return this.listArchetypes().filter(a => isFloorEligible(a, floor));
    }

    // ─────────────────────────────────────────────────────────────────────────
    // PACK FILTERS
    // ─────────────────────────────────────────────────────────────────────────

    packsByTier(tier: EnemyTier): EnemyPackTemplate[] {
        return this.listPacks().filter(p => p.tier === tier);
    }

    packsByRoomTag(roomTag: string | null): EnemyPackTemplate[] {
        return this.listPacks().filter(p => p.preferredRoomTag === roomTag);
    }

    /** Packs that list the archetype at least once */
    packsContaining(archetypeId: string): EnemyPackTemplate[] {
        return this.listPacks().filter(p => p.memberArchIds.includes(archetypeId));
    }
}
