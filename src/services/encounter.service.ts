/**
 * Encounter Service
 *
 * One entry point over the registry, selector, converter and room builder.
 * The registry and party types are loaded once; every generating call gets
 * its own RNG, seeded from the call, then the configured seed, then fresh.
 */

import {
    type EnemyArchetype,
    type EnemyPackTemplate,
    type EnemyRole,
    type EnemyTier,
    type PartyType,
    type PlayerPartySnapshot,
    type PlayerPartySnapshotInput,
    PlayerPartySnapshotSchema,
    type RoamingParty,
    type RoamingPartyInput,
    RoamingPartySchema,
    type SpawnedUnit
} from '../schema/encounter.js';
import {
    type ArchetypeAtFloor,
    type ArchetypeSummary,
    type DifficultyBand,
    type PackSummary,
    archetypeAtFloor,
    difficultyDistribution,
    roleDistribution,
    summarizeArchetype,
    summarizePack
} from '../engine/encounter/analytics.js';
import { type EffectiveAlignment, EncounterConverter, effectiveAlignment } from '../engine/encounter/conversion.js';
import { isEliteSpawn, makeEnemyElite } from '../engine/encounter/elite.js';
import { NotFoundError } from '../engine/encounter/errors.js';
import type { EnemyRegistry } from '../engine/encounter/registry.js';
import { type EncounterRNG, createEncounterRNG } from '../engine/encounter/rng.js';
import { type RoomEncounter, RoomEncounterBuilder } from '../engine/encounter/room-encounter.js';
import { type ScaledStats, computeScaledStats, createSpawnedUnit } from '../engine/encounter/scaling.js';
import { EncounterSelector } from '../engine/encounter/selection.js';
import { type ValidationReport, validateRegistry } from '../engine/encounter/validation.js';
import { loadEnemyRegistry, loadPartyTypes } from '../data/content-loader.js';
import { type EncounterConfig, loadEncounterConfig } from '../utils/config.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('EncounterService');

export interface ArchetypeFilter {
    tag?: string;
    role?: EnemyRole;
    tier?: EnemyTier;
    floor?: number;
    minDifficulty?: number;
    maxDifficulty?: number;
}

export interface PackFilter {
    tier?: EnemyTier;
    roomTag?: string;
    containing?: string;
}

export interface SpawnRequest {
    /** Always elite when true, never when false, rolled when omitted */
    elite?: boolean;
    seed?: string;
}

export interface PartyConversion {
    alignment: EffectiveAlignment;
    side: 'enemy' | 'ally';
    units: SpawnedUnit[];
}

export interface EncounterStats {
    archetypeCount: number;
    packCount: number;
    partyTypeCount: number;
    tierCounts: Record<EnemyTier, number>;
    difficultyDistribution: Record<DifficultyBand, number>;
    roleDistribution: Partial<Record<EnemyRole, number>>;
}

interface Draw {
    rng: EncounterRNG;
    selector: EncounterSelector;
}

export class EncounterService {
    constructor(
        readonly registry: EnemyRegistry,
        private readonly partyTypes: ReadonlyMap<string, PartyType>,
        readonly config: EncounterConfig
    ) {}

    static fromConfig(config: EncounterConfig = loadEncounterConfig()): EncounterService {
        const registry = loadEnemyRegistry(config.contentDir);
        const partyTypes = loadPartyTypes(config.contentDir);
        log.info(`Ready: ${registry.archetypeCount} archetypes, ${registry.packCount} packs, ${partyTypes.size} party types`);
        return new EncounterService(registry, partyTypes, config);
    }

    private draw(seed?: string): Draw {
        const rng = createEncounterRNG(seed ?? this.config.seed ?? undefined);
        return { rng, selector: new EncounterSelector(this.registry, rng) };
    }

    // ═══════════════════════════════════════════════════════════════════════
    // CONTENT ACCESS
    // ═══════════════════════════════════════════════════════════════════════

    getArchetype(id: string): EnemyArchetype {
        return this.registry.getArchetype(id);
    }

    getPack(id: string): EnemyPackTemplate {
        return this.registry.getPack(id);
    }

    getPartyType(id: string): PartyType {
        const partyType = this.partyTypes.get(id);
        if (!partyType) {
            throw new NotFoundError('party type', id);
        }
        return partyType;
    }

    listPartyTypes(): PartyType[] {
        return [...this.partyTypes.values()];
    }

    /**
     * Archetypes matching every given criterion, in registration order
     */
    listArchetypes(filter: ArchetypeFilter = {}): EnemyArchetype[] {
        const min = filter.minDifficulty ?? Number.NEGATIVE_INFINITY;
        const max = filter.maxDifficulty ?? Number.POSITIVE_INFINITY;
        const floorIds = filter.floor === undefined
            ? null
            : new Set(this.registry.archetypesForFloor(filter.floor).map(a => a.id));

        return this.registry.listArchetypes().filter(a =>
            (filter.tag === undefined || a.tags.includes(filter.tag)) &&
            (filter.role === undefined || a.role === filter.role) &&
            (filter.tier === undefined || a.tier === filter.tier) &&
            (floorIds === null || floorIds.has(a.id)) &&
            a.difficultyLevel >= min &&
            a.difficultyLevel <= max
        );
    }

    listPacks(filter: PackFilter = {}): EnemyPackTemplate[] {
        return this.registry.listPacks().filter(p =>
            (filter.tier === undefined || p.tier === filter.tier) &&
            (filter.roomTag === undefined || p.preferredRoomTag === filter.roomTag) &&
            (filter.containing === undefined || p.memberArchIds.includes(filter.containing))
        );
    }

    describeArchetype(id: string): ArchetypeSummary {
        return summarizeArchetype(this.registry.getArchetype(id));
    }

    describePack(id: string): PackSummary {
        return summarizePack(this.registry.getPack(id), this.registry);
    }

    archetypeAtFloor(id: string, floor: number): ArchetypeAtFloor {
        return archetypeAtFloor(this.registry.getArchetype(id), floor);
    }

    computeScaledStats(archetypeId: string, floor: number): ScaledStats {
        return computeScaledStats(this.registry.getArchetype(archetypeId), floor);
    }

    // ═══════════════════════════════════════════════════════════════════════
    // SELECTION
    // ═══════════════════════════════════════════════════════════════════════

    chooseArchetypeForFloor(floor: number, roomTag: string | null = null, seed?: string): string {
        return this.draw(seed).selector.chooseArchetypeForFloor(floor, roomTag).id;
    }

    choosePackForFloor(floor: number, roomTag: string | null = null, seed?: string): EnemyPackTemplate {
        return this.draw(seed).selector.choosePackForFloor(floor, roomTag);
    }

    chooseArchetypeForPlayerLevel(
        level: number,
        preferredTags: readonly string[] = [],
        excludedTags: readonly string[] = [],
        seed?: string
    ): string {
        return this.draw(seed).selector.chooseArchetypeForPlayerLevel(level, preferredTags, excludedTags).id;
    }

    /**
     * A single unit of an archetype at a floor
     */
    spawnEnemy(archetypeId: string, floor: number, request: SpawnRequest = {}): SpawnedUnit {
        const archetype = this.registry.getArchetype(archetypeId);
        const unit = createSpawnedUnit(archetype, floor);
        const elite = request.elite ?? isEliteSpawn(floor, this.draw(request.seed).rng, this.config.eliteChance);
        return elite ? makeEnemyElite(unit) : unit;
    }

    // ═══════════════════════════════════════════════════════════════════════
    // ROOMS
    // ═══════════════════════════════════════════════════════════════════════

    /**
     * Roll one encounter per room tag on a single floor; uniques and the
     * per-floor cap carry across the rooms of one call.
     */
    rollFloorEncounters(floor: number, roomTags: ReadonlyArray<string | null>, seed?: string): RoomEncounter[] {
        const { rng, selector } = this.draw(seed);
        const builder = new RoomEncounterBuilder(this.registry, selector, rng, floor, {
            eliteChance: this.config.eliteChance,
            uniqueChance: this.config.uniqueChance,
            maxUniquePerFloor: this.config.maxUniquesPerFloor
        });
        return roomTags.map(tag => builder.rollRoom(tag));
    }

    rollRoomEncounter(floor: number, roomTag: string | null = null, seed?: string): RoomEncounter {
        const [encounter] = this.rollFloorEncounters(floor, [roomTag], seed);
        return encounter;
    }

    // ═══════════════════════════════════════════════════════════════════════
    // OVERWORLD
    // ═══════════════════════════════════════════════════════════════════════

    convertPartyToBattleUnits(
        party: RoamingPartyInput,
        partyType: PartyType,
        player: PlayerPartySnapshotInput,
        seed?: string
    ): SpawnedUnit[] {
        return this.convertParty(party, player, seed, partyType).units;
    }

    /**
     * Resolve the party's type from the catalog unless one is passed in
     */
    convertParty(
        partyInput: RoamingPartyInput,
        playerInput: PlayerPartySnapshotInput = {},
        seed?: string,
        partyTypeOverride?: PartyType
    ): PartyConversion {
        const party: RoamingParty = RoamingPartySchema.parse(partyInput);
        const player: PlayerPartySnapshot = PlayerPartySnapshotSchema.parse(playerInput);
        const partyType = partyTypeOverride ?? this.getPartyType(party.partyTypeId);

        const { rng, selector } = this.draw(seed);
        const converter = new EncounterConverter(this.registry, selector, rng);
        const alignment = effectiveAlignment(party, partyType, player);
        const units = converter.convertPartyToBattleUnits(party, partyType, player);

        return { alignment, side: alignment === 'friendly' ? 'ally' : 'enemy', units };
    }

    // ═══════════════════════════════════════════════════════════════════════
    // REPORTING
    // ═══════════════════════════════════════════════════════════════════════

    validate(): ValidationReport {
        return validateRegistry(this.registry);
    }

    stats(): EncounterStats {
        const tierCounts: Record<EnemyTier, number> = { 1: 0, 2: 0, 3: 0 };
        for (const archetype of this.registry.listArchetypes()) {
            tierCounts[archetype.tier] += 1;
        }
        return {
            archetypeCount: this.registry.archetypeCount,
            packCount: this.registry.packCount,
            partyTypeCount: this.partyTypes.size,
            tierCounts,
            difficultyDistribution: difficultyDistribution(this.registry),
            roleDistribution: roleDistribution(this.registry)
        };
    }
}

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULT INSTANCE
// ═══════════════════════════════════════════════════════════════════════════

let defaultService: EncounterService | null = null;

/**
 * Service over the configured content directory, loaded on first use
 */
export function getEncounterService(): EncounterService {
    if (!defaultService) {
        defaultService = EncounterService.fromConfig();
    }
    return defaultService;
}

export function setEncounterService(service: EncounterService | null): void {
    defaultService = service;
}
