import type { SpawnedUnit } from '../../schema/encounter.js';
import { createLogger } from '../../utils/logger.js';
import { BASE_ELITE_SPAWN_CHANCE, isEliteSpawn, makeEnemyElite } from './elite.js';
import type { EnemyRegistry } from './registry.js';
import type { EncounterRNG } from './rng.js';
import { createSpawnedUnit } from './scaling.js';
import type { EncounterSelector } from './selection.js';
import { type SynergyBundle, applySynergies, neutralSynergies } from './synergy.js';

const log = createLogger('RoomEncounter');

/**
 * Room-themed unique enemies. Each can appear at most once per floor.
 */
export const UNIQUE_ROOM_ENEMIES: Readonly<Record<string, readonly string[]>> = {
    graveyard: ['grave_warden'],
    sanctum: ['sanctum_guardian'],
    lair: ['pit_champion'],
    treasure: ['hoard_mimic'],
    library: ['arcane_golem'],
    armory: ['animated_armor']
};

export interface RoomEncounterOptions {
    eliteChance: number;
    uniqueChance: number;
    maxUniquePerFloor: number;
    /** Spawning stops once a floor holds this many enemies */
    maxEnemiesPerFloor: number;
}

export const DEFAULT_ROOM_ENCOUNTER_OPTIONS: RoomEncounterOptions = {
    eliteChance: BASE_ELITE_SPAWN_CHANCE,
    uniqueChance: 0.15,
    maxUniquePerFloor: 2,
    maxEnemiesPerFloor: 12
};

export type RoomEncounterSource = 'unique' | 'pack' | 'capped';

export interface RoomEncounter {
    floor: number;
    roomTag: string | null;
    source: RoomEncounterSource;
    packId: string | null;
    units: SpawnedUnit[];
    synergies: SynergyBundle;
}

/**
 * Rolls encounters room by room for a single floor, tracking which uniques
 * have appeared and how many enemies the floor already holds.
 */
export class RoomEncounterBuilder {
    private readonly options: RoomEncounterOptions;
    private readonly spawnedUniques = new Set<string>();
    private spawnedTotal = 0;
    private sequence = 0;

    constructor(
        private readonly registry: EnemyRegistry,
        private readonly selector: EncounterSelector,
        private readonly rng: EncounterRNG,
        readonly floor: number,
        options: Partial<RoomEncounterOptions> = {}
    ) {
        this.options = { ...DEFAULT_ROOM_ENCOUNTER_OPTIONS, ...options };
    }

    get totalSpawned(): number {
        return this.spawnedTotal;
    }

    get uniqueIds(): string[] {
        return [...this.spawnedUniques];
    }

    rollRoom(roomTag: string | null = null): RoomEncounter {
        if (this.spawnedTotal >= this.options.maxEnemiesPerFloor) {
            return this.finish(roomTag, 'capped', null, []);
        }

        const unique = this.tryUnique(roomTag);
        if (unique) {
            return this.finish(roomTag, 'unique', null, [unique]);
        }

        const pack = this.selector.choosePackForFloor(this.floor, roomTag);
        const units: SpawnedUnit[] = [];

        for (const memberId of pack.memberArchIds) {
            if (this.spawnedTotal + units.length >= this.options.maxEnemiesPerFloor) break;

            const archetype = this.registry.findArchetype(memberId)
                ?? this.selector.chooseArchetypeForFloor(this.floor, roomTag);
            const unit = createSpawnedUnit(archetype, this.floor, { id: this.nextId() });

            if (isEliteSpawn(this.floor, this.rng, this.options.eliteChance)) {
                makeEnemyElite(unit);
            }
            units.push(unit);
        }

        return this.finish(roomTag, 'pack', pack.id, units);
    }

    private tryUnique(roomTag: string | null): SpawnedUnit | null {
        const pool = roomTag === null ? undefined : UNIQUE_ROOM_ENEMIES[roomTag];
        if (!pool || this.spawnedUniques.size >= this.options.maxUniquePerFloor) return null;
        if (!this.rng.chance(this.options.uniqueChance)) return null;

        const available = pool.filter(id => !this.spawnedUniques.has(id));
        if (available.length === 0) return null;

        const uniqueId = this.rng.choice(available);
        const archetype = this.registry.findArchetype(uniqueId);
        if (!archetype) {
            log.warn(`Unique "${uniqueId}" is not registered; using a floor pick`);
        }

        const unit = createSpawnedUnit(
            archetype ?? this.selector.chooseArchetypeForFloor(this.floor, roomTag),
            this.floor,
            { id: this.nextId(), isUnique: true }
        );
        makeEnemyElite(unit);
        this.spawnedUniques.add(uniqueId);
        return unit;
    }

    private finish(
        roomTag: string | null,
        source: RoomEncounterSource,
        packId: string | null,
        units: SpawnedUnit[]
    ): RoomEncounter {
        this.spawnedTotal += units.length;
        const synergies = units.length > 0 ? applySynergies(units) : neutralSynergies();
        return { floor: this.floor, roomTag, source, packId, units, synergies };
    }

    private nextId(): string {
        this.sequence += 1;
        return `f${this.floor}-${this.sequence}`;
    }
}
