import type {
    EnemyArchetype,
    PartyType,
    PlayerPartySnapshot,
    RoamingParty,
    ScalingCategory,
    SpawnedUnit
} from '../../schema/encounter.js';
import { type Strategy, firstSuccess } from '../../utils/fallback.js';
import { createLogger } from '../../utils/logger.js';
import { EmptyRegistryError } from './errors.js';
import type { EnemyRegistry } from './registry.js';
import type { EncounterRNG } from './rng.js';
import { DEFAULT_ALLY_COLOR, copyColor, createSpawnedUnit } from './scaling.js';
import type { EncounterSelector } from './selection.js';

const log = createLogger('Conversion');

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const MIN_ENEMIES = 1;
export const MAX_ENEMIES = 8;

const SWARM_PARTY_TYPES: ReadonlySet<string> = new Set(['goblin', 'wolf', 'monster', 'rat']);
const ELITE_PARTY_TYPES: ReadonlySet<string> = new Set(['knight', 'boss', 'guard', 'noble']);

/** Last-resort archetype per combat strength */
export const LEGACY_STRENGTH_ARCHETYPES: Readonly<Record<number, string>> = {
    1: 'goblin_skirmisher',
    2: 'bandit_cutthroat',
    3: 'orc_raider',
    4: 'dread_knight',
    5: 'dragonkin'
};

/** Faction relation beyond which a party's stance flips */
const RELATION_THRESHOLD = 50;

export type EffectiveAlignment = 'friendly' | 'neutral' | 'hostile';

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function clamp(value: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, value));
}

function titleCase(id: string): string {
    return id.replace(/[a-z]+/gi, word => word[0].toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Label stem for a party's units: the first word of its name, or the
 * title-cased type id when it has none.
 */
export function unitLabelStem(party: RoamingParty): string {
    const firstWord = party.partyName?.trim().split(/\s+/)[0];
    return firstWord ? firstWord : titleCase(party.partyTypeId);
}

export function scalingCategoryFor(partyType: PartyType): ScalingCategory {
    if (partyType.scalingCategory) return partyType.scalingCategory;
    if (SWARM_PARTY_TYPES.has(partyType.id)) return 'swarm';
    if (ELITE_PARTY_TYPES.has(partyType.id)) return 'elite';
    return 'standard';
}

/**
 * Hostile types stay hostile. Other types follow the player's standing with
 * the party's faction when there is one on record.
 */
export function effectiveAlignment(
    party: RoamingParty,
    partyType: PartyType,
    player: PlayerPartySnapshot
): EffectiveAlignment {
    if (partyType.alignment === 'hostile') return 'hostile';

    const relation = party.factionId === null ? undefined : player.factionRelations[party.factionId];
    if (relation === undefined) {
        return partyType.alignment;
    }

    if (relation < -RELATION_THRESHOLD) return 'hostile';
    if (relation > RELATION_THRESHOLD) return 'friendly';
    return partyType.alignment === 'friendly' ? 'neutral' : partyType.alignment;
}

export function playerPartySize(player: PlayerPartySnapshot): number {
    return Math.max(2, 1 + player.companionCount);
}

/**
 * Ally stat factors, linear in combat strength from 1 to 5
 */
export function allyStatFactors(combatStrength: number): { hp: number; attack: number; defense: number } {
    const t = (clamp(combatStrength, 1, 5) - 1) / 4;
    return {
        hp: 0.7 + 0.5 * t,
        attack: 0.6 + 0.5 * t,
        defense: 0.8 + 0.5 * t
    };
}

export function deflateXp(xp: number, enemyCount: number): number {
    if (enemyCount <= 1) return Math.max(1, xp);
    return Math.max(1, Math.trunc(xp / (1 + (enemyCount - 1) * 0.3)));
}

// ═══════════════════════════════════════════════════════════════════════════
// CONVERTER
// ═══════════════════════════════════════════════════════════════════════════

export interface ArchetypeResolution {
    archetype: EnemyArchetype;
    strategy: string;
}

/**
 * Turns roaming overworld parties into battle units sized to the player's party.
 */
export class EncounterConverter {
    constructor(
        private readonly registry: EnemyRegistry,
        private readonly selector: EncounterSelector,
        private readonly rng: EncounterRNG
    ) {}

    /**
     * Enemy count for a party, scaled by the player's party size and clamped to [1, 8]
     */
    calculateEnemyCount(partySize: number, combatStrength: number, category: ScalingCategory = 'standard'): number {
        const effectiveSize = Math.max(2, partySize);
        const baseCount = this.rng.randint(1, 3 + (combatStrength - 1));

        let additional = 0;
        const extraMembers = effectiveSize - 2;
        if (extraMembers > 0) {
            const perMember = this.rng.uniform(1.0, 2.0);
            const variation = this.rng.uniform(-0.3, 0.3);
            additional = Math.max(0, Math.floor(extraMembers * (perMember + variation)));
        }

        let total = clamp(baseCount + additional, MIN_ENEMIES, MAX_ENEMIES);

        if (category === 'swarm') {
            total = Math.trunc(total * 1.5);
        } else if (category === 'elite') {
            total = Math.max(1, Math.trunc(total * 0.75));
        }

        return clamp(total, MIN_ENEMIES, MAX_ENEMIES);
    }

    /**
     * Archetype for a party's units. Tries the type's template, then a
     * level-appropriate pick, then the strength table, then anything registered.
     */
    resolveArchetype(partyType: PartyType, playerLevel: number): ArchetypeResolution {
        const strategies: Array<Strategy<null, EnemyArchetype>> = [];

        const template = partyType.battleUnitTemplate;
        if (template !== null) {
            strategies.push({ name: 'battle-unit-template', attempt: () => this.registry.getArchetype(template) });
        }
        strategies.push(
            {
                name: 'player-level',
                attempt: () => this.selector.chooseArchetypeForPlayerLevel(playerLevel)
            },
            {
                name: 'strength-table',
                attempt: () => this.registry.getArchetype(
                    LEGACY_STRENGTH_ARCHETYPES[partyType.combatStrength] ?? LEGACY_STRENGTH_ARCHETYPES[2]
                )
            },
            {
                name: 'any-registered',
                attempt: () => this.registry.listArchetypes()[0] ?? null
            }
        );

        const chain = firstSuccess(strategies, miss =>
            log.warn(`Party type "${partyType.id}": ${miss.strategy} failed (${miss.reason}), trying next`)
        );
        const outcome = chain(null);
        if (!outcome) {
            throw new EmptyRegistryError(`No archetype available for party type "${partyType.id}"`);
        }
        return { archetype: outcome.value, strategy: outcome.strategy };
    }

    /**
     * Enemy units for a party, or ally units when it is friendly to the player.
     */
    convertPartyToBattleUnits(party: RoamingParty, partyType: PartyType, player: PlayerPartySnapshot): SpawnedUnit[] {
        const alignment = effectiveAlignment(party, partyType, player);
        if (alignment === 'friendly') {
            return this.alliedPartyToBattleUnits(party, partyType, player);
        }
        return this.partyToBattleEnemies(party, partyType, player);
    }

    partyToBattleEnemies(party: RoamingParty, partyType: PartyType, player: PlayerPartySnapshot): SpawnedUnit[] {
        const count = this.calculateEnemyCount(
            playerPartySize(player),
            partyType.combatStrength,
            scalingCategoryFor(partyType)
        );
        const { archetype, strategy } = this.resolveArchetype(partyType, player.level);
        const stem = unitLabelStem(party);

        log.debug(`Party ${party.partyId}: ${count} x ${archetype.id} via ${strategy}`);

        const units: SpawnedUnit[] = [];
        for (let i = 0; i < count; i++) {
            const unit = createSpawnedUnit(archetype, player.level, {
                id: `${party.partyId}-${i + 1}`,
                label: `${stem} ${i + 1}`,
                partyId: party.partyId,
                partyTypeId: party.partyTypeId
            });
            unit.xp = deflateXp(unit.xp, count);
            units.push(unit);
        }
        return units;
    }

    /**
     * One or two allies modelled on the hero rather than an archetype
     */
    alliedPartyToBattleUnits(party: RoamingParty, partyType: PartyType, player: PlayerPartySnapshot): SpawnedUnit[] {
        const count = Math.min(2, Math.max(1, partyType.combatStrength));
        const factors = allyStatFactors(partyType.combatStrength);
        const hero = player.hero;

        const allies: SpawnedUnit[] = [];
        for (let i = 0; i < count; i++) {
            const maxHp = Math.max(1, Math.trunc(hero.maxHp * factors.hp));
            const name = `${partyType.name} Ally ${i + 1}`;
            allies.push({
                id: `${party.partyId}-ally-${i + 1}`,
                archetypeId: null,
                name,
                originalName: null,
                label: name,
                side: 'ally',
                role: 'Ally',
                aiProfile: 'defender',
                floor: player.level,

                maxHp,
                hp: maxHp,
                attack: Math.max(1, Math.trunc(hero.attack * factors.attack)),
                defense: Math.max(0, Math.trunc(hero.defense * factors.defense)),
                xp: 0,
                initiative: hero.initiative,
                skillPower: hero.skillPower,

                skillIds: ['guard'],
                tags: [],
                resistances: {},
                uniqueMechanics: [],

                isElite: false,
                isUnique: false,
                color: copyColor(DEFAULT_ALLY_COLOR),

                partyId: party.partyId,
                partyTypeId: party.partyTypeId
            });
        }
        return allies;
    }
}
