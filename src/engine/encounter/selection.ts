import type { EnemyArchetype, EnemyPackTemplate, EnemyTier } from '../../schema/encounter.js';
import { type FallbackChain, type Strategy, firstSuccess, nonEmpty } from '../../utils/fallback.js';
import { createLogger } from '../../utils/logger.js';
import { EmptyRegistryError } from './errors.js';
import { type EnemyRegistry, isFloorEligible } from './registry.js';
import type { EncounterRNG } from './rng.js';

const log = createLogger('Selection');

// ═══════════════════════════════════════════════════════════════════════════
// FLOOR HELPERS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Legacy three-band tier for a floor: 1-2, 3-4, 5+
 */
export function tierForFloor(floor: number): EnemyTier {
    if (floor <= 2) return 1;
    if (floor <= 4) return 2;
    return 3;
}

/**
 * Difficulty window for a floor. Floor 1 centres on 10 and every floor
 * adds 9, clamped to [1, 100].
 */
export function floorToDifficultyRange(floor: number, spread: number = 15): [number, number] {
    const base = 10 + (floor - 1) * 9;
    return [Math.max(1, base - spread), Math.min(100, base + spread)];
}

export const SYNTHETIC_PACK_PREFIX = '_single_';

export function isSyntheticPack(pack: EnemyPackTemplate): boolean {
    return pack.id.startsWith(SYNTHETIC_PACK_PREFIX);
}

// ═══════════════════════════════════════════════════════════════════════════
// ROOM WEIGHTING
// ═══════════════════════════════════════════════════════════════════════════

interface RoomBonus {
    roomTag: string;
    bonus: number;
    applies(archetype: EnemyArchetype): boolean;
}

const ROOM_BONUSES: readonly RoomBonus[] = [
    { roomTag: 'lair', bonus: 1.0, applies: a => a.role === 'Brute' || a.role === 'Elite Brute' },
    { roomTag: 'event', bonus: 0.7, applies: a => a.role === 'Invoker' || a.role === 'Support' },
    { roomTag: 'graveyard', bonus: 1.5, applies: a => a.tags.includes('undead') },
    { roomTag: 'sanctum', bonus: 1.5, applies: a => a.tags.includes('holy') },
    { roomTag: 'lair', bonus: 1.0, applies: a => a.tags.includes('beast') }
];

/**
 * Spawn weight plus every room bonus that applies; bonuses stack.
 */
export function archetypeWeightForRoom(archetype: EnemyArchetype, roomTag: string | null): number {
    let weight = archetype.spawnWeight;
    for (const rule of ROOM_BONUSES) {
        if (rule.roomTag === roomTag && rule.applies(archetype)) {
            weight += rule.bonus;
        }
    }
    return weight;
}

export function packWeightForRoom(pack: EnemyPackTemplate, roomTag: string | null): number {
    return pack.preferredRoomTag === roomTag ? pack.weight + 1.0 : pack.weight;
}

function hasAnyTag(archetype: EnemyArchetype, tags: readonly string[]): boolean {
    return tags.some(tag => archetype.tags.includes(tag));
}

// ═══════════════════════════════════════════════════════════════════════════
// SELECTOR
// ═══════════════════════════════════════════════════════════════════════════

export interface PlayerLevelQuery {
    level: number;
    preferredTags: readonly string[];
    excludedTags: readonly string[];
}

/**
 * Weighted archetype and pack selection for floors and overworld levels.
 *
 * "No candidates" is an ordinary branch: each entry point walks a fallback
 * chain and only fails when the registry holds no archetypes at all.
 */
export class EncounterSelector {
    private readonly floorCandidates: FallbackChain<number, EnemyArchetype[]>;
    private readonly levelCandidates: FallbackChain<PlayerLevelQuery, EnemyArchetype[]>;

    constructor(private readonly registry: EnemyRegistry, private readonly rng: EncounterRNG) {
        const tierBand: Strategy<number, EnemyArchetype[]> = {
            name: 'tier-band',
            attempt: floor => nonEmpty(this.registry.archetypesByTier(tierForFloor(floor)))
        };
        const everything: Strategy<unknown, EnemyArchetype[]> = {
            name: 'full-registry',
            attempt: () => nonEmpty(this.registry.listArchetypes())
        };

        this.floorCandidates = firstSuccess<number, EnemyArchetype[]>(
            [
                { name: 'floor-eligible', attempt: floor => nonEmpty(this.registry.archetypesForFloor(floor)) },
                tierBand,
                everything
            ],
            miss => log.debug(`Floor candidates: ${miss.strategy} found nothing`)
        );

        this.levelCandidates = firstSuccess<PlayerLevelQuery, EnemyArchetype[]>(
            [
                {
                    name: 'preferred-tags',
                    attempt: q => q.preferredTags.length === 0 ? null : nonEmpty(
                        this.registry.archetypesForFloor(q.level)
                            .filter(a => hasAnyTag(a, q.preferredTags) && !hasAnyTag(a, q.excludedTags))
                    )
                },
                {
                    name: 'floor-eligible',
                    attempt: q => nonEmpty(
                        this.registry.archetypesForFloor(q.level).filter(a => !hasAnyTag(a, q.excludedTags))
                    )
                },
                { name: 'tier-band', attempt: q => tierBand.attempt(q.level) },
                everything
            ],
            miss => log.debug(`Level candidates: ${miss.strategy} found nothing`)
        );
    }

    /**
     * Candidate pool for a floor before weighting
     */
    candidatesForFloor(floor: number): EnemyArchetype[] {
        const outcome = this.floorCandidates(floor);
        if (!outcome) {
            throw new EmptyRegistryError();
        }
        return outcome.value;
    }

    chooseArchetypeForFloor(floor: number, roomTag: string | null = null): EnemyArchetype {
        const candidates = this.candidatesForFloor(floor);
        const weights = candidates.map(a => archetypeWeightForRoom(a, roomTag));
        return this.rng.weightedChoice(candidates, weights);
    }

    /**
     * A pack of the floor's tier whose members can all spawn here, or a
     * single-member pseudo-pack when there is none.
     */
    choosePackForFloor(floor: number, roomTag: string | null = null): EnemyPackTemplate {
        const tier = tierForFloor(floor);
        const candidates = this.registry.packsByTier(tier).filter(pack =>
            pack.memberArchIds.every(id => {
                const member = this.registry.findArchetype(id);
                return member !== null && isFloorEligible(member, floor);
            })
        );

        if (candidates.length === 0) {
            log.debug(`No tier ${tier} pack fits floor ${floor}; wrapping a single archetype`);
            const archetype = this.chooseArchetypeForFloor(floor, roomTag);
            return {
                id: `${SYNTHETIC_PACK_PREFIX}${archetype.id}`,
                name: archetype.name,
                tier: archetype.tier,
                memberArchIds: [archetype.id],
                preferredRoomTag: roomTag,
                weight: 1.0
            };
        }

        const weights = candidates.map(p => packWeightForRoom(p, roomTag));
        return this.rng.weightedChoice(candidates, weights);
    }

    /**
     * Overworld pick using the player's level in place of a floor.
     * Tag preference narrows the floor-eligible pool when it can; exclusions
     * apply to the floor-eligible passes only.
     */
    chooseArchetypeForPlayerLevel(
        level: number,
        preferredTags: readonly string[] = [],
        excludedTags: readonly string[] = []
    ): EnemyArchetype {
        const outcome = this.levelCandidates({ level, preferredTags, excludedTags });
        if (!outcome) {
            throw new EmptyRegistryError();
        }
        const candidates = outcome.value;
        return this.rng.weightedChoice(candidates, candidates.map(a => a.spawnWeight));
    }
}
