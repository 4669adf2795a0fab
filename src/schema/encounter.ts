import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// ENUMS
// ═══════════════════════════════════════════════════════════════════════════

export const EnemyRoleSchema = z.enum([
    'Skirmisher',
    'Brute',
    'Elite Brute',
    'Invoker',
    'Elite Invoker',
    'Support',
    'Elite Support'
]);
export type EnemyRole = z.infer<typeof EnemyRoleSchema>;

export const EnemyTierSchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);
export type EnemyTier = z.infer<typeof EnemyTierSchema>;

export const PartyAlignmentSchema = z.enum(['friendly', 'neutral', 'hostile']);
export type PartyAlignment = z.infer<typeof PartyAlignmentSchema>;

export const ScalingCategorySchema = z.enum(['swarm', 'elite', 'standard']);
export type ScalingCategory = z.infer<typeof ScalingCategorySchema>;

export const UnitSideSchema = z.enum(['enemy', 'ally']);
export type UnitSide = z.infer<typeof UnitSideSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// TIER DEFAULTS
// ═══════════════════════════════════════════════════════════════════════════

export const TIER_DIFFICULTY: Record<EnemyTier, number> = { 1: 20, 2: 50, 3: 80 };
export const TIER_SPAWN_MIN: Record<EnemyTier, number> = { 1: 1, 2: 3, 3: 5 };
export const TIER_SPAWN_MAX: Record<EnemyTier, number | null> = { 1: 3, 2: 6, 3: null };
export const TIER_TAG: Record<EnemyTier, string> = { 1: 'early_game', 2: 'mid_game', 3: 'late_game' };

/** Tier band a difficulty level falls into (1-30, 31-69, 70+). */
export function tierForDifficulty(difficulty: number): EnemyTier {
    if (difficulty <= 30) return 1;
    if (difficulty <= 69) return 2;
    return 3;
}

/** 'Elite Brute' -> 'elite_brute' */
export function roleTag(role: EnemyRole): string {
    return role.toLowerCase().replace(/\s+/g, '_');
}

// ═══════════════════════════════════════════════════════════════════════════
// ENEMY ARCHETYPE
// ═══════════════════════════════════════════════════════════════════════════

const rate = z.number().nonnegative();

export const EnemyArchetypeInputSchema = z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    role: EnemyRoleSchema,
    tier: EnemyTierSchema.optional(),
    aiProfile: z.string().min(1),

    baseHp: z.number().positive(),
    hpPerFloor: rate,
    baseAttack: z.number().positive(),
    atkPerFloor: rate,
    baseDefense: z.number().nonnegative(),
    defPerFloor: rate,
    baseXp: z.number().nonnegative(),
    xpPerFloor: rate,
    baseInitiative: z.number().default(10),
    initPerFloor: rate.default(0),

    skillIds: z.array(z.string()).default([]),

    difficultyLevel: z.number().positive().optional(),
    spawnMinFloor: z.number().int().min(1).optional(),
    spawnMaxFloor: z.number().int().min(1).nullable().optional(),
    spawnWeight: z.number().nonnegative().default(1.0),
    tags: z.array(z.string()).optional(),

    uniqueMechanics: z.array(z.string()).default([]),
    resistances: z.record(z.string(), z.number().nonnegative()).default({})
});

/**
 * Archetype with every derived field resolved.
 *
 * Omitted difficulty, spawn range and tags are filled from the tier; an
 * omitted tier is derived from the difficulty. At least one must be given.
 */
export const EnemyArchetypeSchema = EnemyArchetypeInputSchema
    .transform((input, ctx) => {
        const { tier: rawTier, difficultyLevel: rawDifficulty, ...rest } = input;

        if (rawTier === undefined && rawDifficulty === undefined) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['difficultyLevel'],
                message: `Archetype "${input.id}" needs a tier or a difficultyLevel`
            });
            return z.NEVER;
        }

        const tier = rawTier ?? tierForDifficulty(rawDifficulty ?? 0);
        const difficultyLevel = rawDifficulty ?? TIER_DIFFICULTY[tier];
        const spawnMinFloor = input.spawnMinFloor ?? TIER_SPAWN_MIN[tier];
        const spawnMaxFloor = input.spawnMaxFloor === undefined ? TIER_SPAWN_MAX[tier] : input.spawnMaxFloor;
        const tags = input.tags ?? [TIER_TAG[tier], roleTag(input.role)];

        if (spawnMaxFloor !== null && spawnMinFloor > spawnMaxFloor) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['spawnMaxFloor'],
                message: `spawnMinFloor (${spawnMinFloor}) exceeds spawnMaxFloor (${spawnMaxFloor})`
            });
            return z.NEVER;
        }

        return { ...rest, tier, difficultyLevel, spawnMinFloor, spawnMaxFloor, tags };
    });

export type EnemyArchetypeInput = z.input<typeof EnemyArchetypeSchema>;
export type EnemyArchetypeData = z.output<typeof EnemyArchetypeSchema>;

/** A registered archetype, frozen down to its lists and resistance map */
export type EnemyArchetype = Readonly<Omit<EnemyArchetypeData, 'tags' | 'skillIds' | 'uniqueMechanics' | 'resistances'>> & {
    readonly tags: readonly string[];
    readonly skillIds: readonly string[];
    readonly uniqueMechanics: readonly string[];
    readonly resistances: Readonly<Record<string, number>>;
};

// ═══════════════════════════════════════════════════════════════════════════
// ENEMY PACK TEMPLATE
// ═══════════════════════════════════════════════════════════════════════════

export const EnemyPackTemplateSchema = z.object({
    id: z.string().min(1),
    name: z.string().default(''),
    tier: EnemyTierSchema,
    memberArchIds: z.array(z.string().min(1)).min(1, 'A pack needs at least one member'),
    preferredRoomTag: z.string().nullable().default(null),
    weight: z.number().positive().default(1.0)
});

export type EnemyPackTemplateInput = z.input<typeof EnemyPackTemplateSchema>;
export type EnemyPackTemplateData = z.output<typeof EnemyPackTemplateSchema>;
export type EnemyPackTemplate = Readonly<Omit<EnemyPackTemplateData, 'memberArchIds'>> & {
    readonly memberArchIds: readonly string[];
};

// ═══════════════════════════════════════════════════════════════════════════
// OVERWORLD INPUTS
// ═══════════════════════════════════════════════════════════════════════════

export const PartyTypeSchema = z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    alignment: PartyAlignmentSchema,
    combatStrength: z.number().int().min(1).max(5).default(1),
    battleUnitTemplate: z.string().nullable().default(null),
    /** Overrides the id-based swarm/elite lookup used when sizing a battle. */
    scalingCategory: ScalingCategorySchema.optional()
});

export type PartyTypeInput = z.input<typeof PartyTypeSchema>;
export type PartyType = z.output<typeof PartyTypeSchema>;

export const RoamingPartySchema = z.object({
    partyId: z.string().min(1),
    partyTypeId: z.string().min(1),
    partyName: z.string().nullable().default(null),
    factionId: z.string().nullable().default(null)
});

export type RoamingPartyInput = z.input<typeof RoamingPartySchema>;
export type RoamingParty = z.output<typeof RoamingPartySchema>;

export const HeroStatsSchema = z.object({
    maxHp: z.number().int().positive().default(30),
    attack: z.number().int().nonnegative().default(5),
    defense: z.number().int().nonnegative().default(0),
    skillPower: z.number().nonnegative().default(1.0),
    initiative: z.number().int().default(10)
});

export type HeroStats = z.output<typeof HeroStatsSchema>;

export const PlayerPartySnapshotSchema = z.object({
    level: z.number().int().min(1).default(1),
    companionCount: z.number().int().nonnegative().default(1),
    hero: HeroStatsSchema.default({}),
    factionRelations: z.record(z.string(), z.number().min(-100).max(100)).default({})
});

export type PlayerPartySnapshotInput = z.input<typeof PlayerPartySnapshotSchema>;
export type PlayerPartySnapshot = z.output<typeof PlayerPartySnapshotSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// SPAWNED UNIT
// ═══════════════════════════════════════════════════════════════════════════

export const RgbSchema = z.tuple([
    z.number().int().min(0).max(255),
    z.number().int().min(0).max(255),
    z.number().int().min(0).max(255)
]);
export type Rgb = z.infer<typeof RgbSchema>;

export const SpawnedUnitSchema = z.object({
    id: z.string(),
    archetypeId: z.string().nullable(),
    name: z.string(),
    originalName: z.string().nullable(),
    label: z.string().nullable(),
    side: UnitSideSchema,
    role: z.string(),
    aiProfile: z.string(),
    floor: z.number().int().min(1),

    maxHp: z.number().int(),
    hp: z.number().int(),
    attack: z.number().int(),
    defense: z.number().int(),
    xp: z.number().int(),
    initiative: z.number().int(),
    skillPower: z.number(),

    skillIds: z.array(z.string()),
    tags: z.array(z.string()),
    resistances: z.record(z.string(), z.number()),
    uniqueMechanics: z.array(z.string()),

    isElite: z.boolean(),
    isUnique: z.boolean(),
    color: RgbSchema,

    partyId: z.string().nullable(),
    partyTypeId: z.string().nullable()
});

export type SpawnedUnit = z.infer<typeof SpawnedUnitSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// CONTENT FILES
// ═══════════════════════════════════════════════════════════════════════════

export const EnemyContentFileSchema = z.object({
    archetypes: z.array(EnemyArchetypeInputSchema),
    packs: z.array(EnemyPackTemplateSchema).default([])
});

export const PartyTypeFileSchema = z.object({
    partyTypes: z.array(PartyTypeSchema)
});
