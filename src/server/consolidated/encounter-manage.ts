/**
 * Consolidated Encounter Management Tool
 * Content lookup, stat scaling, selection, room rolls and party conversion in one tool
 */

import { z } from 'zod';
import {
    type ActionDefinition,
    type McpResponse,
    buildActionDescription,
    createActionRouter,
    defineAction,
    describeRouteFailure,
    formatMcpText
} from '../../utils/action-router.js';
import { isGuidingError, resolveIdentifier } from '../../utils/fuzzy-enum.js';
import {
    EnemyRoleSchema,
    EnemyTierSchema,
    type EnemyArchetype,
    PlayerPartySnapshotSchema,
    RoamingPartySchema
} from '../../schema/encounter.js';
import { applyEliteModifiers } from '../../engine/encounter/elite.js';
import { describeSynergies } from '../../engine/encounter/synergy.js';
import { type EncounterService, getEncounterService } from '../../services/encounter.service.js';
import type { SessionContext } from '../types.js';
import { RichFormatter } from '../utils/formatter.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('EncounterManage');

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

const ACTIONS = [
    'archetype', 'list', 'scale', 'choose_archetype', 'choose_pack',
    'roll_room', 'convert_party', 'validate', 'stats'
] as const;
type EncounterAction = typeof ACTIONS[number];

type EncounterActionResult = {
    title: string;
    body: string;
    data: Record<string, unknown>;
};

function resolveArchetype(service: EncounterService, identifier: string): EnemyArchetype {
    const result = resolveIdentifier(
        identifier,
        id => service.registry.findArchetype(id),
        () => service.registry.listArchetypes(),
        'archetype'
    );
    if (isGuidingError(result)) {
        throw new Error(result.message);
    }
    return result;
}

// ═══════════════════════════════════════════════════════════════════════════
// ACTION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

const floor = z.number().int().min(1).describe('Dungeon floor, 1-based');
const seed = z.string().min(1).optional().describe('Seed for reproducible draws');
const roomTag = z.string().min(1).nullable().optional().describe('Room tag such as graveyard, library, lair');

const ArchetypeSchema = z.object({
    id: z.string().min(1).describe('Archetype id or display name')
});

const ListSchema = z.object({
    kind: z.enum(['archetypes', 'packs', 'party_types']).default('archetypes'),
    tag: z.string().optional(),
    role: EnemyRoleSchema.optional(),
    tier: EnemyTierSchema.optional(),
    floor: floor.optional(),
    roomTag: z.string().optional(),
    containing: z.string().optional()
});

const ScaleSchema = z.object({
    id: z.string().min(1),
    floor,
    elite: z.boolean().default(false)
});

const ChooseArchetypeSchema = z.object({
    floor: floor.optional(),
    level: z.number().int().min(1).optional().describe('Player level; overworld pick instead of a floor pick'),
    roomTag,
    preferredTags: z.array(z.string()).default([]),
    excludedTags: z.array(z.string()).default([]),
    seed
}).refine(args => args.floor !== undefined || args.level !== undefined, {
    message: 'Provide a floor or a level',
    path: ['floor']
});

const ChoosePackSchema = z.object({
    floor,
    roomTag,
    seed
});

const RollRoomSchema = z.object({
    floor,
    roomTags: z.array(z.string().min(1).nullable()).min(1).default([null])
        .describe('One encounter is rolled per entry; null is an untagged room'),
    seed
});

const ConvertPartySchema = z.object({
    party: RoamingPartySchema,
    player: PlayerPartySnapshotSchema.default({}),
    seed
});

const EmptySchema = z.object({});

// ═══════════════════════════════════════════════════════════════════════════
// ACTION HANDLERS
// ═══════════════════════════════════════════════════════════════════════════

function handleArchetype(args: z.infer<typeof ArchetypeSchema>): EncounterActionResult {
    const service = getEncounterService();
    const archetype = resolveArchetype(service, args.id);
    const packs = service.listPacks({ containing: archetype.id }).map(p => p.id);

    return {
        title: archetype.name,
        body: RichFormatter.archetype(archetype) + RichFormatter.section('Packs') + RichFormatter.list(packs),
        data: { archetype: service.describeArchetype(archetype.id), packs }
    };
}

function handleList(args: z.infer<typeof ListSchema>): EncounterActionResult {
    const service = getEncounterService();

    if (args.kind === 'packs') {
        const packs = service.listPacks({ tier: args.tier, roomTag: args.roomTag, containing: args.containing });
        return {
            title: 'Enemy Packs',
            body: RichFormatter.table(
                ['ID', 'Tier', 'Members', 'Room'],
                packs.map(p => [p.id, p.tier, p.memberArchIds.join(', '), p.preferredRoomTag ?? '-'])
            ),
            data: { kind: args.kind, count: packs.length, packs }
        };
    }

    if (args.kind === 'party_types') {
        const partyTypes = service.listPartyTypes();
        return {
            title: 'Party Types',
            body: RichFormatter.table(
                ['ID', 'Alignment', 'Strength', 'Template'],
                partyTypes.map(p => [p.id, p.alignment, p.combatStrength, p.battleUnitTemplate ?? '-'])
            ),
            data: { kind: args.kind, count: partyTypes.length, partyTypes }
        };
    }

    const archetypes = service.listArchetypes({
        tag: args.tag,
        role: args.role,
        tier: args.tier,
        floor: args.floor
    });
    return {
        title: 'Enemy Archetypes',
        body: RichFormatter.table(
            ['ID', 'Role', 'Tier', 'Difficulty'],
            archetypes.map(a => [a.id, a.role, a.tier, a.difficultyLevel])
        ),
        data: { kind: args.kind, count: archetypes.length, archetypes: archetypes.map(a => a.id) }
    };
}

function handleScale(args: z.infer<typeof ScaleSchema>): EncounterActionResult {
    const service = getEncounterService();
    const archetype = resolveArchetype(service, args.id);
    const view = service.archetypeAtFloor(archetype.id, args.floor);
    const stats = { hp: view.hp, attack: view.attack, defense: view.defense, xp: view.xp, initiative: view.initiative };
    const elite = args.elite ? applyEliteModifiers(stats) : null;

    let body = RichFormatter.scaledStats(stats);
    if (elite) {
        body += RichFormatter.section('Elite') + RichFormatter.scaledStats({ ...elite, initiative: stats.initiative });
    }
    if (!view.canSpawn) {
        body += RichFormatter.alert(`${archetype.name} does not spawn on floor ${args.floor}`, 'warning');
    }

    return {
        title: `${archetype.name} @ Floor ${args.floor}`,
        body,
        data: { archetypeId: archetype.id, floor: args.floor, canSpawn: view.canSpawn, stats, elite }
    };
}

function handleChooseArchetype(args: z.infer<typeof ChooseArchetypeSchema>): EncounterActionResult {
    const service = getEncounterService();
    const archetypeId = args.level !== undefined
        ? service.chooseArchetypeForPlayerLevel(args.level, args.preferredTags, args.excludedTags, args.seed)
        : service.chooseArchetypeForFloor(args.floor ?? 1, args.roomTag ?? null, args.seed);
    const archetype = service.getArchetype(archetypeId);

    return {
        title: 'Archetype Chosen',
        body: RichFormatter.archetype(archetype),
        data: {
            archetypeId,
            floor: args.floor ?? null,
            level: args.level ?? null,
            roomTag: args.roomTag ?? null
        }
    };
}

function handleChoosePack(args: z.infer<typeof ChoosePackSchema>): EncounterActionResult {
    const service = getEncounterService();
    const pack = service.choosePackForFloor(args.floor, args.roomTag ?? null, args.seed);

    return {
        title: 'Pack Chosen',
        body: RichFormatter.pack(pack),
        data: { floor: args.floor, roomTag: args.roomTag ?? null, pack }
    };
}

function handleRollRoom(args: z.infer<typeof RollRoomSchema>): EncounterActionResult {
    const service = getEncounterService();
    const encounters = service.rollFloorEncounters(args.floor, args.roomTags, args.seed);

    let body = '';
    for (const encounter of encounters) {
        body += RichFormatter.section(`${encounter.roomTag ?? 'room'} (${encounter.source})`);
        body += RichFormatter.units(encounter.units);
        const synergies = describeSynergies(encounter.synergies);
        if (synergies.length > 0) {
            body += `Synergies: ${synergies.join(', ')}\n`;
        }
    }

    return {
        title: `Floor ${args.floor} Encounters`,
        body,
        data: {
            floor: args.floor,
            totalUnits: encounters.reduce((sum, e) => sum + e.units.length, 0),
            encounters
        }
    };
}

function handleConvertParty(args: z.infer<typeof ConvertPartySchema>): EncounterActionResult {
    const service = getEncounterService();
    const conversion = service.convertParty(args.party, args.player, args.seed);

    return {
        title: `${args.party.partyName ?? args.party.partyTypeId} (${conversion.alignment})`,
        body: RichFormatter.units(conversion.units),
        data: {
            partyId: args.party.partyId,
            alignment: conversion.alignment,
            side: conversion.side,
            count: conversion.units.length,
            units: conversion.units
        }
    };
}

function handleValidate(): EncounterActionResult {
    const report = getEncounterService().validate();

    let body = RichFormatter.keyValue({
        'Archetypes': `${report.archetypes.valid}/${report.archetypes.total} valid, ${report.archetypes.warningCount} warnings`,
        'Packs': `${report.packs.valid}/${report.packs.total} valid, ${report.packs.warningCount} warnings`,
        'Orphaned': report.orphanedArchetypes.count
    });
    body += report.overallValid
        ? RichFormatter.alert('Content is valid', 'success')
        : RichFormatter.alert('Content has errors', 'error');

    return { title: 'Content Validation', body, data: { report } };
}

function handleStats(): EncounterActionResult {
    const stats = getEncounterService().stats();

    return {
        title: 'Content Stats',
        body: RichFormatter.keyValue({
            'Archetypes': stats.archetypeCount,
            'Packs': stats.packCount,
            'Party Types': stats.partyTypeCount
        }) + RichFormatter.table(
            ['Band', 'Count'],
            Object.entries(stats.difficultyDistribution).map(([band, count]) => [band, count])
        ),
        data: { stats }
    };
}

// ═══════════════════════════════════════════════════════════════════════════
// ACTION ROUTER
// ═══════════════════════════════════════════════════════════════════════════

const definitions: Record<EncounterAction, ActionDefinition<EncounterActionResult>> = {
    archetype: defineAction(ArchetypeSchema, handleArchetype, {
        aliases: ['get', 'show', 'lookup', 'enemy'],
        description: 'Look up one archetype by id or name'
    }),
    list: defineAction(ListSchema, handleList, {
        aliases: ['search', 'browse', 'all'],
        description: 'List archetypes, packs or party types'
    }),
    scale: defineAction(ScaleSchema, handleScale, {
        aliases: ['stats_at', 'at_floor', 'scaled_stats'],
        description: 'Stats of an archetype at a floor'
    }),
    choose_archetype: defineAction(ChooseArchetypeSchema, handleChooseArchetype, {
        aliases: ['pick', 'pick_archetype', 'random_enemy'],
        description: 'Weighted archetype pick for a floor or player level'
    }),
    choose_pack: defineAction(ChoosePackSchema, handleChoosePack, {
        aliases: ['pack', 'pick_pack'],
        description: 'Weighted pack pick for a floor'
    }),
    roll_room: defineAction(RollRoomSchema, handleRollRoom, {
        aliases: ['room', 'roll', 'spawn', 'populate'],
        description: 'Roll encounters for rooms on one floor'
    }),
    convert_party: defineAction(ConvertPartySchema, handleConvertParty, {
        aliases: ['convert', 'party', 'battle'],
        description: 'Turn a roaming party into battle units'
    }),
    validate: defineAction(EmptySchema, handleValidate, {
        aliases: ['check', 'lint'],
        description: 'Validate loaded content'
    }),
    stats: defineAction(EmptySchema, handleStats, {
        aliases: ['summary', 'distribution'],
        description: 'Content counts and distributions'
    })
};

const router = createActionRouter({
    actions: ACTIONS,
    definitions,
    threshold: 0.6
});

// ═══════════════════════════════════════════════════════════════════════════
// TOOL DEFINITION & HANDLER
// ═══════════════════════════════════════════════════════════════════════════

export const EncounterManageTool = {
    name: 'encounter_manage',
    description: `Procedural enemy encounters for dungeon floors and overworld parties.

📖 CONTENT (archetype, list, validate, stats):
- archetype: id or display name, typos tolerated
- list: kind archetypes|packs|party_types, filter by tag, role, tier, floor, roomTag

📈 SCALING (scale):
- Stats at a floor; elite: true adds the elite variant

🎲 SELECTION (choose_archetype, choose_pack, roll_room):
- floor picks weight by room tag; level picks use preferredTags/excludedTags
- roll_room rolls one encounter per roomTags entry with uniques and synergies

🗺️ OVERWORLD (convert_party):
- party: { partyId, partyTypeId, partyName?, factionId? }
- player: { level, companionCount, hero, factionRelations }

Every drawing action takes an optional seed.

${buildActionDescription(ACTIONS, definitions)}`,
    inputSchema: z.object({
        action: z.string().describe(`Action: ${ACTIONS.join(', ')}`),
        id: z.string().optional(),
        kind: z.enum(['archetypes', 'packs', 'party_types']).optional(),
        tag: z.string().optional(),
        role: EnemyRoleSchema.optional(),
        tier: EnemyTierSchema.optional(),
        floor: z.number().int().optional(),
        level: z.number().int().optional(),
        roomTag: z.string().nullable().optional(),
        roomTags: z.array(z.string().nullable()).optional(),
        containing: z.string().optional(),
        preferredTags: z.array(z.string()).optional(),
        excludedTags: z.array(z.string()).optional(),
        elite: z.boolean().optional(),
        party: RoamingPartySchema.optional(),
        player: PlayerPartySnapshotSchema.optional(),
        seed: z.string().optional()
    })
};

function toArgs(args: unknown): Record<string, unknown> {
    if (typeof args !== 'object' || args === null || Array.isArray(args)) {
        return {};
    }
    return Object.fromEntries(Object.entries(args));
}

export async function handleEncounterManage(args: unknown, ctx: SessionContext): Promise<McpResponse> {
    const outcome = await router(toArgs(args));

    if (outcome.kind !== 'success') {
        const payload = describeRouteFailure(outcome) ?? {};
        log.warn(`[${ctx.sessionId}] ${outcome.kind}: ${String(payload.message)}`);

        let output = RichFormatter.header('Error', '');
        output += RichFormatter.alert(String(payload.message), 'error');
        if (outcome.kind === 'invalid_action') {
            output += '\n**Did you mean:**\n';
            for (const s of outcome.guidance.suggestions) {
                output += `  - ${s.value} (${s.similarity}% match)\n`;
            }
        }
        output += RichFormatter.embedJson(payload, 'ENCOUNTER_MANAGE');
        return formatMcpText(output);
    }

    const { title, body, data } = outcome.result;
    const json: Record<string, unknown> = { success: true, actionType: outcome.action, ...data };
    if (outcome.fuzzyMatch) {
        json._fuzzyMatch = outcome.fuzzyMatch;
    }

    let output = RichFormatter.header(title);
    output += body;
    output += RichFormatter.embedJson(json, 'ENCOUNTER_MANAGE');
    return formatMcpText(output);
}
