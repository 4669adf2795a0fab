import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import {
    EnemyContentFileSchema,
    type PartyType,
    PartyTypeFileSchema
} from '../schema/encounter.js';
import { ContentValidationError, DuplicateRegistrationError, NotFoundError } from '../engine/encounter/errors.js';
import { difficultyDistribution } from '../engine/encounter/analytics.js';
import { EnemyRegistry } from '../engine/encounter/registry.js';
import { createLogger, createTimer, getErrorMessage, logObject } from '../utils/logger.js';

const log = createLogger('Content');

export const ENEMY_CONTENT_FILE = 'enemies.json';
export const PARTY_TYPE_FILE = 'party-types.json';

function readJson(path: string): unknown {
    let raw: string;
    try {
        raw = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new ContentValidationError(path, [{ path: '', message: `Cannot read file: ${getErrorMessage(error)}` }]);
    }
    try {
        return JSON.parse(raw);
    } catch (error) {
        throw new ContentValidationError(path, [{ path: '', message: `Malformed JSON: ${getErrorMessage(error)}` }]);
    }
}

function parseContent<T extends z.ZodTypeAny>(schema: T, data: unknown, source: string): z.output<T> {
    const result = schema.safeParse(data);
    if (!result.success) {
        throw new ContentValidationError(
            source,
            result.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
        );
    }
    return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════
// ENEMIES
// ═══════════════════════════════════════════════════════════════════════════

export interface EnemyContentCounts {
    archetypes: number;
    packs: number;
}

/**
 * Register archetypes then packs from an already-parsed content object.
 * Duplicate ids and packs naming unknown members abort the load.
 */
export function registerEnemyContent(registry: EnemyRegistry, data: unknown, source: string = 'enemy content'): EnemyContentCounts {
    const content = parseContent(EnemyContentFileSchema, data, source);

    for (const archetype of content.archetypes) {
        registry.registerArchetype(archetype);
    }
    for (const pack of content.packs) {
        registry.registerPack(pack);
    }

    return { archetypes: content.archetypes.length, packs: content.packs.length };
}

/**
 * Build and seal a registry from `<dir>/enemies.json`
 */
export function loadEnemyRegistry(dir: string): EnemyRegistry {
    const timer = createTimer(log);
    const path = join(dir, ENEMY_CONTENT_FILE);
    const registry = new EnemyRegistry();

    try {
        const counts = registerEnemyContent(registry, readJson(path), path);
        registry.seal();
        timer.done(`Loaded ${counts.archetypes} archetypes and ${counts.packs} packs from ${path}`);
        logObject(log, 'debug', 'Archetypes per difficulty band', difficultyDistribution(registry));
    } catch (error) {
        if (error instanceof DuplicateRegistrationError || error instanceof NotFoundError) {
            log.error(`Content load aborted: ${error.message}`);
        }
        throw error;
    }

    return registry;
}

// ═══════════════════════════════════════════════════════════════════════════
// PARTY TYPES
// ═══════════════════════════════════════════════════════════════════════════

export function parsePartyTypes(data: unknown, source: string = 'party types'): Map<string, PartyType> {
    const content = parseContent(PartyTypeFileSchema, data, source);
    const types = new Map<string, PartyType>();
    for (const partyType of content.partyTypes) {
        if (types.has(partyType.id)) {
            throw new DuplicateRegistrationError('party type', partyType.id);
        }
        types.set(partyType.id, partyType);
    }
    return types;
}

export function loadPartyTypes(dir: string): Map<string, PartyType> {
    const path = join(dir, PARTY_TYPE_FILE);
    const types = parsePartyTypes(readJson(path), path);
    log.debug(`Loaded ${types.size} party types from ${path}`);
    return types;
}
