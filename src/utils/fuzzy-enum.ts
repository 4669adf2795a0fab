/**
 * Fuzzy matching for tool actions and content ids
 *
 * Actions resolve in three steps:
 * 1. Exact match after normalization
 * 2. Alias lookup
 * 3. Closest Levenshtein match above a threshold
 *
 * Failures carry ranked suggestions so the caller can retry.
 */

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface MatchResult<T extends string> {
    matched: T;
    exact: boolean;
    similarity: number;
}

export interface Suggestion {
    value: string;
    /** Percentage, 0-100 */
    similarity: number;
}

export interface GuidingError {
    error: 'invalid_action' | 'invalid_identifier';
    input: string;
    suggestions: Suggestion[];
    message: string;
}

export type MatchOutcome<T extends string> = MatchResult<T> | GuidingError;

export function isGuidingError(result: unknown): result is GuidingError {
    return (
        typeof result === 'object' &&
        result !== null &&
        'error' in result &&
        typeof result.error === 'string' &&
        'suggestions' in result &&
        Array.isArray(result.suggestions)
    );
}

// ═══════════════════════════════════════════════════════════════════════════
// STRING DISTANCE
// ═══════════════════════════════════════════════════════════════════════════

export function levenshtein(a: string, b: string): number {
    if (a.length === 0) return b.length;
    if (b.length === 0) return a.length;

    let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

    for (let i = 1; i <= a.length; i++) {
        const current = [i];
        for (let j = 1; j <= b.length; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            current[j] = Math.min(
                previous[j] + 1,
                current[j - 1] + 1,
                previous[j - 1] + cost
            );
        }
        previous = current;
    }

    return previous[b.length];
}

/** 1 for identical strings, 0 for nothing in common (case-insensitive) */
export function similarity(a: string, b: string): number {
    const maxLength = Math.max(a.length, b.length);
    if (maxLength === 0) return 1;
    return 1 - levenshtein(a.toLowerCase(), b.toLowerCase()) / maxLength;
}

/**
 * 'Choose-Pack ' -> 'choose_pack'
 */
export function normalizeInput(input: string): string {
    return input
        .toLowerCase()
        .trim()
        .replace(/[-\s]+/g, '_');
}

function rank<T>(input: string, items: readonly T[], keyOf: (item: T) => string): Array<{ item: T; similarity: number }> {
    return items
        .map(item => ({ item, similarity: similarity(input, keyOf(item)) }))
        .sort((a, b) => b.similarity - a.similarity);
}

function toSuggestions<T>(ranked: Array<{ item: T; similarity: number }>, keyOf: (item: T) => string): Suggestion[] {
    return ranked.slice(0, 3).map(entry => ({
        value: keyOf(entry.item),
        similarity: Math.round(entry.similarity * 100)
    }));
}

function describeSuggestions(suggestions: Suggestion[]): string {
    return suggestions.map(s => `"${s.value}" (${s.similarity}%)`).join(', ');
}

// ═══════════════════════════════════════════════════════════════════════════
// ACTION MATCHING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * @example
 * const actions = ['scale', 'roll_room'] as const;
 * matchAction('room', actions, { room: 'roll_room' }); // { matched: 'roll_room', exact: false, similarity: 0.95 }
 * matchAction('scal', actions);                        // { matched: 'scale', exact: false, similarity: 0.8 }
 */
export function matchAction<T extends string>(
    input: string,
    validActions: readonly T[],
    aliases?: Readonly<Record<string, T>>,
    threshold: number = 0.6
): MatchOutcome<T> {
    const normalized = normalizeInput(input);

    const exactMatch = validActions.find(action => action.toLowerCase() === normalized);
    if (exactMatch) {
        return { matched: exactMatch, exact: true, similarity: 1.0 };
    }

    const aliasMatch = aliases?.[normalized];
    if (aliasMatch && validActions.includes(aliasMatch)) {
        return { matched: aliasMatch, exact: false, similarity: 0.95 };
    }

    const ranked = rank(normalized, validActions, action => action);
    const best = ranked[0];
    if (best && best.similarity >= threshold) {
        return { matched: best.item, exact: false, similarity: best.similarity };
    }

    const suggestions = toSuggestions(ranked, action => action);
    return {
        error: 'invalid_action',
        input,
        suggestions,
        message: `Unknown action "${input}". Did you mean: ${describeSuggestions(suggestions)}?`
    };
}

// ═══════════════════════════════════════════════════════════════════════════
// IDENTIFIER RESOLUTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Resolve content by id, then by display name, then by the closest id or
 * name scoring at least 0.8.
 *
 * @example
 * resolveIdentifier('Goblin Skirmisher', id => registry.findArchetype(id), () => registry.listArchetypes());
 */
export function resolveIdentifier<T extends { id: string; name: string }>(
    identifier: string,
    findById: (id: string) => T | null,
    listAll: () => T[],
    kind: string = 'entity'
): T | GuidingError {
    const byId = findById(identifier) ?? findById(normalizeInput(identifier));
    if (byId) return byId;

    const all = listAll();
    const lowered = identifier.toLowerCase().trim();
    const byName = all.find(item => item.name.toLowerCase() === lowered);
    if (byName) return byName;

    const normalized = normalizeInput(identifier);
    const ranked = all
        .map(item => ({
            item,
            similarity: Math.max(similarity(normalized, item.id), similarity(lowered, item.name))
        }))
        .sort((a, b) => b.similarity - a.similarity);

    if (ranked.length > 0 && ranked[0].similarity >= 0.8) {
        return ranked[0].item;
    }

    const suggestions = toSuggestions(ranked, item => item.id);
    return {
        error: 'invalid_identifier',
        input: identifier,
        suggestions,
        message: `No ${kind} found for "${identifier}". ${
            suggestions.length > 0
                ? `Did you mean: ${describeSuggestions(suggestions)}?`
                : `No ${kind}s are registered.`
        }`
    };
}
