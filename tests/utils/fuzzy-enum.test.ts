import {
    isGuidingError,
    levenshtein,
    matchAction,
    normalizeInput,
    resolveIdentifier,
    similarity
} from '../../src/utils/fuzzy-enum.js';

const ACTIONS = ['scale', 'roll_room', 'choose_pack'] as const;

describe('fuzzy-enum', () => {
    describe('string distance', () => {
        it('counts edits', () => {
            expect(levenshtein('kitten', 'sitting')).toBe(3);
            expect(levenshtein('', 'abc')).toBe(3);
            expect(levenshtein('abc', 'abc')).toBe(0);
        });

        it('scores similarity case-insensitively', () => {
            expect(similarity('ABC', 'abc')).toBe(1);
            expect(similarity('', '')).toBe(1);
            expect(similarity('scal', 'scale')).toBeCloseTo(0.8);
        });

        it('normalizes separators and case', () => {
            expect(normalizeInput(' Choose-Pack ')).toBe('choose_pack');
            expect(normalizeInput('roll  room')).toBe('roll_room');
        });
    });

    describe('matchAction', () => {
        it('matches exactly after normalization', () => {
            expect(matchAction('Roll-Room', ACTIONS)).toEqual({ matched: 'roll_room', exact: true, similarity: 1 });
        });

        it('resolves aliases', () => {
            expect(matchAction('room', ACTIONS, { room: 'roll_room' }))
                .toEqual({ matched: 'roll_room', exact: false, similarity: 0.95 });
        });

        it('ignores aliases pointing outside the action list', () => {
            const result = matchAction<string>('zzzz', ['scale'], { zzzz: 'roll_room' });
            expect(isGuidingError(result)).toBe(true);
        });

        it('accepts a close typo', () => {
            const result = matchAction('scal', ACTIONS);
            expect(isGuidingError(result)).toBe(false);
            if (isGuidingError(result)) return;
            expect(result.matched).toBe('scale');
            expect(result.exact).toBe(false);
            expect(result.similarity).toBeCloseTo(0.8);
        });

        it('returns ranked suggestions when nothing is close', () => {
            const result = matchAction('xyz', ['scale', 'roll_room']);

            expect(result).toEqual({
                error: 'invalid_action',
                input: 'xyz',
                suggestions: [
                    { value: 'scale', similarity: 0 },
                    { value: 'roll_room', similarity: 0 }
                ],
                message: 'Unknown action "xyz". Did you mean: "scale" (0%), "roll_room" (0%)?'
            });
        });

        it('honours a stricter threshold', () => {
            expect(isGuidingError(matchAction('scal', ACTIONS, undefined, 0.9))).toBe(true);
        });
    });

    describe('resolveIdentifier', () => {
        const items = [
            { id: 'goblin_skirmisher', name: 'Goblin Skirmisher' },
            { id: 'bat_1', name: 'Cave Bat' }
        ];
        const find = (id: string) => items.find(i => i.id === id) ?? null;
        const resolve = (input: string) => resolveIdentifier(input, find, () => items, 'archetype');

        it('finds by id, raw or normalized', () => {
            expect(resolve('goblin_skirmisher')).toBe(items[0]);
            expect(resolve('Goblin Skirmisher')).toBe(items[0]);
        });

        it('finds by display name', () => {
            expect(resolve('cave bat')).toBe(items[1]);
        });

        it('accepts a close misspelling', () => {
            expect(resolve('goblin_skirmishr')).toBe(items[0]);
        });

        it('suggests ids when nothing is close enough', () => {
            const result = resolve('dragon');

            expect(isGuidingError(result)).toBe(true);
            if (!isGuidingError(result)) return;
            expect(result.error).toBe('invalid_identifier');
            expect(result.suggestions.map(s => s.value)).toHaveLength(2);
            expect(result.message).toMatch(/^No archetype found for "dragon"\. Did you mean: /);
        });

        it('says so when nothing is registered', () => {
            const result = resolveIdentifier('rat', () => null, () => [], 'archetype');
            expect(isGuidingError(result) && result.message)
                .toBe('No archetype found for "rat". No archetypes are registered.');
        });
    });

    describe('isGuidingError', () => {
        it('rejects non-objects and partial shapes', () => {
            expect(isGuidingError(null)).toBe(false);
            expect(isGuidingError('invalid_action')).toBe(false);
            expect(isGuidingError({ error: 'invalid_action' })).toBe(false);
        });
    });
});
