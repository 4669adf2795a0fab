import { EncounterRNG, createEncounterRNG } from '../../../src/engine/encounter/rng.js';
import { scriptedRng } from '../../fixtures/encounter.js';

describe('EncounterRNG', () => {
    it('replays the same sequence for the same seed', () => {
        const a = new EncounterRNG('dungeon-7');
        const b = new EncounterRNG('dungeon-7');
        const drawsA = Array.from({ length: 5 }, () => a.random());
        const drawsB = Array.from({ length: 5 }, () => b.random());

        expect(drawsA).toEqual(drawsB);
        expect(a.seed).toBe('dungeon-7');
    });

    it('keeps the generated seed when none is given', () => {
        const rng = createEncounterRNG();
        expect(rng.seed).toMatch(/^[0-9a-f-]{36}$/);

        const replay = createEncounterRNG(rng.seed);
        expect(replay.random()).toBe(new EncounterRNG(rng.seed ?? '').random());
    });

    it('has no seed when built from a raw source', () => {
        expect(scriptedRng([0.5]).seed).toBeNull();
    });

    describe('uniform', () => {
        it('maps a draw onto [min, max)', () => {
            expect(scriptedRng([0.25]).uniform(1, 2)).toBe(1.25);
            expect(scriptedRng([0.5]).uniform(-0.3, 0.3)).toBe(0);
        });
    });

    describe('randint', () => {
        it('includes both ends', () => {
            expect(scriptedRng([0]).randint(1, 3)).toBe(1);
            expect(scriptedRng([0.999]).randint(1, 3)).toBe(3);
            expect(scriptedRng([0.5]).randint(1, 3)).toBe(2);
        });

        it('rejects an inverted range', () => {
            expect(() => scriptedRng([0.5]).randint(3, 1)).toThrow('Invalid range: 3..1');
        });
    });

    describe('chance', () => {
        it('succeeds strictly below the probability', () => {
            expect(scriptedRng([0.1]).chance(0.15)).toBe(true);
            expect(scriptedRng([0.15]).chance(0.15)).toBe(false);
        });
    });

    describe('choice', () => {
        it('indexes by the draw', () => {
            expect(scriptedRng([0.7]).choice(['a', 'b', 'c'])).toBe('c');
        });

        it('rejects an empty list', () => {
            expect(() => scriptedRng([0.5]).choice([])).toThrow('Cannot choose from an empty list');
        });
    });

    describe('weightedChoice', () => {
        it('walks cumulative weights', () => {
            // total 4: a [0,1), b [1,3), c [3,4)
            expect(scriptedRng([0.2]).weightedChoice(['a', 'b', 'c'], [1, 2, 1])).toBe('a');
            expect(scriptedRng([0.5]).weightedChoice(['a', 'b', 'c'], [1, 2, 1])).toBe('b');
            expect(scriptedRng([0.8]).weightedChoice(['a', 'b', 'c'], [1, 2, 1])).toBe('c');
        });

        it('never picks a zero or negative weight', () => {
            expect(scriptedRng([0]).weightedChoice(['a', 'b'], [0, 1])).toBe('b');
            expect(scriptedRng([0.3]).weightedChoice(['a', 'b', 'c'], [-5, 1, 1])).toBe('b');
        });

        it('falls back to a uniform pick when no weight is positive', () => {
            expect(scriptedRng([0.6]).weightedChoice(['a', 'b'], [0, 0])).toBe('b');
        });

        it('rejects mismatched lengths', () => {
            expect(() => scriptedRng([0.5]).weightedChoice(['a'], [1, 2])).toThrow('Got 1 items but 2 weights');
        });
    });
});
