import { type FallbackMiss, firstSuccess, nonEmpty } from '../../src/utils/fallback.js';

describe('firstSuccess', () => {
    it('returns the first strategy that produces a value', () => {
        const chain = firstSuccess<number, string>([
            { name: 'odd', attempt: n => n % 2 === 1 ? 'odd' : null },
            { name: 'any', attempt: n => `any:${n}` }
        ]);

        expect(chain(3)).toEqual({ value: 'odd', strategy: 'odd', misses: [] });
        expect(chain(4)).toEqual({
            value: 'any:4',
            strategy: 'any',
            misses: [{ strategy: 'odd', reason: 'no result' }]
        });
    });

    it('treats a throw as a miss and reports it', () => {
        const misses: FallbackMiss[] = [];
        const chain = firstSuccess<null, number>(
            [
                { name: 'lookup', attempt: () => { throw new Error('Unknown archetype: "ghost"'); } },
                { name: 'default', attempt: () => 7 }
            ],
            miss => misses.push(miss)
        );

        expect(chain(null)?.value).toBe(7);
        expect(misses).toEqual([{ strategy: 'lookup', reason: 'Unknown archetype: "ghost"' }]);
    });

    it('returns null when every strategy misses', () => {
        const chain = firstSuccess<null, number>([
            { name: 'a', attempt: () => null },
            { name: 'b', attempt: () => null }
        ]);
        expect(chain(null)).toBeNull();
    });

    it('accepts falsy non-null values', () => {
        const chain = firstSuccess<null, number>([{ name: 'zero', attempt: () => 0 }]);
        expect(chain(null)?.value).toBe(0);
    });
});

describe('nonEmpty', () => {
    it('maps an empty list to null', () => {
        expect(nonEmpty([])).toBeNull();
        expect(nonEmpty([1])).toEqual([1]);
    });
});
