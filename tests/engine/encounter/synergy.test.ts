import type { SpawnedUnit } from '../../../src/schema/encounter.js';
import { createSpawnedUnit } from '../../../src/engine/encounter/scaling.js';
import {
    applySynergies,
    calculatePackSynergies,
    describeSynergies,
    neutralSynergies,
    tallySynergyTags
} from '../../../src/engine/encounter/synergy.js';
import { archetypeInput, buildRegistry } from '../../fixtures/encounter.js';

const registry = buildRegistry([
    archetypeInput({ id: 'goblin', tags: ['goblin'], baseAttack: 10, atkPerFloor: 0 }),
    archetypeInput({ id: 'skeleton', tags: ['undead'], baseHp: 20, hpPerFloor: 0 }),
    archetypeInput({ id: 'acolyte', tags: ['cultist', 'invoker'] }),
    archetypeInput({ id: 'sprite', tags: ['elemental', 'caster'] }),
    archetypeInput({ id: 'ogre', tags: ['brute'], baseDefense: 5, defPerFloor: 0 }),
    archetypeInput({ id: 'wolf', tags: ['beast'] })
]);

function units(...ids: string[]): SpawnedUnit[] {
    return ids.map((id, i) => createSpawnedUnit(registry.getArchetype(id), 1, { id: `u${i}` }));
}

describe('pack synergies', () => {
    describe('tallySynergyTags', () => {
        it('counts casters by caster or invoker and tanks by brute or tank', () => {
            expect(tallySynergyTags(units('acolyte', 'sprite', 'ogre', 'wolf'))).toEqual({
                goblin: 0,
                undead: 0,
                cultist: 1,
                beast: 1,
                elemental: 1,
                caster: 2,
                tank: 1
            });
        });
    });

    describe('calculatePackSynergies', () => {
        it('is neutral for an empty encounter', () => {
            expect(calculatePackSynergies([])).toEqual(neutralSynergies());
        });

        it('gives three goblins ten percent attack', () => {
            expect(calculatePackSynergies(units('goblin', 'goblin', 'goblin')).attackMult).toBe(1.10);
            expect(calculatePackSynergies(units('goblin', 'goblin')).attackMult).toBe(1.0);
        });

        it('scales undead hp with their count up to a quarter', () => {
            expect(calculatePackSynergies(units('skeleton', 'skeleton')).hpMult).toBeCloseTo(1.10);
            expect(calculatePackSynergies(units(...Array<string>(6).fill('skeleton'))).hpMult).toBeCloseTo(1.25);
        });

        it('stacks skill power from cultists, elementals and casters', () => {
            expect(calculatePackSynergies(units('acolyte', 'acolyte', 'acolyte')).skillPowerMult).toBeCloseTo(1.25);
            expect(calculatePackSynergies(units('sprite', 'sprite')).skillPowerMult).toBeCloseTo(1.30);
        });

        it('gives tanks defense per tank', () => {
            expect(calculatePackSynergies(units('ogre', 'ogre')).defenseMult).toBeCloseTo(1.20);
        });

        it('grants beasts nothing', () => {
            expect(calculatePackSynergies(units('wolf', 'wolf', 'wolf'))).toEqual(neutralSynergies());
        });

        it('does not depend on unit order', () => {
            const forward = calculatePackSynergies(units('goblin', 'sprite', 'goblin', 'sprite', 'goblin'));
            const reverse = calculatePackSynergies(units('goblin', 'sprite', 'goblin', 'sprite', 'goblin').reverse());
            expect(reverse).toEqual(forward);
        });
    });

    describe('applySynergies', () => {
        it('multiplies attack and truncates', () => {
            const pack = units('goblin', 'goblin', 'goblin');
            applySynergies(pack);
            expect(pack.map(u => u.attack)).toEqual([11, 11, 11]);
        });

        it('keeps the current hp fraction when max hp grows', () => {
            const pack = units('skeleton', 'skeleton');
            pack[0].hp = 10;

            applySynergies(pack);

            expect(pack[0].maxHp).toBe(22);
            expect(pack[0].hp).toBe(11);
            expect(pack[1].hp).toBe(22);
        });

        it('applies a given bundle instead of computing one', () => {
            const pack = units('ogre');
            const bundle = { ...neutralSynergies(), defenseMult: 1.2, skillPowerMult: 1.5 };

            expect(applySynergies(pack, bundle)).toBe(bundle);
            expect(pack[0].defense).toBe(6);
            expect(pack[0].skillPower).toBe(1.5);
        });

        it('leaves units alone under a neutral bundle', () => {
            const pack = units('wolf');
            const before = { ...pack[0] };
            applySynergies(pack);
            expect(pack[0]).toEqual(before);
        });
    });

    describe('describeSynergies', () => {
        it('lists only active multipliers as percentages', () => {
            expect(describeSynergies({ attackMult: 1.1, hpMult: 1.0, defenseMult: 1.2, skillPowerMult: 1.0 }))
                .toEqual(['attack +10%', 'defense +20%']);
            expect(describeSynergies(neutralSynergies())).toEqual([]);
        });
    });
});
