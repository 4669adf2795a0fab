import type { SpawnedUnit } from '../../schema/encounter.js';

export interface SynergyBundle {
    attackMult: number;
    hpMult: number;
    defenseMult: number;
    skillPowerMult: number;
}

export interface SynergyTally {
    goblin: number;
    undead: number;
    cultist: number;
    beast: number;
    elemental: number;
    caster: number;
    tank: number;
}

export function neutralSynergies(): SynergyBundle {
    return { attackMult: 1.0, hpMult: 1.0, defenseMult: 1.0, skillPowerMult: 1.0 };
}

export function tallySynergyTags(units: readonly SpawnedUnit[]): SynergyTally {
    const tally: SynergyTally = { goblin: 0, undead: 0, cultist: 0, beast: 0, elemental: 0, caster: 0, tank: 0 };

    for (const unit of units) {
        const tags = unit.tags;
        if (tags.includes('goblin')) tally.goblin++;
        if (tags.includes('undead')) tally.undead++;
        if (tags.includes('cultist')) tally.cultist++;
        if (tags.includes('beast')) tally.beast++;
        if (tags.includes('elemental')) tally.elemental++;
        if (tags.includes('caster') || tags.includes('invoker')) tally.caster++;
        if (tags.includes('brute') || tags.includes('tank')) tally.tank++;
    }

    return tally;
}

/**
 * Composition bonuses for one encounter. Every rule adds to its own
 * multiplier, so the result does not depend on unit order.
 *
 * Beasts are counted but grant nothing yet.
 */
export function calculatePackSynergies(units: readonly SpawnedUnit[]): SynergyBundle {
    const bundle = neutralSynergies();
    if (units.length === 0) return bundle;

    const tally = tallySynergyTags(units);

    if (tally.goblin >= 3) {
        bundle.attackMult += 0.10;
    }
    if (tally.undead >= 2) {
        bundle.hpMult += Math.min(0.25, 0.05 * tally.undead);
    }
    if (tally.cultist >= 2) {
        bundle.skillPowerMult += 0.05 * tally.cultist;
    }
    if (tally.elemental >= 2) {
        bundle.skillPowerMult += 0.20;
    }
    if (tally.tank >= 2) {
        bundle.defenseMult += 0.10 * tally.tank;
    }
    if (tally.caster >= 2) {
        bundle.skillPowerMult += 0.10;
    }

    return bundle;
}

/**
 * Apply a bundle (computed from `units` when omitted) in place.
 * Current hp keeps its fraction of max hp; it is never topped up.
 */
export function applySynergies(units: SpawnedUnit[], bundle: SynergyBundle = calculatePackSynergies(units)): SynergyBundle {
    for (const unit of units) {
        if (bundle.attackMult !== 1.0) {
            unit.attack = Math.trunc(unit.attack * bundle.attackMult);
        }
        if (bundle.hpMult !== 1.0) {
            const ratio = unit.maxHp > 0 ? unit.hp / unit.maxHp : 1.0;
            const newMax = Math.trunc(unit.maxHp * bundle.hpMult);
            unit.maxHp = newMax;
            unit.hp = Math.trunc(newMax * ratio);
        }
        if (bundle.defenseMult !== 1.0) {
            unit.defense = Math.trunc(unit.defense * bundle.defenseMult);
        }
        if (bundle.skillPowerMult !== 1.0) {
            unit.skillPower = unit.skillPower * bundle.skillPowerMult;
        }
    }
    return bundle;
}

/** Names of the synergies a bundle carries, for display */
export function describeSynergies(bundle: SynergyBundle): string[] {
    const lines: string[] = [];
    const pct = (mult: number) => `+${Math.round((mult - 1) * 100)}%`;
    if (bundle.attackMult !== 1.0) lines.push(`attack ${pct(bundle.attackMult)}`);
    if (bundle.hpMult !== 1.0) lines.push(`hp ${pct(bundle.hpMult)}`);
    if (bundle.defenseMult !== 1.0) lines.push(`defense ${pct(bundle.defenseMult)}`);
    if (bundle.skillPowerMult !== 1.0) lines.push(`skill power ${pct(bundle.skillPowerMult)}`);
    return lines;
}
