/**
 * RichFormatter - markdown output for encounter tools.
 * Every response also embeds its JSON so frontends can parse it back out.
 */

import type { EnemyArchetype, EnemyPackTemplate, SpawnedUnit } from '../../schema/encounter.js';
import type { ScaledStats } from '../../engine/encounter/scaling.js';

export class RichFormatter {
    // ============================================================
    // HEADERS & SECTIONS
    // ============================================================

    static header(title: string, icon: string = '⚔️'): string {
        const line = '━'.repeat(40);
        return `\n${line}\n${icon}  **${title.toUpperCase()}**\n${line}\n`;
    }

    static section(title: string): string {
        return `\n### ${title}\n`;
    }

    // ============================================================
    // DATA FORMATTING
    // ============================================================

    static keyValue(data: Record<string, unknown>): string {
        let output = '';
        for (const [key, value] of Object.entries(data)) {
            if (value === undefined || value === null) continue;
            const displayValue = typeof value === 'object' ? JSON.stringify(value) : String(value);
            output += `- **${key}:** ${displayValue}\n`;
        }
        return output;
    }

    static table(headers: string[], rows: (string | number)[][]): string {
        if (rows.length === 0) {
            return '\n*No data*\n';
        }
        const headerRow = `| ${headers.join(' | ')} |`;
        const separatorRow = `| ${headers.map(() => '---').join(' | ')} |`;
        const dataRows = rows.map(row => `| ${row.join(' | ')} |`).join('\n');
        return `\n${headerRow}\n${separatorRow}\n${dataRows}\n`;
    }

    static list(items: string[], ordered: boolean = false): string {
        if (items.length === 0) return '\n*None*\n';
        return '\n' + items.map((item, i) => ordered ? `${i + 1}. ${item}` : `- ${item}`).join('\n') + '\n';
    }

    // ============================================================
    // ALERTS & STATUS
    // ============================================================

    static alert(message: string, type: 'success' | 'error' | 'warning' | 'info' = 'info'): string {
        const icons: Record<string, string> = { success: '✅', error: '❌', warning: '⚠️', info: 'ℹ️' };
        return `\n> ${icons[type]} **${type.toUpperCase()}**: ${message}\n`;
    }

    // ============================================================
    // ENCOUNTER FORMATTERS
    // ============================================================

    static archetype(archetype: EnemyArchetype): string {
        const range = archetype.spawnMaxFloor === null
            ? `${archetype.spawnMinFloor}+`
            : `${archetype.spawnMinFloor}-${archetype.spawnMaxFloor}`;
        return RichFormatter.keyValue({
            'ID': archetype.id,
            'Name': archetype.name,
            'Role': archetype.role,
            'Tier': archetype.tier,
            'Difficulty': archetype.difficultyLevel,
            'Floors': range,
            'Spawn Weight': archetype.spawnWeight,
            'Tags': archetype.tags.join(', ') || undefined,
            'Skills': archetype.skillIds.join(', ') || undefined
        });
    }

    static pack(pack: EnemyPackTemplate): string {
        return RichFormatter.keyValue({
            'ID': pack.id,
            'Name': pack.name || undefined,
            'Tier': pack.tier,
            'Members': pack.memberArchIds.join(', '),
            'Room': pack.preferredRoomTag,
            'Weight': pack.weight
        });
    }

    static scaledStats(stats: ScaledStats): string {
        return RichFormatter.table(
            ['HP', 'ATK', 'DEF', 'XP', 'INIT'],
            [[stats.hp, stats.attack, stats.defense, stats.xp, stats.initiative]]
        );
    }

    static units(units: readonly SpawnedUnit[]): string {
        return RichFormatter.table(
            ['Unit', 'Side', 'HP', 'ATK', 'DEF', 'XP', 'Flags'],
            units.map(unit => [
                unit.label ?? unit.name,
                unit.side,
                `${unit.hp}/${unit.maxHp}`,
                unit.attack,
                unit.defense,
                unit.xp,
                [unit.isElite ? 'elite' : '', unit.isUnique ? 'unique' : ''].filter(Boolean).join(' ') || '-'
            ])
        );
    }

    // ============================================================
    // JSON EMBEDDING (for frontend parsing)
    // ============================================================

    static embedJson(data: unknown, tag: string = 'DATA'): string {
        return `\n<!-- ${tag}_JSON\n${JSON.stringify(data)}\n${tag}_JSON -->\n`;
    }
}
