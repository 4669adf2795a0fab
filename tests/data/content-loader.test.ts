import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
    loadEnemyRegistry,
    loadPartyTypes,
    parsePartyTypes,
    registerEnemyContent
} from '../../src/data/content-loader.js';
import { ContentValidationError, DuplicateRegistrationError, EmptyRegistryError, NotFoundError } from '../../src/engine/encounter/errors.js';
import { EnemyRegistry } from '../../src/engine/encounter/registry.js';
import { DEFAULT_CONTENT_DIR } from '../../src/utils/config.js';
import { resetLogLevel, setLogLevel, setLogSink } from '../../src/utils/logger.js';
import { archetypeInput } from '../fixtures/encounter.js';

describe('content loader', () => {
    describe('bundled content', () => {
        it('loads every archetype and pack into a sealed registry', () => {
            const registry = loadEnemyRegistry(DEFAULT_CONTENT_DIR);

            expect(registry.isSealed()).toBe(true);
            expect(registry.archetypeIds()).toHaveLength(88);
            expect(registry.packIds()).toHaveLength(73);
            expect(registry.getArchetype('goblin_skirmisher')).toMatchObject({
                name: 'Goblin Skirmisher',
                tier: 1,
                difficultyLevel: 15,
                spawnMinFloor: 1,
                spawnMaxFloor: 4
            });
            expect(registry.getPack('goblin_raiding_party').memberArchIds)
                .toEqual(['goblin_brute', 'goblin_skirmisher', 'goblin_skirmisher']);
        });

        it('loads the party types', () => {
            const types = loadPartyTypes(DEFAULT_CONTENT_DIR);

            expect(types.size).toBe(42);
            expect(types.get('merchant')).toEqual({
                id: 'merchant',
                name: 'Merchant Caravan',
                alignment: 'neutral',
                combatStrength: 2,
                battleUnitTemplate: 'merchant_guard'
            });
        });
    });

    describe('registerEnemyContent', () => {
        it('defaults packs to none and reports counts', () => {
            const registry = new EnemyRegistry();
            const counts = registerEnemyContent(registry, { archetypes: [archetypeInput({ id: 'rat' })] });

            expect(counts).toEqual({ archetypes: 1, packs: 0 });
            expect(registry.findArchetype('rat')?.name).toBe('rat');
        });

        it('reports schema issues with dotted paths', () => {
            const data = { archetypes: [{ ...archetypeInput({ id: 'rat' }), baseHp: -1 }] };

            try {
                registerEnemyContent(new EnemyRegistry(), data, 'test content');
                expect.unreachable('content should not parse');
            } catch (error) {
                expect(error).toBeInstanceOf(ContentValidationError);
                if (!(error instanceof ContentValidationError)) return;
                expect(error.source).toBe('test content');
                expect(error.issues.map(i => i.path)).toEqual(['archetypes.0.baseHp']);
            }
        });

        it('rejects duplicate archetype ids', () => {
            const data = { archetypes: [archetypeInput({ id: 'rat' }), archetypeInput({ id: 'rat' })] };
            expect(() => registerEnemyContent(new EnemyRegistry(), data)).toThrow(DuplicateRegistrationError);
        });

        it('rejects packs naming unknown members', () => {
            const data = {
                archetypes: [archetypeInput({ id: 'rat' })],
                packs: [{ id: 'haunt', tier: 1, memberArchIds: ['ghost'] }]
            };
            expect(() => registerEnemyContent(new EnemyRegistry(), data)).toThrow(NotFoundError);
        });
    });

    describe('parsePartyTypes', () => {
        it('fills defaults', () => {
            const types = parsePartyTypes({ partyTypes: [{ id: 'wolves', name: 'Wolf Pack', alignment: 'hostile' }] });
            expect(types.get('wolves')).toEqual({
                id: 'wolves',
                name: 'Wolf Pack',
                alignment: 'hostile',
                combatStrength: 1,
                battleUnitTemplate: null
            });
        });

        it('rejects duplicate ids', () => {
            const entry = { id: 'wolves', name: 'Wolf Pack', alignment: 'hostile' };
            expect(() => parsePartyTypes({ partyTypes: [entry, entry] }))
                .toThrow('Duplicate party type id: "wolves"');
        });

        it('rejects unknown alignments', () => {
            const data = { partyTypes: [{ id: 'wolves', name: 'Wolf Pack', alignment: 'grumpy' }] };
            expect(() => parsePartyTypes(data)).toThrow(ContentValidationError);
        });
    });

    describe('files on disk', () => {
        let dir: string;

        beforeEach(() => {
            dir = mkdtempSync(join(tmpdir(), 'encounter-content-'));
        });

        afterEach(() => {
            rmSync(dir, { recursive: true, force: true });
        });

        it('reports a missing file', () => {
            try {
                loadEnemyRegistry(dir);
                expect.unreachable('missing file should fail');
            } catch (error) {
                expect(error).toBeInstanceOf(ContentValidationError);
                if (!(error instanceof ContentValidationError)) return;
                expect(error.issues[0].message).toMatch(/^Cannot read file: /);
            }
        });

        it('reports malformed JSON', () => {
            writeFileSync(join(dir, 'party-types.json'), '{ "partyTypes": [');
            expect(() => loadPartyTypes(dir)).toThrow(/Malformed JSON/);
        });

        it('logs and rethrows an aborted load', () => {
            const lines: string[] = [];
            setLogLevel('error');
            setLogSink(line => lines.push(line));
            writeFileSync(join(dir, 'enemies.json'), JSON.stringify({
                archetypes: [archetypeInput({ id: 'rat' }), archetypeInput({ id: 'rat' })]
            }));
            try {
                expect(() => loadEnemyRegistry(dir)).toThrow(DuplicateRegistrationError);
                expect(lines).toHaveLength(1);
                expect(lines[0]).toContain('[Content] Content load aborted: Duplicate archetype id: "rat"');
            } finally {
                setLogSink();
                resetLogLevel();
            }
        });

        it('logs the difficulty spread of a loaded registry at debug', () => {
            const lines: string[] = [];
            setLogLevel('debug');
            setLogSink(line => lines.push(line));
            writeFileSync(join(dir, 'enemies.json'), JSON.stringify({ archetypes: [archetypeInput({ id: 'rat' })] }));
            try {
                loadEnemyRegistry(dir);
                const spread = lines.find(line => line.includes('Archetypes per difficulty band'));
                expect(spread).toContain(
                    '[Content] Archetypes per difficulty band:\n{\n  "very_easy": 1,\n  "easy": 0,\n  "medium": 0,\n' +
                    '  "hard": 0,\n  "very_hard": 0,\n  "extreme": 0\n}'
                );
            } finally {
                setLogSink();
                resetLogLevel();
            }
        });

        it('refuses an empty archetype list', () => {
            writeFileSync(join(dir, 'enemies.json'), JSON.stringify({ archetypes: [] }));
            expect(() => loadEnemyRegistry(dir)).toThrow(EmptyRegistryError);
        });
    });
});
