import {
    createLogger,
    createTimer,
    getErrorMessage,
    logError,
    logObject,
    resetLogLevel,
    setLogLevel,
    setLogSink
} from '../../src/utils/logger.js';

describe('logger utilities', () => {
    let lines: string[];

    beforeEach(() => {
        lines = [];
        resetLogLevel();
        setLogSink(line => lines.push(line));
    });

    afterEach(() => {
        setLogSink();
        resetLogLevel();
    });

    describe('createLogger', () => {
        it('writes prefix, padded level and message', () => {
            setLogLevel('info');
            const log = createLogger('Selection');

            log.info('Picked rat');
            log.warn('Pool empty');
            log.error('Failed');

            expect(lines).toHaveLength(3);
            expect(lines[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] \[INFO \] \[Selection\] Picked rat$/);
            expect(lines[1]).toContain('[WARN ] [Selection] Pool empty');
            expect(lines[2]).toContain('[ERROR] [Selection] Failed');
        });

        it('joins child prefixes with a colon', () => {
            setLogLevel('debug');
            createLogger('Encounter').child('Room').debug('hello');
            expect(lines[0]).toContain('[DEBUG] [Encounter:Room] hello');
        });

        it('sends lines to stderr when no sink is set', () => {
            setLogSink();
            setLogLevel('info');
            const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
            try {
                createLogger('Test').info('to stderr');
                expect(spy).toHaveBeenCalledTimes(1);
                expect(spy.mock.calls[0][0]).toContain('[Test] to stderr');
            } finally {
                spy.mockRestore();
            }
        });
    });

    describe('log levels', () => {
        it('drops lines below the configured level', () => {
            setLogLevel('warn');
            const log = createLogger('Test');

            log.debug('a');
            log.info('b');
            log.warn('c');
            log.error('d');

            expect(lines).toHaveLength(2);
        });

        it('writes nothing when silent', () => {
            setLogLevel('silent');
            createLogger('Test').error('nope');
            expect(lines).toEqual([]);
        });

        it('never reports silent as enabled', () => {
            setLogLevel('debug');
            expect(createLogger('Test').isEnabled('silent')).toBe(false);
            expect(createLogger('Test').isEnabled('debug')).toBe(true);
        });

        it('reads the level from the environment after a reset', () => {
            vi.stubEnv('ENCOUNTER_LOG_LEVEL', 'ERROR');
            try {
                resetLogLevel();
                const log = createLogger('Test');
                log.warn('hidden');
                log.error('shown');
                expect(lines).toHaveLength(1);
            } finally {
                vi.unstubAllEnvs();
            }
        });
    });

    describe('logObject', () => {
        it('pretty-prints under a label', () => {
            setLogLevel('info');
            logObject(createLogger('Test'), 'info', 'Counts', { rat: 2 });
            expect(lines[0]).toContain('[Test] Counts:\n{\n  "rat": 2\n}');
        });
    });

    describe('createTimer', () => {
        it('logs the elapsed time at debug and returns it', () => {
            setLogLevel('debug');
            const timer = createTimer(createLogger('Content'));
            const duration = timer.done('Loaded');

            expect(duration).toBeGreaterThanOrEqual(0);
            expect(lines[0]).toMatch(/\[Content\] Loaded \(\d+\.\d{2}ms\)$/);
        });
    });

    describe('getErrorMessage', () => {
        it('handles errors, strings and anything else', () => {
            expect(getErrorMessage(new Error('boom'))).toBe('boom');
            expect(getErrorMessage('plain')).toBe('plain');
            expect(getErrorMessage(42)).toBe('42');
        });
    });

    describe('logError', () => {
        it('adds the stack only at debug level', () => {
            setLogLevel('error');
            logError(createLogger('Test'), 'Load failed', new Error('missing file'));
            expect(lines).toHaveLength(1);
            expect(lines[0]).toContain('[ERROR] [Test] Load failed: missing file');

            lines.length = 0;
            setLogLevel('debug');
            logError(createLogger('Test'), 'Load failed', new Error('missing file'));
            expect(lines).toHaveLength(2);
            expect(lines[1]).toContain('Stack trace:');
        });
    });
});
