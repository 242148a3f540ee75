import { afterEach, describe, it, expect } from 'vitest';
import { ConsoleTransport, MemoryTransport, createComponentLogger, formatEntry, initLogging } from './logging';

describe('Logging', () => {
    afterEach(() => {
        initLogging({ minLevel: 'silent', transports: [new ConsoleTransport()] });
    });

    it('formats entries on one line', () => {
        const line = formatEntry({
            timestamp: '2026-01-02T03:04:05.678Z',
            level: 'info',
            component: 'app',
            message: 'Run finished',
            data: { steps: 3 },
        });
        expect(line).toBe('03:04:05 INF [app] Run finished {"steps":3}');
    });

    it('puts the error on its own line', () => {
        const line = formatEntry({
            timestamp: '2026-01-02T03:04:05.678Z',
            level: 'error',
            component: 'cli',
            message: 'Goal not achieved',
            error: { name: 'DeadlockError', message: 'stuck' },
        });
        expect(line).toBe('03:04:05 ERR [cli] Goal not achieved\nDeadlockError: stuck');
    });

    it('drops entries below the configured level', () => {
        const memory = new MemoryTransport();
        initLogging({ minLevel: 'warn', transports: [memory] });
        const log = createComponentLogger('planner');

        log.info('ignored');
        log.warn('kept', { step: 1 });
        log.child('driver').error('failed', new Error('boom'));

        expect(memory.entries.map((e) => `${e.level} ${e.component} ${e.message}`)).toEqual([
            'warn planner kept',
            'error planner.driver failed',
        ]);
        expect(memory.entries[0].data).toEqual({ step: 1 });
        expect(memory.entries[1].error).toMatchObject({ name: 'Error', message: 'boom' });
    });
});
