import { RunContext } from '../../src';

describe('RunContext', () => {
    it('starts empty around the caller data', () => {
        const ctx = new RunContext({ userId: 7 });
        expect(ctx.data).toEqual({ userId: 7 });
        expect(ctx.trace).toEqual([]);
        expect(ctx.metadata).toEqual({});
        expect([...ctx.completedSteps]).toEqual([]);
        expect([...ctx.compensatedSteps]).toEqual([]);
    });

    it('appends trace events in order with a timestamp', () => {
        const ctx = new RunContext(null);
        const before = Date.now();
        ctx.log('INFO', 'a', 'first');
        ctx.log('ERROR', 'b', 'second');

        expect(ctx.trace.map(e => [e.level, e.source, e.message])).toEqual([
            ['INFO', 'a', 'first'],
            ['ERROR', 'b', 'second'],
        ]);
        expect(ctx.trace[0].timestamp).toBeInstanceOf(Date);
        expect(ctx.trace[0].timestamp.getTime()).toBeGreaterThanOrEqual(before);
    });

    it('tracks completed and compensated steps separately', () => {
        const ctx = new RunContext(null);
        ctx.markCompleted('a');
        ctx.markCompleted('a');
        ctx.markCompensated('a');

        expect(ctx.hasCompleted('a')).toBe(true);
        expect(ctx.hasCompleted('b')).toBe(false);
        expect(ctx.hasCompensated('a')).toBe(true);
        expect([...ctx.completedSteps]).toEqual(['a']);
    });

    it('copies the initial trace and step sets', () => {
        const trace = [{ timestamp: new Date(0), level: 'DEBUG' as const, source: 's', message: 'm' }];
        const ctx = new RunContext('x', { trace, metadata: { run: 1 }, completedSteps: ['a', 'b'] });
        ctx.log('INFO', 's', 'later');

        expect(trace).toHaveLength(1);
        expect(ctx.trace).toHaveLength(2);
        expect(ctx.metadata).toEqual({ run: 1 });
        expect([...ctx.completedSteps]).toEqual(['a', 'b']);
    });

    it('formats errors with the message unless given a formatter', () => {
        expect(new RunContext(null).formatError(new Error('password=test-secret'))).toBe('password=test-secret');

        const redacting = new RunContext(null, { formatError: err => err.message.replace(/password=\S+/, 'password=***') });
        expect(redacting.formatError(new Error('login failed password=test-secret'))).toBe('login failed password=***');
    });
});
