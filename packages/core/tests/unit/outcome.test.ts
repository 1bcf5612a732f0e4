import { RunContext, TaskExecutionError, createOutcome, isSuccess, summarizeOutcome, withDuration } from '../../src';

describe('Outcome', () => {
    const ctx = new RunContext({});

    it('is frozen, including its error list', () => {
        const outcome = createOutcome('FAILED', ctx, [new Error('x')], 12);
        expect(Object.isFrozen(outcome)).toBe(true);
        expect(Object.isFrozen(outcome.errors)).toBe(true);
        expect(outcome.context).toBe(ctx);
    });

    it('floors durations and never goes negative', () => {
        expect(createOutcome('SUCCESS', ctx, [], 12.9).durationMs).toBe(12);
        expect(createOutcome('SUCCESS', ctx, [], -5).durationMs).toBe(0);
        expect(createOutcome('SUCCESS', ctx).durationMs).toBe(0);
    });

    it('withDuration returns a copy with the new duration', () => {
        const outcome = createOutcome('ABORTED', ctx, [], 1);
        const timed = withDuration(outcome, 250);
        expect(timed.durationMs).toBe(250);
        expect(timed.status).toBe('ABORTED');
        expect(outcome.durationMs).toBe(1);
    });

    it('isSuccess only for SUCCESS', () => {
        expect(isSuccess(createOutcome('SUCCESS', ctx))).toBe(true);
        expect(isSuccess(createOutcome('FAILED', ctx))).toBe(false);
        expect(isSuccess(createOutcome('ABORTED', ctx))).toBe(false);
    });

    it('summarizes errors as name and message', () => {
        const error = new TaskExecutionError("Task 'a' failed after 2 attempts", 'a', 2);
        expect(summarizeOutcome(createOutcome('FAILED', ctx, [error], 40))).toEqual({
            status: 'FAILED',
            errors: ["TaskExecutionError: Task 'a' failed after 2 attempts"],
            durationMs: 40,
        });
    });
});
