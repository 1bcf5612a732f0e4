import { RunContext } from './context';
import { ProcessExecutionError, isFatal, toError } from './errors';
import { Composite, Executable } from './executable';
import { MaybePending, pending, ready } from './execution';
import { createLogger } from './logger';
import { Outcome, createOutcome, elapsedSince } from './outcome';

const log = createLogger('process');

/**
 * Runs its steps in order and stops at the first one that does not succeed.
 * There is no failure policy here: all steps succeed or the process FAILED.
 */
export class Process<D = unknown> extends Composite<D> {
    constructor(name: string, steps: readonly Executable<D>[], description?: string) {
        super('Process', name, steps, description);
    }

    execute(ctx: RunContext<D>): MaybePending<Outcome<D>> {
        return this.isAsync ? pending(this.executeAsync(ctx)) : ready(this.executeSync(ctx));
    }

    private executeSync(ctx: RunContext<D>): Outcome<D> {
        const startedAt = Date.now();
        ctx.log('INFO', this.name, 'Process started');

        for (const step of this.steps) {
            let result: Outcome<D>;
            try {
                result = this.executeChildSync(step, ctx);
            } catch (err) {
                if (isFatal(err)) throw err;
                return this.crashed(ctx, step, err, startedAt);
            }
            if (result.status !== 'SUCCESS') return this.stopped(ctx, step, result, startedAt);
        }

        return this.completed(ctx, startedAt);
    }

    private async executeAsync(ctx: RunContext<D>): Promise<Outcome<D>> {
        const startedAt = Date.now();
        ctx.log('INFO', this.name, 'Process started (async)');

        for (const step of this.steps) {
            let result: Outcome<D>;
            try {
                result = await this.executeChildAsync(step, ctx);
            } catch (err) {
                if (isFatal(err)) throw err;
                return this.crashed(ctx, step, err, startedAt);
            }
            if (result.status !== 'SUCCESS') return this.stopped(ctx, step, result, startedAt);
        }

        return this.completed(ctx, startedAt);
    }

    private stopped(ctx: RunContext<D>, step: Executable<D>, result: Outcome<D>, startedAt: number): Outcome<D> {
        ctx.log('ERROR', this.name, `Process stopped: step '${step.name}' ${result.status.toLowerCase()}`);
        return createOutcome('FAILED', ctx, result.errors, elapsedSince(startedAt));
    }

    // A step threw instead of returning an outcome.
    private crashed(ctx: RunContext<D>, step: Executable<D>, err: unknown, startedAt: number): Outcome<D> {
        const cause = toError(err);
        ctx.log('ERROR', this.name, `Process error: ${ctx.formatError(cause)}`);
        log.warn(`${this.name}: step ${step.name} threw instead of returning an outcome`, cause);
        return createOutcome('FAILED', ctx, [new ProcessExecutionError(this.name, step.name, cause)], elapsedSince(startedAt));
    }

    private completed(ctx: RunContext<D>, startedAt: number): Outcome<D> {
        ctx.markCompleted(this.name);
        ctx.log('INFO', this.name, 'Process completed');
        return createOutcome('SUCCESS', ctx, [], elapsedSince(startedAt));
    }
}
