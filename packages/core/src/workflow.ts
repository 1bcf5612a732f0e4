import { RunContext } from './context';
import { WorkflowExecutionError, isFatal, toError } from './errors';
import { Composite, Executable, asCompensationError } from './executable';
import { MaybePending, pending, ready, requireReady, settle } from './execution';
import { createLogger } from './logger';
import { Outcome, createOutcome, elapsedSince } from './outcome';

const log = createLogger('workflow');

export enum FailureStrategy {
    /** Stop at the first failing step; the run is ABORTED. */
    ABORT = 'ABORT',
    /** Run every step, collect errors; FAILED iff any were collected. */
    CONTINUE = 'CONTINUE',
    /** Undo the failing step and every completed one before it, newest first; FAILED. */
    COMPENSATE = 'COMPENSATE',
}

// What the step loop does next after looking at one step.
type Decision<D> = { next: 'continue' } | { next: 'stop'; outcome: Outcome<D> } | { next: 'compensate'; errors: readonly Error[] };

/**
 * Top-level composite. Steps run one at a time; the first failing step is
 * handled according to the strategy fixed at construction.
 */
export class Workflow<D = unknown> extends Composite<D> {
    constructor(
        name: string,
        steps: readonly Executable<D>[],
        readonly strategy: FailureStrategy = FailureStrategy.ABORT,
        description?: string
    ) {
        super('Workflow', name, steps, description);
    }

    execute(ctx: RunContext<D>): MaybePending<Outcome<D>> {
        return this.isAsync ? pending(this.executeAsync(ctx)) : ready(this.executeSync(ctx));
    }

    private executeSync(ctx: RunContext<D>): Outcome<D> {
        const startedAt = Date.now();
        const collected: Error[] = [];
        ctx.log('INFO', this.name, 'Workflow started');

        for (const step of this.steps) {
            let result: Outcome<D> | Error;
            try {
                result = this.executeChildSync(step, ctx);
            } catch (err) {
                if (isFatal(err)) throw err;
                result = this.wrapThrown(ctx, step, err);
            }

            const decision = this.decide(ctx, step, result, collected, startedAt);
            if (decision.next === 'stop') return decision.outcome;
            if (decision.next === 'compensate') {
                try {
                    requireReady(step.compensate(ctx), `Compensation of '${step.name}'`);
                } catch (err) {
                    throw asCompensationError(step.name, err);
                }
                this.compensateSync(ctx);
                return createOutcome('FAILED', ctx, decision.errors, elapsedSince(startedAt));
            }
        }

        return this.finish(ctx, collected, startedAt);
    }

    private async executeAsync(ctx: RunContext<D>): Promise<Outcome<D>> {
        const startedAt = Date.now();
        const collected: Error[] = [];
        ctx.log('INFO', this.name, 'Workflow started (async)');

        for (const step of this.steps) {
            let result: Outcome<D> | Error;
            try {
                result = await this.executeChildAsync(step, ctx);
            } catch (err) {
                if (isFatal(err)) throw err;
                result = this.wrapThrown(ctx, step, err);
            }

            const decision = this.decide(ctx, step, result, collected, startedAt);
            if (decision.next === 'stop') return decision.outcome;
            if (decision.next === 'compensate') {
                try {
                    await settle(step.compensate(ctx));
                } catch (err) {
                    throw asCompensationError(step.name, err);
                }
                await this.compensateAsync(ctx);
                return createOutcome('FAILED', ctx, decision.errors, elapsedSince(startedAt));
            }
        }

        return this.finish(ctx, collected, startedAt);
    }

    /**
     * Applies the failure strategy to one step's result. A thrown error stands
     * in for the outcome of a step that crashed.
     */
    private decide(
        ctx: RunContext<D>,
        step: Executable<D>,
        result: Outcome<D> | Error,
        collected: Error[],
        startedAt: number
    ): Decision<D> {
        if (!(result instanceof Error) && result.status === 'SUCCESS') return { next: 'continue' };

        const errors = this.failureErrors(step, result);

        switch (this.strategy) {
            case FailureStrategy.ABORT:
                ctx.log('ERROR', this.name, `Workflow aborted due to failure in step '${step.name}'`);
                log.info(`${this.name} aborted at ${step.name}`);
                return { next: 'stop', outcome: createOutcome('ABORTED', ctx, errors, elapsedSince(startedAt)) };
            case FailureStrategy.CONTINUE:
                ctx.log('ERROR', this.name, `Workflow continuing after failure in step '${step.name}'`);
                collected.push(...errors);
                return { next: 'continue' };
            case FailureStrategy.COMPENSATE:
                ctx.log('ERROR', this.name, `Workflow compensating due to failure in step '${step.name}'`);
                log.info(`${this.name} compensating after ${step.name} failed`);
                return { next: 'compensate', errors };
        }
    }

    private failureErrors(step: Executable<D>, result: Outcome<D> | Error): readonly Error[] {
        if (result instanceof Error) return [result];
        if (result.errors.length > 0) return result.errors;
        return [new WorkflowExecutionError(this.name, step.name, new Error(`Step '${step.name}' reported ${result.status} without errors`))];
    }

    private wrapThrown(ctx: RunContext<D>, step: Executable<D>, err: unknown): Error {
        const cause = toError(err);
        ctx.log('ERROR', this.name, `Workflow error: ${ctx.formatError(cause)}`);
        log.warn(`${this.name}: step ${step.name} threw instead of returning an outcome`, cause);
        return new WorkflowExecutionError(this.name, step.name, cause);
    }

    private finish(ctx: RunContext<D>, collected: Error[], startedAt: number): Outcome<D> {
        const status = collected.length > 0 ? 'FAILED' : 'SUCCESS';
        ctx.log('INFO', this.name, `Workflow completed with status ${status}`);
        if (status === 'SUCCESS') ctx.markCompleted(this.name);
        return createOutcome(status, ctx, collected, elapsedSince(startedAt));
    }
}
