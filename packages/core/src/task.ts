import { types } from 'util';
import { RunContext } from './context';
import {
    CompensationError,
    ContractViolationError,
    isFatal,
    TaskExecutionError,
    TaskTimeoutError,
    toError,
} from './errors';
import { Executable, assertStepName } from './executable';
import { MaybePending, isThenable, observe, pending, ready } from './execution';
import { createLogger } from './logger';
import { Outcome, createOutcome, elapsedSince } from './outcome';
import { BackoffStrategy, ErrorMatcher, RetryPolicy } from './retry-policy';
import { sleep, sleepSync } from './utils/sleep';

const log = createLogger('task');

export type TaskFn<D, R = unknown> = (ctx: RunContext<D>, signal: AbortSignal) => R;
export type UndoFn<D> = (ctx: RunContext<D>) => unknown;

export type ExecutionMode = 'sync' | 'async';

export interface TaskOptions<D> {
    name: string;
    run: TaskFn<D>;
    undo?: UndoFn<D>;
    retryPolicy?: RetryPolicy;
    /**
     * Seconds per attempt, at most MAX_TIMEOUT_SECONDS (longer values are
     * clamped). Async functions see `signal` abort when it passes.
     *
     * A sync function cannot be interrupted: it is only checked once it
     * returns, so one that never returns is never timed out. Run blocking
     * work that must be stoppable through `workerTask` instead.
     */
    timeout?: number;
    /** Inferred from `run`/`undo` being async functions when omitted. */
    mode?: ExecutionMode;
    description?: string;
}

/** Longest deadline a Node.js timer can hold (2^31 - 1 ms). */
export const MAX_TIMEOUT_SECONDS = 2147483.647;

function detectMode(...fns: (((...args: never[]) => unknown) | undefined)[]): ExecutionMode {
    return fns.some(fn => fn !== undefined && types.isAsyncFunction(fn)) ? 'async' : 'sync';
}

/**
 * Leaf unit of work: one user function run under a retry policy and an
 * optional per-attempt timeout, with an optional undo action.
 *
 * Business failures never escape `execute`; they come back as a FAILED
 * outcome carrying a TaskExecutionError.
 */
export class Task<D = unknown> implements Executable<D> {
    readonly name: string;
    readonly description?: string;
    readonly isAsync: boolean;
    readonly retryPolicy: RetryPolicy;
    readonly timeout?: number;
    private readonly fn: TaskFn<D>;
    private readonly undo?: UndoFn<D>;

    constructor(options: TaskOptions<D>) {
        assertStepName(options.name, 'Task');
        if (options.timeout !== undefined && !(options.timeout > 0)) {
            throw new Error(`Task "${options.name}" timeout must be a positive number of seconds`);
        }
        this.name = options.name;
        this.description = options.description;
        this.fn = options.run;
        this.undo = options.undo;
        this.retryPolicy = options.retryPolicy ?? RetryPolicy.none();
        if (options.timeout !== undefined && options.timeout > MAX_TIMEOUT_SECONDS) {
            log.warn(`${options.name}: timeout of ${options.timeout}s clamped to ${MAX_TIMEOUT_SECONDS}s`);
        }
        this.timeout = options.timeout === undefined ? undefined : Math.min(options.timeout, MAX_TIMEOUT_SECONDS);
        this.isAsync = (options.mode ?? detectMode(options.run, options.undo)) === 'async';
    }

    execute(ctx: RunContext<D>): MaybePending<Outcome<D>> {
        return this.isAsync ? pending(this.executeAsync(ctx)) : ready(this.executeSync(ctx));
    }

    compensate(ctx: RunContext<D>): MaybePending<void> {
        if (!this.undo) return ready();
        if (!ctx.hasCompleted(this.name) || ctx.hasCompensated(this.name)) {
            ctx.log('DEBUG', this.name, 'Nothing to compensate');
            return ready();
        }

        ctx.log('INFO', this.name, 'Compensating task');
        let result: unknown;
        try {
            result = this.undo(ctx);
        } catch (err) {
            throw this.compensationFailed(ctx, err);
        }

        if (!isThenable(result)) {
            ctx.markCompensated(this.name);
            return ready();
        }
        if (!this.isAsync) {
            observe(result, `Undo of '${this.name}'`);
            throw new ContractViolationError(
                `Task '${this.name}' undo returned a promise but the task runs synchronously. Declare it async or set mode: 'async'.`
            );
        }
        return pending(
            Promise.resolve(result).then(
                () => ctx.markCompensated(this.name),
                err => {
                    throw this.compensationFailed(ctx, err);
                }
            )
        );
    }

    private executeSync(ctx: RunContext<D>): Outcome<D> {
        ctx.log('INFO', this.name, 'Task started');
        const startedAt = Date.now();

        for (let attempt = 1; ; attempt++) {
            try {
                this.invokeSync(ctx, attempt);
                return this.succeeded(ctx, startedAt);
            } catch (err) {
                if (isFatal(err)) throw err;
                const delay = this.retryDelay(ctx, attempt, err);
                if (delay === null) return this.failed(ctx, attempt, err, startedAt);
                sleepSync(delay * 1000);
            }
        }
    }

    private async executeAsync(ctx: RunContext<D>): Promise<Outcome<D>> {
        ctx.log('INFO', this.name, 'Task started (async)');
        const startedAt = Date.now();

        for (let attempt = 1; ; attempt++) {
            try {
                await this.invokeAsync(ctx, attempt);
                return this.succeeded(ctx, startedAt);
            } catch (err) {
                if (isFatal(err)) throw err;
                const delay = this.retryDelay(ctx, attempt, err);
                if (delay === null) return this.failed(ctx, attempt, err, startedAt);
                await sleep(delay * 1000);
            }
        }
    }

    // A synchronous call cannot be pre-empted; an overrun is detected once it returns.
    private invokeSync(ctx: RunContext<D>, attempt: number): void {
        const controller = new AbortController();
        const attemptStart = Date.now();
        const result = this.fn(ctx, controller.signal);

        if (isThenable(result)) {
            observe(result, `Task '${this.name}'`);
            throw new ContractViolationError(
                `Task '${this.name}' returned a promise but was executed synchronously. Declare it async, set mode: 'async', or use AsyncRunner.`
            );
        }
        if (this.timeout !== undefined && Date.now() - attemptStart > this.timeout * 1000) {
            throw new TaskTimeoutError(this.name, this.timeout, attempt);
        }
    }

    private async invokeAsync(ctx: RunContext<D>, attempt: number): Promise<void> {
        const controller = new AbortController();
        const work = Promise.resolve().then(() => this.fn(ctx, controller.signal));
        const timeout = this.timeout;

        if (timeout === undefined) {
            await work;
            return;
        }

        let timer: NodeJS.Timeout | undefined;
        const deadline = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                const err = new TaskTimeoutError(this.name, timeout, attempt);
                controller.abort(err);
                reject(err);
            }, timeout * 1000);
        });

        try {
            await Promise.race([work, deadline]);
        } catch (err) {
            if (err instanceof TaskTimeoutError) observe(work, `Task '${this.name}' attempt ${attempt}`);
            throw err;
        } finally {
            clearTimeout(timer);
        }
    }

    /** Seconds to wait before the next attempt, or null to give up. */
    private retryDelay(ctx: RunContext<D>, attempt: number, err: unknown): number | null {
        const failure = toError(err);
        ctx.log('ERROR', this.name, `Task failed: ${ctx.formatError(failure)}`);

        if (!this.retryPolicy.shouldRetry(attempt, failure)) return null;

        const delay = this.retryPolicy.calculateDelay(attempt);
        ctx.log('INFO', this.name, `Retrying in ${delay}s (attempt ${attempt}/${this.retryPolicy.maxAttempts})`);
        log.info(`${this.name} attempt ${attempt} failed, retrying in ${delay}s`);
        return delay;
    }

    private succeeded(ctx: RunContext<D>, startedAt: number): Outcome<D> {
        ctx.markCompleted(this.name);
        ctx.log('INFO', this.name, 'Task completed');
        return createOutcome('SUCCESS', ctx, [], elapsedSince(startedAt));
    }

    private failed(ctx: RunContext<D>, attempts: number, err: unknown, startedAt: number): Outcome<D> {
        const error = new TaskExecutionError(
            `Task '${this.name}' failed after ${attempts} attempt${attempts === 1 ? '' : 's'}`,
            this.name,
            attempts,
            toError(err)
        );
        log.info(error.message);
        return createOutcome('FAILED', ctx, [error], elapsedSince(startedAt));
    }

    private compensationFailed(ctx: RunContext<D>, err: unknown): Error {
        if (isFatal(err)) return err;
        const cause = toError(err);
        ctx.log('ERROR', this.name, `Compensation failed: ${ctx.formatError(cause)}`);
        log.error(`${this.name} compensation failed:`, cause);
        return new CompensationError(this.name, cause);
    }
}

export interface TaskFactoryOptions<D> extends TaskOptions<D> {
    // Quick retry configuration, used only without `retryPolicy`.
    maxAttempts?: number;
    delay?: number;
    backoff?: BackoffStrategy;
    retryOn?: readonly ErrorMatcher[];
    giveUpOn?: readonly ErrorMatcher[];
}

/**
 * Builds a Task, taking retry settings inline.
 *
 * @example
 * const charge = task<Order>({
 *     name: 'charge-card',
 *     run: async (ctx) => { ctx.data.chargeId = await payments.charge(ctx.data.total); },
 *     undo: async (ctx) => { await payments.refund(ctx.data.chargeId); },
 *     maxAttempts: 3,
 *     backoff: BackoffStrategy.EXPONENTIAL,
 * });
 */
export function task<D = unknown>(options: TaskFactoryOptions<D>): Task<D> {
    const { maxAttempts, delay, backoff, retryOn, giveUpOn, retryPolicy, ...rest } = options;
    const policy =
        retryPolicy ??
        new RetryPolicy({
            maxAttempts: maxAttempts ?? 1,
            baseDelay: delay ?? 1,
            backoff: backoff ?? BackoffStrategy.FIXED,
            retryOn,
            giveUpOn,
        });
    return new Task<D>({ ...rest, retryPolicy: policy });
}
