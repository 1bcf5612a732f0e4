import { RunContext } from './context';
import { CompensationError, isFatal } from './errors';
import { MaybePending, pending, ready, requireReady, settle } from './execution';
import { Outcome } from './outcome';

/** Anything that can sit in a step tree: Task, Process, Workflow. */
export interface Executable<D = unknown> {
    readonly name: string;
    readonly description?: string;
    /** Fixed at construction. */
    readonly isAsync: boolean;
    execute(ctx: RunContext<D>): MaybePending<Outcome<D>>;
    compensate(ctx: RunContext<D>): MaybePending<void>;
}

const NAME_MAX_LENGTH = 100;

export function assertStepName(name: string, kind: string): void {
    if (!name || name.trim().length === 0) {
        throw new Error(`${kind} name cannot be empty`);
    }
    if (name.length > NAME_MAX_LENGTH) {
        throw new Error(`${kind} name exceeds maximum length of ${NAME_MAX_LENGTH} characters`);
    }
}

// Escalate everything a compensation throws as a CompensationError.
export function asCompensationError(step: string, err: unknown): Error {
    if (isFatal(err)) return err;
    return new CompensationError(step, err);
}

/**
 * Shared structure of Process and Workflow: an ordered, fixed list of children
 * run one at a time. Completion is tracked by name, so sibling names must be
 * unique.
 */
export abstract class Composite<D = unknown> implements Executable<D> {
    readonly isAsync: boolean;
    readonly steps: readonly Executable<D>[];

    protected constructor(
        protected readonly kind: string,
        readonly name: string,
        steps: readonly Executable<D>[],
        readonly description?: string
    ) {
        assertStepName(name, this.kind);
        const seen = new Set<string>();
        for (const step of steps) {
            if (seen.has(step.name)) {
                throw new Error(`${this.kind} "${name}" has more than one step named "${step.name}"`);
            }
            seen.add(step.name);
        }
        this.steps = Object.freeze([...steps]);
        this.isAsync = this.steps.some(step => step.isAsync);
    }

    abstract execute(ctx: RunContext<D>): MaybePending<Outcome<D>>;

    /** Undo completed children, last first. */
    compensate(ctx: RunContext<D>): MaybePending<void> {
        return this.isAsync ? pending(this.compensateAsync(ctx)) : ready(this.compensateSync(ctx));
    }

    protected compensateSync(ctx: RunContext<D>): void {
        ctx.log('INFO', this.name, `Compensating ${this.kind}`);
        for (const step of [...this.steps].reverse()) {
            if (!ctx.hasCompleted(step.name)) continue;
            try {
                requireReady(step.compensate(ctx), `Compensation of '${step.name}'`);
            } catch (err) {
                throw asCompensationError(step.name, err);
            }
        }
    }

    protected async compensateAsync(ctx: RunContext<D>): Promise<void> {
        ctx.log('INFO', this.name, `Compensating ${this.kind} (async)`);
        for (const step of [...this.steps].reverse()) {
            if (!ctx.hasCompleted(step.name)) continue;
            try {
                await settle(step.compensate(ctx));
            } catch (err) {
                throw asCompensationError(step.name, err);
            }
        }
    }

    /** Runs one child synchronously; a pending result is a contract violation. */
    protected executeChildSync(step: Executable<D>, ctx: RunContext<D>): Outcome<D> {
        return requireReady(step.execute(ctx), `Step '${step.name}'`);
    }

    protected executeChildAsync(step: Executable<D>, ctx: RunContext<D>): Promise<Outcome<D>> {
        return settle(step.execute(ctx));
    }
}
