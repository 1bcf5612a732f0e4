import { RunContext } from './context';

export type OutcomeStatus = 'SUCCESS' | 'FAILED' | 'ABORTED';

export interface Outcome<D = unknown> {
    readonly status: OutcomeStatus;
    readonly context: RunContext<D>;
    readonly errors: readonly Error[];
    readonly durationMs: number;
}

/** What an external caller gets to see of an outcome. */
export interface OutcomeSummary {
    status: OutcomeStatus;
    errors: string[];
    durationMs: number;
}

export function createOutcome<D>(
    status: OutcomeStatus,
    context: RunContext<D>,
    errors: readonly Error[] = [],
    durationMs = 0
): Outcome<D> {
    return Object.freeze({
        status,
        context,
        errors: Object.freeze([...errors]),
        durationMs: Math.max(0, Math.floor(durationMs)),
    });
}

export function withDuration<D>(outcome: Outcome<D>, durationMs: number): Outcome<D> {
    return createOutcome(outcome.status, outcome.context, outcome.errors, durationMs);
}

export function isSuccess(outcome: Outcome<unknown>): boolean {
    return outcome.status === 'SUCCESS';
}

export function summarizeOutcome(outcome: Outcome<unknown>): OutcomeSummary {
    return {
        status: outcome.status,
        errors: outcome.errors.map(err => `${err.name}: ${err.message}`),
        durationMs: outcome.durationMs,
    };
}

export function elapsedSince(startedAt: number): number {
    return Math.max(0, Date.now() - startedAt);
}
