export enum BackoffStrategy {
    /** delay = baseDelay */
    FIXED = 'FIXED',
    /** delay = baseDelay * attempt */
    LINEAR = 'LINEAR',
    /** delay = baseDelay * 2^(attempt - 1) */
    EXPONENTIAL = 'EXPONENTIAL',
}

export type ErrorClass = abstract new (...args: never[]) => Error;
export type ErrorPredicate = (err: unknown) => boolean;

/** An Error subclass (matched with instanceof, so subclasses match too) or a predicate. */
export type ErrorMatcher = ErrorClass | ErrorPredicate;

export interface RetryPolicyOptions {
    maxAttempts?: number;
    /** Seconds. */
    baseDelay?: number;
    backoff?: BackoffStrategy;
    /** Seconds. */
    maxDelay?: number;
    jitter?: boolean;
    retryOn?: readonly ErrorMatcher[];
    giveUpOn?: readonly ErrorMatcher[];
    /** Source for jitter, uniform in [0, 1). */
    random?: () => number;
}

export const MAX_ATTEMPTS_LIMIT = 100;
export const MAX_DELAY_LIMIT = 3600;

const clamp = (value: number, min: number, max: number) => Math.min(Math.max(value, min), max);

// NaN counts as unset; infinities are clamped like any other overflow.
const orDefault = (value: number | undefined, fallback: number) =>
    value === undefined || Number.isNaN(value) ? fallback : value;

function isErrorClass(matcher: ErrorMatcher): matcher is ErrorClass {
    return matcher === Error || matcher.prototype instanceof Error;
}

function matches(matcher: ErrorMatcher, err: unknown): boolean {
    return isErrorClass(matcher) ? err instanceof matcher : matcher(err);
}

/**
 * Decides whether a failed attempt gets another go and how long to wait first.
 * Out-of-range settings are clamped here, never rejected.
 */
export class RetryPolicy {
    readonly maxAttempts: number;
    readonly baseDelay: number;
    readonly backoff: BackoffStrategy;
    readonly maxDelay: number;
    readonly jitter: boolean;
    readonly retryOn: readonly ErrorMatcher[];
    readonly giveUpOn: readonly ErrorMatcher[];
    private readonly random: () => number;

    constructor(options: RetryPolicyOptions = {}) {
        this.maxAttempts = clamp(Math.floor(orDefault(options.maxAttempts, 3)), 0, MAX_ATTEMPTS_LIMIT);
        this.baseDelay = Math.max(0, orDefault(options.baseDelay, 1));
        this.backoff = options.backoff ?? BackoffStrategy.FIXED;
        this.maxDelay = clamp(orDefault(options.maxDelay, 60), 0, MAX_DELAY_LIMIT);
        this.jitter = options.jitter ?? false;
        this.retryOn = Object.freeze([...(options.retryOn ?? [Error])]);
        this.giveUpOn = Object.freeze([...(options.giveUpOn ?? [])]);
        this.random = options.random ?? Math.random;
        Object.freeze(this);
    }

    /** A single attempt, no retries. */
    static none(): RetryPolicy {
        return new RetryPolicy({ maxAttempts: 1 });
    }

    shouldRetry(attempt: number, failure: unknown): boolean {
        if (!(attempt < this.maxAttempts)) return false;
        // deny-list wins
        if (this.giveUpOn.some(m => matches(m, failure))) return false;
        return this.retryOn.some(m => matches(m, failure));
    }

    /** Seconds to wait after failed attempt number `attempt` (1-indexed). */
    calculateDelay(attempt: number): number {
        if (!(attempt >= 1)) return 0;

        let delay: number;
        switch (this.backoff) {
            case BackoffStrategy.LINEAR:
                delay = this.baseDelay * attempt;
                break;
            case BackoffStrategy.EXPONENTIAL:
                delay = this.baseDelay * Math.pow(2, attempt - 1);
                break;
            default:
                delay = this.baseDelay;
        }
        // a zero base times an overflowed multiplier is NaN
        delay = Number.isNaN(delay) ? 0 : Math.min(delay, this.maxDelay);

        if (this.jitter) {
            // up to +10%, never negative
            delay += this.random() * delay * 0.1;
        }
        return delay;
    }
}
