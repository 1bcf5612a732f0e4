import { ContractViolationError } from './errors';
import { createLogger } from './logger';

const log = createLogger('execution');

/**
 * Result of a call that completes either immediately (sync mode) or later
 * (async mode). Executables decide which one once, at construction.
 */
export type MaybePending<T> =
    | { readonly kind: 'ready'; readonly value: T }
    | { readonly kind: 'pending'; readonly promise: Promise<T> };

export function ready(): MaybePending<void>;
export function ready<T>(value: T): MaybePending<T>;
export function ready<T>(value?: T): MaybePending<T | undefined> {
    return { kind: 'ready', value };
}

export function pending<T>(promise: Promise<T>): MaybePending<T> {
    return { kind: 'pending', promise };
}

export async function settle<T>(result: MaybePending<T>): Promise<T> {
    return result.kind === 'ready' ? result.value : result.promise;
}

/**
 * Unwraps a ready result. A pending one means async work reached a
 * synchronous caller, which is a programming error: the orphaned promise is
 * observed so its eventual failure is logged, then the violation is thrown.
 */
export function requireReady<T>(result: MaybePending<T>, what: string): T {
    if (result.kind === 'ready') return result.value;
    observe(result.promise, what);
    throw new ContractViolationError(
        `${what} returned a pending result during synchronous execution. Use AsyncRunner for asynchronous trees.`
    );
}

export function isThenable(value: unknown): value is PromiseLike<unknown> {
    return (
        (typeof value === 'object' || typeof value === 'function') &&
        value !== null &&
        'then' in value &&
        typeof value.then === 'function'
    );
}

// Attach a handler to work nobody will await any more.
export function observe(promise: PromiseLike<unknown>, what: string): void {
    Promise.resolve(promise).then(
        () => log.debug(`${what} settled after being abandoned`),
        err => log.debug(`${what} failed after being abandoned:`, err)
    );
}
