import Piscina from 'piscina';
import { RunContext } from './context';
import { config } from './config';
import { createLogger } from './logger';
import { Task, TaskOptions } from './task';

const log = createLogger('worker-pool');

export interface WorkerPoolOptions {
    /** Absolute path of the module whose exports are the handlers. */
    filename: string;
    minThreads?: number;
    maxThreads?: number;
    maxQueue?: number;
    idleTimeout?: number;
    execArgv?: string[];
}

/**
 * Bounded pool of worker threads, owned by whoever creates it. The engine
 * never creates one on its own; sizing and shutdown stay with the caller.
 */
export class WorkerPool {
    private readonly pool: Piscina;

    constructor(options: WorkerPoolOptions) {
        const maxThreads = options.maxThreads ?? config.workerMaxThreads;
        this.pool = new Piscina({
            filename: options.filename,
            minThreads: Math.min(options.minThreads ?? 1, maxThreads),
            maxThreads,
            maxQueue: options.maxQueue ?? 10000,
            idleTimeout: options.idleTimeout ?? config.workerIdleTimeout,
            execArgv: options.execArgv ?? [],
        });
        log.debug(`pool ready: ${maxThreads} threads max (${options.filename})`);
    }

    /**
     * Runs the exported function `handler` on a worker. Aborting `signal`
     * while it runs terminates that worker thread.
     */
    run(handler: string, payload: unknown, signal?: AbortSignal): Promise<unknown> {
        return this.pool.run(payload, { name: handler, signal });
    }

    async destroy(): Promise<void> {
        await this.pool.destroy();
        log.debug('pool destroyed');
    }
}

/**
 * What happens to a worker still busy when its attempt times out:
 * `terminate` stops the thread, `abandon` lets it finish and drops the result.
 */
export type WorkerTimeoutBehavior = 'terminate' | 'abandon';

export interface WorkerTaskOptions<D> extends Omit<TaskOptions<D>, 'run' | 'mode'> {
    pool: WorkerPool;
    onTimeout?: WorkerTimeoutBehavior;
    /** Name of the function exported by the pool's module. */
    handler: string;
    /** Builds the structured-clonable payload sent to the worker. */
    input: (ctx: RunContext<D>) => unknown;
    /** Receives whatever the worker returned. */
    onResult?: (ctx: RunContext<D>, result: unknown) => void;
}

/**
 * An asynchronous Task whose attempts run on a worker thread, for blocking
 * work that must not hold up the caller's thread and must be stoppable.
 */
export function workerTask<D = unknown>(options: WorkerTaskOptions<D>): Task<D> {
    const { pool, handler, input, onResult, onTimeout = 'terminate', ...rest } = options;
    return new Task<D>({
        ...rest,
        mode: 'async',
        run: async (ctx, signal) => {
            const result = await pool.run(handler, input(ctx), onTimeout === 'terminate' ? signal : undefined);
            // the attempt already failed on its deadline
            if (signal.aborted) return;
            onResult?.(ctx, result);
        },
    });
}
