import path from 'path';
import { AsyncRunner, RetryPolicy, RunContext, TaskTimeoutError, WorkerPool, Workflow, workerTask } from '../../src';
import { taskError } from '../helpers/steps';
import { sleep } from '../../src/utils/sleep';

interface Calc {
    value: number;
    result?: unknown;
}

describe('WorkerPool', () => {
    let pool: WorkerPool;

    beforeAll(() => {
        pool = new WorkerPool({ filename: path.join(__dirname, '../fixtures/arith.worker.js'), maxThreads: 2 });
    });

    afterAll(async () => {
        await pool.destroy();
    });

    test('runs a named handler on a worker thread', async () => {
        await expect(pool.run('double', { value: 4 })).resolves.toBe(8);
    });

    test('workerTask hands the result back to the context', async () => {
        const ctx = new RunContext<Calc>({ value: 21 });
        const step = workerTask<Calc>({
            name: 'double',
            pool,
            handler: 'double',
            input: c => ({ value: c.data.value }),
            onResult: (c, result) => {
                c.data.result = result;
            },
        });

        expect(step.isAsync).toBe(true);
        const outcome = await new AsyncRunner().run(new Workflow('calc', [step]), ctx);

        expect(outcome.status).toBe('SUCCESS');
        expect(ctx.data.result).toBe(42);
    });

    test('retries errors thrown inside the worker', async () => {
        const outcome = await new AsyncRunner().run(
            workerTask<Calc>({
                name: 'explode',
                pool,
                handler: 'explode',
                input: () => ({ message: 'kaboom' }),
                retryPolicy: new RetryPolicy({ maxAttempts: 2, baseDelay: 0 }),
            }),
            new RunContext<Calc>({ value: 1 })
        );

        expect(outcome.status).toBe('FAILED');
        const error = taskError(outcome);
        expect(error.attempts).toBe(2);
        expect(error.cause).toHaveProperty('message', 'kaboom');
    });

    test('terminates the worker when an attempt times out', async () => {
        const startedAt = Date.now();
        const outcome = await new AsyncRunner().run(
            workerTask<Calc>({
                name: 'slow',
                pool,
                handler: 'slow',
                input: () => ({ ms: 5000, value: 1 }),
                timeout: 0.1,
            }),
            new RunContext<Calc>({ value: 1 })
        );

        expect(Date.now() - startedAt).toBeLessThan(4000);
        expect(taskError(outcome).cause).toBeInstanceOf(TaskTimeoutError);
    });

    test('drops the late result of abandoned work', async () => {
        const ctx = new RunContext<Calc>({ value: 1 });
        const outcome = await new AsyncRunner().run(
            workerTask<Calc>({
                name: 'slow',
                pool,
                handler: 'slow',
                input: () => ({ ms: 300, value: 99 }),
                onResult: (c, result) => {
                    c.data.result = result;
                },
                timeout: 0.05,
                onTimeout: 'abandon',
            }),
            ctx
        );

        expect(outcome.status).toBe('FAILED');
        await sleep(600);
        expect(ctx.data.result).toBeUndefined();
    });
});
