import {
    AsyncRunner,
    BackoffStrategy,
    FailureStrategy,
    Process,
    RetryPolicy,
    RunContext,
    SyncRunner,
    Task,
    Workflow,
    summarizeOutcome,
    task,
} from '../../src';

interface Signup {
    email: string;
    userId?: string;
    welcomed?: boolean;
}

describe('signup flow', () => {
    it('compensates the created user when notification keeps failing', () => {
        const createUndo = jest.fn();
        const notify = jest.fn(() => {
            throw new Error('mail server unavailable');
        });

        const workflow = new Workflow<Signup>(
            'signup',
            [
                new Task<Signup>({
                    name: 'validate',
                    run: ctx => {
                        if (!ctx.data.email.includes('@')) throw new Error('invalid email');
                    },
                }),
                new Task<Signup>({
                    name: 'create',
                    run: ctx => {
                        ctx.data.userId = 'u-1';
                    },
                    undo: createUndo,
                }),
                new Task<Signup>({
                    name: 'notify',
                    run: notify,
                    retryPolicy: new RetryPolicy({ maxAttempts: 3, baseDelay: 0 }),
                }),
            ],
            FailureStrategy.COMPENSATE
        );

        const ctx = new RunContext<Signup>({ email: 'ada@example.com' });
        const outcome = new SyncRunner().run(workflow, ctx);

        expect(outcome.status).toBe('FAILED');
        expect(notify).toHaveBeenCalledTimes(3);
        expect(createUndo).toHaveBeenCalledTimes(1);
        expect([...ctx.completedSteps]).toEqual(['validate', 'create']);
        expect([...ctx.compensatedSteps]).toEqual(['create']);
        expect(summarizeOutcome(outcome).errors).toEqual(["TaskExecutionError: Task 'notify' failed after 3 attempts"]);
    });

    it('succeeds under ABORT when every step does', () => {
        const workflow = new Workflow<Signup>('signup', [
            task<Signup>({ name: 'a', run: () => undefined }),
            task<Signup>({ name: 'b', run: () => undefined }),
        ]);

        const ctx = new RunContext<Signup>({ email: 'ada@example.com' });
        const outcome = new SyncRunner().run(workflow, ctx);

        expect(outcome.status).toBe('SUCCESS');
        expect(ctx.hasCompleted('a')).toBe(true);
        expect(ctx.hasCompleted('b')).toBe(true);
    });

    it('runs the same saga asynchronously with a nested process', async () => {
        const undone: string[] = [];
        let welcomeAttempts = 0;

        const provision = new Process<Signup>('provision', [
            task<Signup>({
                name: 'create-account',
                run: async ctx => {
                    ctx.data.userId = 'u-2';
                },
                undo: async () => {
                    undone.push('create-account');
                },
            }),
            task<Signup>({
                name: 'create-mailbox',
                run: () => undefined,
                undo: () => {
                    undone.push('create-mailbox');
                },
            }),
        ]);

        const welcome = task<Signup>({
            name: 'welcome',
            run: async ctx => {
                welcomeAttempts++;
                if (welcomeAttempts < 2) throw new Error('rate limited');
                ctx.data.welcomed = true;
            },
            maxAttempts: 3,
            delay: 0.01,
            backoff: BackoffStrategy.EXPONENTIAL,
        });

        const ctx = new RunContext<Signup>({ email: 'ada@example.com' });
        const outcome = await new AsyncRunner().run(
            new Workflow('signup', [provision, welcome], FailureStrategy.COMPENSATE),
            ctx
        );

        expect(outcome.status).toBe('SUCCESS');
        expect(welcomeAttempts).toBe(2);
        expect(ctx.data).toEqual({ email: 'ada@example.com', userId: 'u-2', welcomed: true });
        expect(undone).toEqual([]);
        expect([...ctx.completedSteps]).toEqual(['create-account', 'create-mailbox', 'provision', 'welcome', 'signup']);
    });
});
