import { RunContext } from './context';
import { ContractViolationError } from './errors';
import { Executable } from './executable';
import { requireReady, settle } from './execution';
import { createLogger } from './logger';
import { Outcome } from './outcome';

const log = createLogger('runner');

/**
 * Runs a synchronous tree on the calling thread. Handing it an asynchronous
 * tree is a programming error and throws before anything runs.
 */
export class SyncRunner {
    run<D>(executable: Executable<D>, ctx: RunContext<D>): Outcome<D> {
        if (executable.isAsync) {
            log.error(`${executable.name} is asynchronous and cannot run on SyncRunner`);
            throw new ContractViolationError(
                `SyncRunner cannot run '${executable.name}': it contains asynchronous steps. Use AsyncRunner.`
            );
        }
        return requireReady(executable.execute(ctx), `'${executable.name}'`);
    }
}

/** Runs any tree; synchronous ones simply resolve straight away. */
export class AsyncRunner {
    async run<D>(executable: Executable<D>, ctx: RunContext<D>): Promise<Outcome<D>> {
        return settle(executable.execute(ctx));
    }
}
