import { RunContext, RunContextInit } from './context';
import { Executable } from './executable';
import { createLogger } from './logger';
import { Outcome } from './outcome';
import { AsyncRunner, SyncRunner } from './runner';

const log = createLogger('run');

/**
 * Runs a synchronous flow over `data` without building the context or runner
 * by hand. Throws ContractViolationError for asynchronous flows.
 */
export function executeFlow<D>(flow: Executable<D>, data: D, init?: RunContextInit): Outcome<D> {
    const ctx = new RunContext(data, init);
    log.debug(`running ${flow.name} (sync)`);
    const outcome = new SyncRunner().run(flow, ctx);
    log.debug(`${flow.name} finished: ${outcome.status} in ${outcome.durationMs}ms`);
    return outcome;
}

/** Same as executeFlow, for flows of either mode. */
export async function executeFlowAsync<D>(flow: Executable<D>, data: D, init?: RunContextInit): Promise<Outcome<D>> {
    const ctx = new RunContext(data, init);
    log.debug(`running ${flow.name} (${flow.isAsync ? 'async' : 'sync'})`);
    const outcome = await new AsyncRunner().run(flow, ctx);
    log.debug(`${flow.name} finished: ${outcome.status} in ${outcome.durationMs}ms`);
    return outcome;
}
