import { z } from 'zod';
import {
    Executable,
    FailureStrategy,
    Outcome,
    RunContextInit,
    Workflow,
    createLogger,
    executeFlowAsync,
} from '@stepline/core';
import { FlowDefinitionError, UnknownStepError } from './errors';

const log = createLogger('dynamic');

const STRATEGIES: readonly FailureStrategy[] = Object.values(FailureStrategy);

function toStrategy(raw: string | undefined): FailureStrategy {
    if (raw === undefined) return FailureStrategy.ABORT;
    const strategy = STRATEGIES.find(s => s === raw.trim().toUpperCase());
    if (!strategy) {
        log.warn(`unknown strategy "${raw}", falling back to ${FailureStrategy.ABORT}`);
        return FailureStrategy.ABORT;
    }
    return strategy;
}

export const flowDefinitionSchema = z.object({
    name: z.string().min(1).default('DynamicFlow'),
    description: z.string().optional(),
    steps: z.array(z.string().min(1)).default([]),
    strategy: z.string().optional().transform(toStrategy),
});

export type FlowDefinition = z.output<typeof flowDefinitionSchema>;

export type StepCatalog<D> = Readonly<Record<string, Executable<D>>>;

/**
 * Validates a JSON flow request such as
 * `{ "name": "Signup", "steps": ["validate", "create"], "strategy": "compensate" }`.
 * Strategy is case-insensitive; an unknown one means ABORT.
 */
export function parseFlowDefinition(value: unknown): FlowDefinition {
    const parsed = flowDefinitionSchema.safeParse(value);
    if (!parsed.success) {
        throw new FlowDefinitionError(
            parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    return parsed.data;
}

export function buildWorkflow<D>(definition: FlowDefinition, available: StepCatalog<D>): Workflow<D> {
    const steps = definition.steps.map(name => {
        if (!Object.hasOwn(available, name)) {
            throw new UnknownStepError(name, Object.keys(available));
        }
        return available[name];
    });
    return new Workflow<D>(definition.name, steps, definition.strategy, definition.description);
}

/** Parses, builds and runs a flow request against a catalog of steps, in whichever mode the steps need. */
export async function runDefinition<D>(
    request: unknown,
    data: D,
    available: StepCatalog<D>,
    init?: RunContextInit
): Promise<Outcome<D>> {
    const workflow = buildWorkflow(parseFlowDefinition(request), available);
    log.debug(`running dynamic workflow ${workflow.name} with ${workflow.steps.length} steps`);
    return executeFlowAsync(workflow, data, init);
}
