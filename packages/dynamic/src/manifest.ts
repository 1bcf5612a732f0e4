import { Executable, FailureStrategy, Workflow } from '@stepline/core';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ZodTypeAny } from 'zod';

const NO_DESCRIPTION = 'No description provided.';

export interface StepManifest {
    name: string;
    description: string;
}

export interface WorkflowManifest {
    name: string;
    description: string;
    strategy: FailureStrategy;
    steps: StepManifest[];
}

export interface FunctionSchema {
    name: string;
    description: string;
    parameters: {
        type: 'object';
        properties: { initial_data: ReturnType<typeof zodToJsonSchema> };
        required: ['initial_data'];
    };
}

function describeStep(step: Executable<unknown>): StepManifest {
    return { name: step.name, description: step.description || NO_DESCRIPTION };
}

/** Structure of a workflow with its human-readable descriptions, one level deep. */
export function describeWorkflow<D>(workflow: Workflow<D>): WorkflowManifest {
    return {
        name: workflow.name,
        description: workflow.description || NO_DESCRIPTION,
        strategy: workflow.strategy,
        steps: workflow.steps.map(describeStep),
    };
}

export function functionName(workflowName: string): string {
    return `run_${workflowName.trim().toLowerCase().replace(/[\s-]+/g, '_')}`;
}

/**
 * Tool-calling definition for a workflow: the caller (typically a model)
 * supplies `initial_data`, shaped by `dataSchema`.
 */
export function toFunctionSchema(manifest: WorkflowManifest, dataSchema: ZodTypeAny): FunctionSchema {
    return {
        name: functionName(manifest.name),
        description: manifest.description,
        parameters: {
            type: 'object',
            properties: { initial_data: zodToJsonSchema(dataSchema, { $refStrategy: 'none' }) },
            required: ['initial_data'],
        },
    };
}
