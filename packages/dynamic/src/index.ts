// public api for @stepline/dynamic
// usage:
//   import { runDefinition, describeWorkflow, toFunctionSchema } from '@stepline/dynamic';
//   const outcome = await runDefinition({ steps: ['validate', 'create'] }, user, { validate, create });

export { describeWorkflow, toFunctionSchema, functionName } from './manifest';
export type { WorkflowManifest, StepManifest, FunctionSchema } from './manifest';
export { parseFlowDefinition, buildWorkflow, runDefinition, flowDefinitionSchema } from './definition';
export type { FlowDefinition, StepCatalog } from './definition';
export { FlowDefinitionError, UnknownStepError } from './errors';
