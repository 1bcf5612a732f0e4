// public api for @stepline/core
// usage:
//   import { Task, Workflow, FailureStrategy, SyncRunner, RunContext } from '@stepline/core';
//   const outcome = new SyncRunner().run(new Workflow('signup', [validate, create, notify]), new RunContext(user));

export { RunContext } from './context';
export type { EventLevel, TraceEvent, ErrorFormatter, RunContextInit } from './context';
export { createOutcome, withDuration, isSuccess, summarizeOutcome } from './outcome';
export type { Outcome, OutcomeStatus, OutcomeSummary } from './outcome';
export { ready, pending, settle, requireReady, isThenable } from './execution';
export type { MaybePending } from './execution';
export { Composite } from './executable';
export type { Executable } from './executable';
export { RetryPolicy, BackoffStrategy, MAX_ATTEMPTS_LIMIT, MAX_DELAY_LIMIT } from './retry-policy';
export type { RetryPolicyOptions, ErrorMatcher, ErrorClass, ErrorPredicate } from './retry-policy';
export { Task, task, MAX_TIMEOUT_SECONDS } from './task';
export type { TaskOptions, TaskFactoryOptions, TaskFn, UndoFn, ExecutionMode } from './task';
export { Process } from './process';
export { Workflow, FailureStrategy } from './workflow';
export { SyncRunner, AsyncRunner } from './runner';
export { executeFlow, executeFlowAsync } from './run';
export { WorkerPool, workerTask } from './worker-pool';
export type { WorkerPoolOptions, WorkerTaskOptions, WorkerTimeoutBehavior } from './worker-pool';
export { encodeContext, decodeContext, contextToJson, contextFromJson } from './context-codec';
export type { ContextWire, WireEvent, DataSchema } from './context-codec';
export {
    StepLineError,
    TaskExecutionError,
    TaskTimeoutError,
    CompositeExecutionError,
    ProcessExecutionError,
    WorkflowExecutionError,
    CompensationError,
    ContractViolationError,
    ContextDecodeError,
    SerializationError,
    isFatal,
} from './errors';
export type { ContextDecodeCode } from './errors';
export { createLogger } from './logger';
export type { Logger } from './logger';
export { config } from './config';
export type { LogLevel } from './config';
