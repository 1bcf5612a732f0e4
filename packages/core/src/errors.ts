/** Base class for everything the engine raises or reports. */
export class StepLineError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StepLineError';
    }
}

/** A task gave up: retries exhausted or the failure was not retryable. `cause` is the last failure. */
export class TaskExecutionError extends StepLineError {
    constructor(
        message: string,
        public readonly step: string,
        public readonly attempts: number,
        cause?: unknown
    ) {
        super(message, { cause });
        this.name = 'TaskExecutionError';
    }
}

/** One attempt ran past its deadline. Retried like any other failure. */
export class TaskTimeoutError extends TaskExecutionError {
    constructor(
        step: string,
        public readonly timeoutSeconds: number,
        attempt: number
    ) {
        super(`Task '${step}' timed out after ${timeoutSeconds}s`, step, attempt);
        this.name = 'TaskTimeoutError';
    }
}

export class CompositeExecutionError extends StepLineError {
    constructor(
        message: string,
        public readonly composite: string,
        public readonly step: string,
        cause?: unknown
    ) {
        super(message, { cause });
        this.name = 'CompositeExecutionError';
    }
}

export class ProcessExecutionError extends CompositeExecutionError {
    constructor(composite: string, step: string, cause?: unknown) {
        super(`Process '${composite}' failed at step '${step}'`, composite, step, cause);
        this.name = 'ProcessExecutionError';
    }
}

export class WorkflowExecutionError extends CompositeExecutionError {
    constructor(composite: string, step: string, cause?: unknown) {
        super(`Workflow '${composite}' failed at step '${step}'`, composite, step, cause);
        this.name = 'WorkflowExecutionError';
    }
}

/** An undo action failed. Never retried, never folded into an Outcome. */
export class CompensationError extends StepLineError {
    constructor(
        public readonly step: string,
        cause?: unknown
    ) {
        super(`Compensation of '${step}' failed`, { cause });
        this.name = 'CompensationError';
    }
}

/** Wrong runner for the tree, or a step produced a result of the wrong mode. */
export class ContractViolationError extends StepLineError {
    constructor(message: string) {
        super(message);
        this.name = 'ContractViolationError';
    }
}

export type ContextDecodeCode =
    | 'INVALID_STRUCTURE'
    | 'INVALID_TRACE'
    | 'INVALID_TRACE_EVENT'
    | 'INVALID_METADATA'
    | 'INVALID_COMPLETED_STEPS'
    | 'INVALID_COMPENSATED_STEPS'
    | 'INVALID_DATA';

export class ContextDecodeError extends StepLineError {
    constructor(
        public readonly code: ContextDecodeCode,
        message: string
    ) {
        super(message);
        this.name = 'ContextDecodeError';
    }
}

export class SerializationError extends StepLineError {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

// The two kinds allowed to escape execute().
export function isFatal(err: unknown): err is CompensationError | ContractViolationError {
    return err instanceof CompensationError || err instanceof ContractViolationError;
}

export function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}
