export type EventLevel = 'INFO' | 'ERROR' | 'DEBUG';

export interface TraceEvent {
    timestamp: Date;
    level: EventLevel;
    source: string;
    message: string;
}

export type ErrorFormatter = (err: Error) => string;

export interface RunContextInit {
    trace?: TraceEvent[];
    metadata?: Record<string, unknown>;
    completedSteps?: Iterable<string>;
    compensatedSteps?: Iterable<string>;
    formatError?: ErrorFormatter;
}

/**
 * Mutable carrier threaded through every step of a run.
 *
 * `data` belongs to the caller. The trace and the completed/compensated sets
 * belong to the engine: they only grow, and only through the methods below.
 * `completedSteps` is the sole authority on whether a step succeeded.
 */
export class RunContext<D = unknown> {
    readonly metadata: Record<string, unknown>;
    private readonly events: TraceEvent[];
    private readonly completed: Set<string>;
    private readonly compensated: Set<string>;
    private readonly formatter: ErrorFormatter;

    constructor(
        public data: D,
        init: RunContextInit = {}
    ) {
        this.events = init.trace ? [...init.trace] : [];
        this.metadata = init.metadata ?? {};
        this.completed = new Set(init.completedSteps);
        this.compensated = new Set(init.compensatedSteps);
        this.formatter = init.formatError ?? (err => err.message);
    }

    get trace(): readonly TraceEvent[] {
        return this.events;
    }

    get completedSteps(): ReadonlySet<string> {
        return this.completed;
    }

    get compensatedSteps(): ReadonlySet<string> {
        return this.compensated;
    }

    log(level: EventLevel, source: string, message: string): void {
        this.events.push({ timestamp: new Date(), level, source, message });
    }

    markCompleted(name: string): void {
        this.completed.add(name);
    }

    hasCompleted(name: string): boolean {
        return this.completed.has(name);
    }

    markCompensated(name: string): void {
        this.compensated.add(name);
    }

    hasCompensated(name: string): boolean {
        return this.compensated.has(name);
    }

    // Runs the caller's sanitizer so exception text that may carry secrets stays out of the trace.
    formatError(err: Error): string {
        return this.formatter(err);
    }
}
