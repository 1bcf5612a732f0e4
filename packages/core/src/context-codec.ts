import superjson from 'superjson';
import { z } from 'zod';
import { config } from './config';
import { RunContext, TraceEvent } from './context';
import { ContextDecodeCode, ContextDecodeError, SerializationError, toError } from './errors';

const wireEventSchema = z.object({
    timestamp: z.string(),
    level: z.enum(['INFO', 'ERROR', 'DEBUG']),
    source: z.string(),
    message: z.string(),
});

const objectSchema = z.record(z.unknown());
const listSchema = z.array(z.unknown());
const stepListSchema = z.array(z.string());

export type WireEvent = z.infer<typeof wireEventSchema>;

/** Persisted shape of a RunContext. Timestamps are ISO-8601 strings. */
export interface ContextWire<D = unknown> {
    data: D;
    trace: WireEvent[];
    metadata: Record<string, unknown>;
    completedSteps: string[];
    compensatedSteps: string[];
}

export type DataSchema<D> = z.ZodType<D, z.ZodTypeDef, unknown>;

export function encodeContext<D>(ctx: RunContext<D>): ContextWire<D> {
    return {
        data: ctx.data,
        trace: ctx.trace.map(event => ({
            timestamp: event.timestamp.toISOString(),
            level: event.level,
            source: event.source,
            message: event.message,
        })),
        metadata: { ...ctx.metadata },
        completedSteps: [...ctx.completedSteps],
        compensatedSteps: [...ctx.compensatedSteps],
    };
}

function fail(code: ContextDecodeCode, message: string, issues?: z.ZodError): never {
    const detail = issues ? `: ${issues.issues.map(i => i.message).join('; ')}` : '';
    throw new ContextDecodeError(code, `${message}${detail}`);
}

function parseField<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, fallback: T, code: ContextDecodeCode, message: string): T {
    if (value === undefined) return fallback;
    const parsed = schema.safeParse(value);
    return parsed.success ? parsed.data : fail(code, message);
}

function parseTrace(value: unknown): TraceEvent[] {
    const items = parseField(listSchema, value, [], 'INVALID_TRACE', 'Invalid trace format: expected an array');

    return items.map((item, index) => {
        const parsed = wireEventSchema.safeParse(item);
        if (!parsed.success) {
            return fail('INVALID_TRACE_EVENT', `Invalid trace event format at index ${index}`, parsed.error);
        }
        const timestamp = new Date(parsed.data.timestamp);
        return {
            // unreadable timestamps fall back to the decode time
            timestamp: Number.isNaN(timestamp.getTime()) ? new Date() : timestamp,
            level: parsed.data.level,
            source: parsed.data.source,
            message: parsed.data.message,
        };
    });
}

/**
 * Rebuilds a RunContext from its wire form. Each malformed part is reported
 * with its own ContextDecodeError code. With a zod schema, `data` is
 * validated and typed by it.
 */
export function decodeContext(value: unknown): RunContext<unknown>;
export function decodeContext<D>(value: unknown, dataSchema: DataSchema<D>): RunContext<D>;
export function decodeContext<D>(value: unknown, dataSchema?: DataSchema<D>): RunContext<unknown> {
    const top = objectSchema.safeParse(value);
    if (!top.success) {
        return fail('INVALID_STRUCTURE', 'Invalid context structure: expected an object');
    }
    const raw = top.data;

    const init = {
        trace: parseTrace(raw.trace),
        metadata: parseField(objectSchema, raw.metadata, {}, 'INVALID_METADATA', 'Invalid metadata format: expected an object'),
        completedSteps: parseField(stepListSchema, raw.completedSteps, [], 'INVALID_COMPLETED_STEPS', 'Invalid completedSteps format: expected an array of step names'),
        compensatedSteps: parseField(stepListSchema, raw.compensatedSteps, [], 'INVALID_COMPENSATED_STEPS', 'Invalid compensatedSteps format: expected an array of step names'),
    };

    if (!dataSchema) return new RunContext<unknown>(raw.data, init);

    const data = dataSchema.safeParse(raw.data);
    if (!data.success) {
        return fail('INVALID_DATA', 'Invalid context data', data.error);
    }
    return new RunContext(data.data, init);
}

/**
 * superjson text of the wire form, so Dates, Maps and Sets inside `data`
 * survive. Throws SerializationError past `maxBytes` of UTF-8.
 */
export function contextToJson<D>(ctx: RunContext<D>, maxBytes: number = config.maxPayloadBytes): string {
    let text: string;
    try {
        text = superjson.stringify(encodeContext(ctx));
    } catch (err) {
        throw new SerializationError(`Context could not be encoded: ${toError(err).message}`);
    }

    const size = Buffer.byteLength(text);
    if (size > maxBytes) {
        throw new SerializationError(`Encoded context is ${size} bytes, above the limit of ${maxBytes}`);
    }
    return text;
}

export function contextFromJson(raw: string): RunContext<unknown>;
export function contextFromJson<D>(raw: string, dataSchema: DataSchema<D>): RunContext<D>;
export function contextFromJson<D>(raw: string, dataSchema?: DataSchema<D>): RunContext<unknown> {
    let value: unknown;
    try {
        value = superjson.parse<unknown>(raw);
    } catch (err) {
        return fail('INVALID_STRUCTURE', `Invalid context structure: ${toError(err).message}`);
    }
    return dataSchema ? decodeContext(value, dataSchema) : decodeContext(value);
}
