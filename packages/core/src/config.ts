import 'dotenv/config';
import os from 'os';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseLogLevel(raw: string | undefined): LogLevel {
    const level = LOG_LEVELS.find(l => l === raw?.trim().toLowerCase());
    return level ?? 'warn';
}

// Central configuration, read once when the package loads.
export const config = {
    logLevel: parseLogLevel(process.env.STEPLINE_LOG_LEVEL),
    maxPayloadBytes: parseInt(process.env.STEPLINE_MAX_PAYLOAD_BYTES || '1048576', 10),
    workerMaxThreads: parseInt(process.env.STEPLINE_WORKER_MAX_THREADS || String(Math.max(2, os.cpus().length - 1)), 10),
    workerIdleTimeout: parseInt(process.env.STEPLINE_WORKER_IDLE_TIMEOUT || '30000', 10),
};

export { LOG_LEVELS, parseLogLevel };
