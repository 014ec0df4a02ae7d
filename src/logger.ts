// Structured logs go to stderr: stdout carries the stdio transport.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

export function log(level: LogLevel, event: string, fields: Record<string, unknown> = {}): void {
    if (LEVELS[level] < LEVELS[threshold]) return;
    console.error(JSON.stringify({ level, event, ...fields }));
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
