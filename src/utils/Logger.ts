import type { SupabaseClient } from '@supabase/supabase-js';
import type { LogLevel } from '../config/appConfig';

export interface LogEntry {
    UserID?: string;
    SessionID?: string;
    TransactionID?: string;
    ParentTransactionID?: string;
    Category?: string;
    Endpoint?: string;
    RequestPayload?: unknown;
    ResponsePayload?: unknown;
    Exception?: string;
    ExceptionStackTrace?: string;
    RelatedTo?: string;
    Status?: string;
}

export interface LogSink {
    write(entry: LogEntry): Promise<void>;
}

const SECRET_KEYS = new Set(['password', 'password_hash', 'token', 'session_id', 'apikey', 'api_key', 'authorization', 'verification_code']);

// Replaces secret-looking fields before a payload is stored
export function maskSecrets(value: unknown, depth = 0): unknown {
    if (depth > 6 || value === null || value === undefined) return value;
    if (Array.isArray(value)) return value.map((item) => maskSecrets(item, depth + 1));
    if (typeof value === 'object') {
        return Object.fromEntries(
            Object.entries(value).map(([key, val]) => [
                key,
                SECRET_KEYS.has(key.toLowerCase()) ? '***' : maskSecrets(val, depth + 1),
            ])
        );
    }
    return value;
}

function serialize(payload: unknown): string | null {
    if (payload === undefined || payload === null) return null;
    if (typeof payload === 'string') return payload;
    try {
        return JSON.stringify(payload);
    } catch {
        return String(payload);
    }
}

export class SupabaseLogSink implements LogSink {
    constructor(private readonly client: SupabaseClient) {}

    async write(entry: LogEntry): Promise<void> {
        const { error } = await this.client
            .from('Application_Log')
            .insert([
                {
                    UserID: entry.UserID,
                    SessionID: entry.SessionID,
                    TransactionID: entry.TransactionID,
                    ParentTransactionID: entry.ParentTransactionID,
                    Category: entry.Category,
                    Endpoint: entry.Endpoint,
                    RequestPayload: serialize(entry.RequestPayload),
                    ResponsePayload: serialize(entry.ResponsePayload),
                    Exception: entry.Exception,
                    ExceptionStackTrace: entry.ExceptionStackTrace,
                    RelatedTo: entry.RelatedTo,
                    Status: entry.Status,
                },
            ]);

        if (error) {
            console.error('Failed to write to Application_Log:', error.message);
        }
    }
}

export class ConsoleLogSink implements LogSink {
    async write(entry: LogEntry): Promise<void> {
        const line = `[${entry.Category ?? 'App'}] ${entry.Status ?? ''} ${entry.Endpoint ?? ''} ${entry.TransactionID ?? ''}`.trim();
        if (entry.Exception) {
            console.error(line, entry.Exception);
        } else {
            console.log(line, serialize(entry.ResponsePayload) ?? '');
        }
    }
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export class Logger {
    private static sinks: LogSink[] = [new ConsoleLogSink()];
    private static level: LogLevel = 'info';

    static useSinks(...sinks: LogSink[]) {
        this.sinks = sinks;
    }

    static setLevel(level: LogLevel) {
        this.level = level;
    }

    static async log(entry: LogEntry) {
        const masked: LogEntry = {
            ...entry,
            RequestPayload: maskSecrets(entry.RequestPayload),
            ResponsePayload: maskSecrets(entry.ResponsePayload),
        };
        await Promise.all(
            this.sinks.map(async (sink) => {
                try {
                    await sink.write(masked);
                } catch (err) {
                    console.error('Unexpected error writing log entry:', err);
                }
            })
        );
    }

    static async logDebug(category: string, message: string, metadata?: Partial<LogEntry>) {
        if (LEVEL_ORDER[this.level] > LEVEL_ORDER.debug) return;
        await this.log({ Category: category, Status: 'DEBUG', ResponsePayload: message, ...metadata });
    }

    static async logInfo(
        category: string,
        message: string,
        metadata?: Partial<LogEntry>
    ) {
        if (LEVEL_ORDER[this.level] > LEVEL_ORDER.info) return;
        await this.log({
            Category: category,
            Status: 'INFO',
            ResponsePayload: message,
            ...metadata,
        });
    }

    static async logWarning(category: string, message: string, metadata?: Partial<LogEntry>) {
        if (LEVEL_ORDER[this.level] > LEVEL_ORDER.warn) return;
        await this.log({ Category: category, Status: 'WARNING', ResponsePayload: message, ...metadata });
    }

    static async logError(
        category: string,
        error: unknown,
        metadata?: Partial<LogEntry>
    ) {
        await this.log({
            Category: category,
            Status: 'ERROR',
            Exception: error instanceof Error ? error.message : String(error),
            ExceptionStackTrace: error instanceof Error ? error.stack : undefined,
            ...metadata,
        });
    }

    // Route and service failures; metadata Status/Exception override the defaults
    static async logBackendError(
        category: string,
        error: unknown,
        metadata?: Partial<LogEntry>
    ) {
        await this.log({
            Category: category,
            Status: 'BACKEND_ERROR',
            RelatedTo: 'backend',
            Exception: error instanceof Error ? error.message : String(error),
            ExceptionStackTrace: error instanceof Error ? error.stack : undefined,
            ...metadata,
        });
    }
}
