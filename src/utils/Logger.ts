import type { ApplicationLogRecord } from '../types/records';
import { errorMessage } from './errors';

export interface LogEntry {
    UserID?: string;
    TransactionID?: string;
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
    writeLog(record: ApplicationLogRecord): Promise<void>;
}

function serialize(payload: unknown): string | null {
    if (payload === undefined || payload === null) return null;
    return typeof payload === 'string' ? payload : JSON.stringify(payload);
}

export class Logger {
    private static sink: LogSink | null = null;

    // Entries go to the console until a sink is attached
    static attach(sink: LogSink | null) {
        this.sink = sink;
    }

    static async log(entry: LogEntry) {
        const record: ApplicationLogRecord = {
            UserID: entry.UserID ?? null,
            TransactionID: entry.TransactionID ?? null,
            Category: entry.Category ?? null,
            Endpoint: entry.Endpoint ?? null,
            RequestPayload: serialize(entry.RequestPayload),
            ResponsePayload: serialize(entry.ResponsePayload),
            Exception: entry.Exception ?? null,
            ExceptionStackTrace: entry.ExceptionStackTrace ?? null,
            RelatedTo: entry.RelatedTo ?? null,
            Status: entry.Status ?? null,
        };

        if (!this.sink) {
            const line = `[${record.Category ?? 'App'}] ${record.Status ?? ''} ${record.Endpoint ?? ''}`.trim();
            if (record.Exception) {
                console.error(line, record.Exception);
            } else {
                console.log(line, record.ResponsePayload ?? '');
            }
            return;
        }

        try {
            await this.sink.writeLog(record);
        } catch (err) {
            console.error('Failed to write to application_log:', err);
        }
    }

    static async logInfo(
        category: string,
        message: string,
        metadata?: Partial<LogEntry>
    ) {
        await this.log({
            Category: category,
            Status: 'INFO',
            ResponsePayload: message, // generic info lands in ResponsePayload
            ...metadata,
        });
    }

    static async logError(
        category: string,
        error: unknown,
        metadata?: Partial<LogEntry>
    ) {
        await this.log({
            Category: category,
            Status: 'ERROR',
            Exception: errorMessage(error),
            ExceptionStackTrace: error instanceof Error ? error.stack : undefined,
            ...metadata,
        });
    }

    /** Same as logError; callers pass a more specific Status through metadata. */
    static async logBackendError(
        category: string,
        error: unknown,
        metadata?: Partial<LogEntry>
    ) {
        await this.logError(category, error, metadata);
    }
}
