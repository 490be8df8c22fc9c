import { SyncLogger } from './SyncLogger';

export enum SyncErrorCode {
    // Motion source problems (source skipped or truncated, never fatal)
    MALFORMED_SOURCE = 'MALFORMED_SOURCE',
    MISSING_TRAJECTORY = 'MISSING_TRAJECTORY',
    MISSING_FIELDS = 'MISSING_FIELDS',
    LENGTH_MISMATCH = 'LENGTH_MISMATCH',
    EMPTY_TRAJECTORY = 'EMPTY_TRAJECTORY',
    SOURCE_READ_FAILED = 'SOURCE_READ_FAILED',
    NO_SOURCES = 'NO_SOURCES',

    // Query problems
    EMPTY_TRACK = 'EMPTY_TRACK',

    // Calibration
    INVALID_CALIBRATION = 'INVALID_CALIBRATION',
    CALIBRATION_NOT_FOUND = 'CALIBRATION_NOT_FOUND',

    // Orchestration (raised as SyncError)
    SOURCE_NOT_FOUND = 'SOURCE_NOT_FOUND',
    CONFIG_NOT_FOUND = 'CONFIG_NOT_FOUND',
    INVALID_CONFIG = 'INVALID_CONFIG',
    TIMELINE_NOT_FOUND = 'TIMELINE_NOT_FOUND',
    INVALID_TIMELINE = 'INVALID_TIMELINE',
    OUTPUT_WRITE_FAILED = 'OUTPUT_WRITE_FAILED',
}

export type DiagnosticSeverity = 'info' | 'warn' | 'error';

export interface SyncDiagnostic {
    code: SyncErrorCode;
    severity: DiagnosticSeverity;
    message: string;
    source?: string;
    details?: Record<string, unknown>;
    timestamp: number;
}

/**
 * Fatal condition for the orchestration layer (missing config, missing motion path).
 * Core operations report through DiagnosticLog instead.
 */
export class SyncError extends Error {
    readonly code: SyncErrorCode;
    readonly details?: Record<string, unknown>;

    constructor(code: SyncErrorCode, message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = 'SyncError';
        this.code = code;
        this.details = details;
    }
}

export function isSyncError(error: unknown): error is SyncError {
    return error instanceof SyncError;
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Collects non-fatal diagnostics and forwards each one to the logger.
 * Unbounded unless a history size is given; a bounded log drops the oldest entries first and counts them.
 */
export class DiagnosticLog {
    private readonly entries: SyncDiagnostic[] = [];
    private readonly category: string;
    private readonly maxHistorySize: number;
    private dropped = 0;

    constructor(category: string, maxHistorySize: number = Infinity) {
        this.category = category;
        this.maxHistorySize = maxHistorySize;
    }

    report(
        code: SyncErrorCode,
        message: string,
        options: { severity?: DiagnosticSeverity; source?: string; details?: Record<string, unknown> } = {}
    ): SyncDiagnostic {
        const diagnostic: SyncDiagnostic = {
            code,
            severity: options.severity ?? 'warn',
            message,
            source: options.source,
            details: options.details,
            timestamp: Date.now()
        };

        const line = options.source ? `[${code}] ${options.source}: ${message}` : `[${code}] ${message}`;
        switch (diagnostic.severity) {
            case 'info':
                SyncLogger.info(this.category, line, options.details);
                break;
            case 'warn':
                SyncLogger.warn(this.category, line, options.details);
                break;
            case 'error':
                SyncLogger.error(this.category, line, options.details);
                break;
        }

        this.append(diagnostic);
        return diagnostic;
    }

    /** Appends diagnostics produced elsewhere without logging them again */
    absorb(diagnostics: readonly SyncDiagnostic[]): void {
        for (const diagnostic of diagnostics) {
            this.append(diagnostic);
        }
    }

    private append(diagnostic: SyncDiagnostic): void {
        this.entries.push(diagnostic);
        if (this.entries.length > this.maxHistorySize) {
            this.entries.shift();
            this.dropped++;
        }
    }

    /** Entries discarded by the history bound */
    droppedCount(): number {
        return this.dropped;
    }

    getAll(): readonly SyncDiagnostic[] {
        return this.entries;
    }

    count(code?: SyncErrorCode): number {
        return code ? this.entries.filter(d => d.code === code).length : this.entries.length;
    }

    has(code: SyncErrorCode): boolean {
        return this.entries.some(d => d.code === code);
    }
}
