export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && value in LEVEL_ORDER;
}

/**
 * Category-tagged console logger.
 * Threshold comes from SYNC_LOG_LEVEL (default 'info'); perf timing from SYNC_PERF_DEBUG=1.
 */
export class SyncLogger {
    private static levelOverride: LogLevel | null = null;
    private static perfCounter = 0;
    private static readonly perfSampleEvery = 100;

    /** Overrides the environment threshold until reset with null */
    static setLevel(level: LogLevel | null): void {
        this.levelOverride = level;
    }

    static getLevel(): LogLevel {
        if (this.levelOverride) return this.levelOverride;
        const fromEnv = process.env.SYNC_LOG_LEVEL?.toLowerCase();
        return isLogLevel(fromEnv) ? fromEnv : 'info';
    }

    static isEnabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.getLevel()];
    }

    static debug(category: string, message: string, data?: unknown): void {
        if (!this.isEnabled('debug')) return;
        console.debug(this.format(category, message), ...this.payload(data));
    }

    static info(category: string, message: string, data?: unknown): void {
        if (!this.isEnabled('info')) return;
        console.log(this.format(category, message), ...this.payload(data));
    }

    static warn(category: string, message: string, data?: unknown): void {
        if (!this.isEnabled('warn')) return;
        console.warn(this.format(category, message), ...this.payload(data));
    }

    static error(category: string, message: string, data?: unknown): void {
        if (!this.isEnabled('error')) return;
        console.error(this.format(category, message), ...this.payload(data));
    }

    /**
     * Times fn and logs every 100th measurement when SYNC_PERF_DEBUG=1.
     */
    static time<T>(category: string, operation: string, fn: () => T): T {
        if (process.env.SYNC_PERF_DEBUG !== '1') return fn();

        const start = performance.now();
        const result = fn();
        const duration = performance.now() - start;

        this.perfCounter++;
        if (this.perfCounter % this.perfSampleEvery === 0) {
            console.log(`[PERF] ${category}[${operation}] ${duration.toFixed(2)}ms`);
        }
        return result;
    }

    private static format(category: string, message: string): string {
        return `[${category}] ${message}`;
    }

    private static payload(data: unknown): unknown[] {
        return data === undefined ? [] : [data];
    }
}
