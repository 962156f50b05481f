export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const satisfies readonly LogLevel[];

export type Logger = {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
    /** Derive a logger whose lines carry an extra tag, e.g. a scan id. */
    child(tag: string): Logger;
};

export type LogSink = Pick<Console, "debug" | "info" | "warn" | "error">;

const RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

/**
 * Console logger with a `[gap-scan:<scope>]` prefix.
 *
 * Lines below `level` are dropped before formatting.
 */
export function createLogger(scope: string, level: LogLevel = "info", sink: LogSink = console): Logger {
    const prefix = `[gap-scan:${scope}]`;
    const threshold = RANK[level];

    const emit =
        (lineLevel: Exclude<LogLevel, "silent">) =>
        (message: string, ...details: unknown[]): void => {
            if (RANK[lineLevel] < threshold) return;
            sink[lineLevel](`${prefix} ${message}`, ...details);
        };

    return {
        debug: emit("debug"),
        info: emit("info"),
        warn: emit("warn"),
        error: emit("error"),
        child: (tag: string) => createLogger(`${scope}#${tag}`, level, sink),
    };
}

export const silentLogger: Logger = createLogger("silent", "silent");
