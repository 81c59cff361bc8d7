import type { LoggerContext } from "../types";
import type { LogEntry, LoggerConfig, LogHandler, LogLevel } from "./types";

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    warn: 1,
    error: 2,
};

/** Fan-out logger: every entry at or above `level` goes to every handler. */
export class Logger implements LoggerContext {
    private readonly handlers: Set<LogHandler>;
    private readonly minRank: number;

    constructor(config: LoggerConfig = {}) {
        this.handlers = new Set(config.handlers);
        this.minRank = LEVEL_RANK[config.level ?? "debug"];
    }

    addHandler(handler: LogHandler): void {
        this.handlers.add(handler);
    }

    removeHandler(handler: LogHandler): void {
        this.handlers.delete(handler);
    }

    debug(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("debug", code, message, details);
    }

    warn(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("warn", code, message, details);
    }

    error(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("error", code, message, details);
    }

    private emit(level: LogLevel, code: string, message: string, details?: Record<string, unknown>): void {
        if (LEVEL_RANK[level] < this.minRank) return;
        const entry: LogEntry = { level, code, message, details, timestamp: Date.now() };
        for (const handler of this.handlers) {
            handler(entry);
        }
    }
}
