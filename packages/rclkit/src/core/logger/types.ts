export type LogLevel = "debug" | "warn" | "error";

export type LogEntry = {
    level: LogLevel;
    code: string;
    message: string;
    details?: Record<string, unknown>;
    timestamp: number;
};

export type LogHandler = (entry: LogEntry) => void;

export type LoggerConfig = {
    /** Entries below this level are dropped. Defaults to `"debug"`. */
    level?: LogLevel;
    handlers?: LogHandler[];
};

export type ConsoleHandlerOptions = {
    /** Tag printed for debug entries. Defaults to `"rclkit"`. */
    tag?: string;
    /** ANSI colours. Defaults to whether stdout is a TTY. */
    colors?: boolean;
};
