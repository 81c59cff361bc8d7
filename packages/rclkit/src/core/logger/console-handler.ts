import type { ConsoleHandlerOptions, LogHandler } from "./types";

type Palette = {
    dim: string;
    key: string;
    str: string;
    num: string;
    nil: string;
    reset: string;
};

const ANSI: Palette = {
    dim: "\x1b[90m",
    key: "\x1b[36m",
    str: "\x1b[32m",
    num: "\x1b[33m",
    nil: "\x1b[35m",
    reset: "\x1b[0m",
};

const PLAIN: Palette = { dim: "", key: "", str: "", num: "", nil: "", reset: "" };

function formatTime(ts: number): string {
    const d = new Date(ts);
    const h = String(d.getHours()).padStart(2, "0");
    const m = String(d.getMinutes()).padStart(2, "0");
    const s = String(d.getSeconds()).padStart(2, "0");
    return `${h}:${m}:${s}`;
}

function formatValue(value: unknown, p: Palette): string {
    if (value === null) return `${p.nil}null${p.reset}`;
    if (value === undefined) return `${p.dim}undefined${p.reset}`;
    if (typeof value === "string") return `${p.str}"${value}"${p.reset}`;
    if (typeof value === "number" || typeof value === "boolean") return `${p.num}${value}${p.reset}`;
    if (Array.isArray(value)) {
        if (value.length === 0) return "[]";
        return `[${value.map((v) => formatValue(v, p)).join(`${p.dim},${p.reset} `)}]`;
    }
    if (typeof value === "object") {
        const entries = Object.entries(value);
        if (entries.length === 0) return "{}";
        const pairs = entries.map(([k, v]) => `${p.key}${k}${p.reset}${p.dim}:${p.reset} ${formatValue(v, p)}`);
        return `${p.dim}{${p.reset} ${pairs.join(`${p.dim},${p.reset} `)} ${p.dim}}${p.reset}`;
    }
    return String(value);
}

/** `HH:MM:SS [tag] code → message {details}`, routed by level to console.log / warn / error. */
export function createConsoleHandler(options: ConsoleHandlerOptions = {}): LogHandler {
    const tag = options.tag ?? "rclkit";
    const palette = (options.colors ?? process.stdout.isTTY === true) ? ANSI : PLAIN;

    return (entry) => {
        const time = formatTime(entry.timestamp);
        const label = entry.level === "debug" ? tag : entry.level;
        const detailsPart = entry.details ? ` ${formatValue(entry.details, palette)}` : "";
        const line = `${time} [${label}] ${entry.code} → ${entry.message}${detailsPart}`;

        if (entry.level === "error") {
            console.error(line);
        } else if (entry.level === "warn") {
            console.warn(line);
        } else {
            console.log(line);
        }
    };
}
