import { LOG_LEVEL_ORDER, type LogEntry, type LogHandler, type LogLevel } from "./types";

const dim = "\x1b[90m";
const cyan = "\x1b[36m";
const green = "\x1b[32m";
const yellow = "\x1b[33m";
const red = "\x1b[31m";
const magenta = "\x1b[35m";
const reset = "\x1b[0m";

const LEVEL_COLORS: Record<LogLevel, string> = {
    debug: dim,
    info: cyan,
    warn: yellow,
    error: red,
};

export type ConsoleHandlerOptions = {
    /** Entries below this level are dropped. Defaults to `"debug"`. */
    level?: LogLevel;
    /** Disable ANSI colours, e.g. when stdout is not a TTY. */
    colors?: boolean;
};

function formatTime(ts: number): string {
    const d = new Date(ts);
    const h = String(d.getHours()).padStart(2, "0");
    const m = String(d.getMinutes()).padStart(2, "0");
    const s = String(d.getSeconds()).padStart(2, "0");
    return `${h}:${m}:${s}`;
}

function formatValue(value: unknown, paint: (color: string, text: string) => string): string {
    if (value === null) return paint(magenta, "null");
    if (value === undefined) return paint(dim, "undefined");
    if (typeof value === "string") return paint(green, `"${value}"`);
    if (typeof value === "number" || typeof value === "boolean") return paint(yellow, String(value));
    if (value instanceof Error) return paint(red, value.message);
    if (Array.isArray(value)) {
        if (value.length === 0) return "[]";
        return `[${value.map((item) => formatValue(item, paint)).join(", ")}]`;
    }
    if (typeof value === "object") {
        const entries = Object.entries(value);
        if (entries.length === 0) return "{}";
        const pairs = entries.map(([k, v]) => `${paint(cyan, k)}: ${formatValue(v, paint)}`);
        return `{ ${pairs.join(", ")} }`;
    }
    return String(value);
}

export function formatEntry(entry: LogEntry, colors = false): string {
    const paint = colors ? (color: string, text: string) => `${color}${text}${reset}` : (_: string, text: string) => text;
    const time = paint(dim, formatTime(entry.timestamp));
    const tag = paint(LEVEL_COLORS[entry.level], `[${entry.level}]`);
    const detailsPart = entry.details ? ` ${formatValue(entry.details, paint)}` : "";
    return `${time} ${tag} ${entry.code} → ${entry.message}${detailsPart}`;
}

export function createConsoleHandler(options: ConsoleHandlerOptions = {}): LogHandler {
    const threshold = LOG_LEVEL_ORDER[options.level ?? "debug"];
    const colors = options.colors ?? true;

    return (entry: LogEntry) => {
        if (LOG_LEVEL_ORDER[entry.level] < threshold) return;
        const line = formatEntry(entry, colors);

        if (entry.level === "error") {
            console.error(line);
        } else if (entry.level === "warn") {
            console.warn(line);
        } else {
            console.log(line);
        }
    };
}
