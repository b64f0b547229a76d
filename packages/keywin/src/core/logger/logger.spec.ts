/**
 * Contract: Logger -- handler fan-out plus the console formatter.
 *
 * Sections:
 *   1. Handler management
 *   2. Logging methods
 *   3. Console handler (formatting, level threshold, routing)
 */
import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleHandler, formatEntry } from "./console-handler";
import { Logger } from "./logger";
import { isLogLevel, type LogEntry } from "./types";

describe("Logger", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    // -- 1. Handler management --
    describe("Handler management", () => {
        it("addHandler returns an unsubscribe function", () => {
            const logger = new Logger();
            const handler = vi.fn();
            const off = logger.addHandler(handler);
            logger.info("deck", "opened");
            off();
            logger.info("deck", "opened again");
            expect(handler).toHaveBeenCalledOnce();
        });

        it("removeHandler stops delivery", () => {
            const logger = new Logger();
            const handler = vi.fn();
            logger.addHandler(handler);
            logger.removeHandler(handler);
            logger.debug("deck", "ignored");
            expect(handler).not.toHaveBeenCalled();
        });

        it("fans out to every handler", () => {
            const logger = new Logger();
            const a = vi.fn();
            const b = vi.fn();
            logger.addHandler(a);
            logger.addHandler(b);
            logger.warn("slots", "full");
            expect(a).toHaveBeenCalledOnce();
            expect(b).toHaveBeenCalledOnce();
        });
    });

    // -- 2. Logging methods --
    describe("Logging methods", () => {
        it.each(["debug", "info", "warn", "error"] as const)("%s() emits an entry with that level", (level) => {
            const logger = new Logger();
            const entries: LogEntry[] = [];
            logger.addHandler((entry) => entries.push(entry));
            logger[level]("script", "hello", { id: 3 });
            expect(entries).toHaveLength(1);
            expect(entries[0]).toMatchObject({ level, code: "script", message: "hello", details: { id: 3 } });
            expect(typeof entries[0]?.timestamp).toBe("number");
        });

        it("leaves details undefined when omitted", () => {
            const logger = new Logger();
            const entries: LogEntry[] = [];
            logger.addHandler((entry) => entries.push(entry));
            logger.info("deck", "ready");
            expect(entries[0]?.details).toBeUndefined();
        });
    });

    // -- 3. Console handler --
    describe("Console handler", () => {
        const at = new Date(2024, 0, 1, 9, 5, 7).getTime();

        it("formats without colours", () => {
            const line = formatEntry({ level: "info", code: "slots", message: "assigned", details: { slot: 2, id: "W1" }, timestamp: at });
            expect(line).toBe('09:05:07 [info] slots → assigned { slot: 2, id: "W1" }');
        });

        it("formats nested values and errors", () => {
            const line = formatEntry({
                level: "error",
                code: "host",
                message: "load failed",
                details: { error: new Error("boom"), keys: [1, null] },
                timestamp: at,
            });
            expect(line).toBe("09:05:07 [error] host → load failed { error: boom, keys: [1, null] }");
        });

        it("drops entries below the threshold", () => {
            const spy = vi.spyOn(console, "log").mockImplementation(() => {});
            const handler = createConsoleHandler({ level: "info", colors: false });
            handler({ level: "debug", code: "script", message: "noise", timestamp: at });
            expect(spy).not.toHaveBeenCalled();
            handler({ level: "info", code: "deck", message: "ready", timestamp: at });
            expect(spy).toHaveBeenCalledWith("09:05:07 [info] deck → ready");
        });

        it("routes warn and error to their console methods", () => {
            const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
            const error = vi.spyOn(console, "error").mockImplementation(() => {});
            const handler = createConsoleHandler({ colors: false });
            handler({ level: "warn", code: "registry", message: "unknown window", timestamp: at });
            handler({ level: "error", code: "host", message: "down", timestamp: at });
            expect(warn).toHaveBeenCalledWith("09:05:07 [warn] registry → unknown window");
            expect(error).toHaveBeenCalledWith("09:05:07 [error] host → down");
        });

        it("colours the level tag by default", () => {
            const spy = vi.spyOn(console, "log").mockImplementation(() => {});
            createConsoleHandler()({ level: "info", code: "deck", message: "ready", timestamp: at });
            expect(spy.mock.calls[0]?.[0]).toContain("\x1b[36m[info]\x1b[0m");
        });
    });

    it("isLogLevel narrows known levels only", () => {
        expect(isLogLevel("warn")).toBe(true);
        expect(isLogLevel("verbose")).toBe(false);
        expect(isLogLevel("toString")).toBe(false);
    });
});
