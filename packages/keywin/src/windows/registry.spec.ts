import { describe, expect, it, vi } from "vitest";
import type { LoggerContext } from "../core/logger/types";
import { WindowRegistry } from "./registry";

function createLogger() {
    return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies LoggerContext;
}

const konsole = { identity: "{0001}", caption: "~ : bash — Konsole", resourceClass: "org.kde.konsole" };

describe("WindowRegistry", () => {
    it("insert() stores and reports new identities", () => {
        const registry = new WindowRegistry(createLogger());
        expect(registry.insert(konsole)).toBe(true);
        expect(registry.get("{0001}")).toEqual(konsole);
        expect(registry.has("{0001}")).toBe(true);
        expect(registry.size).toBe(1);
    });

    it("insert() of a known identity refreshes its metadata", () => {
        const logger = createLogger();
        const registry = new WindowRegistry(logger);
        registry.insert(konsole);
        expect(registry.insert({ ...konsole, caption: "htop" })).toBe(false);
        expect(registry.get("{0001}")?.caption).toBe("htop");
        expect(registry.size).toBe(1);
        expect(logger.debug).toHaveBeenCalledWith("registry", "window already registered, refreshing metadata", {
            identity: "{0001}",
        });
    });

    it("remove() returns the removed entry", () => {
        const registry = new WindowRegistry(createLogger());
        registry.insert(konsole);
        expect(registry.remove("{0001}")).toEqual(konsole);
        expect(registry.has("{0001}")).toBe(false);
        expect(registry.list()).toEqual([]);
    });

    it("remove() of an unknown identity logs and returns null", () => {
        const logger = createLogger();
        const registry = new WindowRegistry(logger);
        expect(registry.remove("ghost")).toBeNull();
        expect(logger.warn).toHaveBeenCalledWith("registry", "removal of unknown window", {
            kind: "registry-inconsistency",
            identity: "ghost",
        });
    });

    it("list() keeps insertion order", () => {
        const registry = new WindowRegistry(createLogger());
        registry.insert(konsole);
        registry.insert({ identity: "{0002}", caption: "Dolphin", resourceClass: "org.kde.dolphin" });
        expect(registry.list().map((w) => w.identity)).toEqual(["{0001}", "{0002}"]);
    });
});
