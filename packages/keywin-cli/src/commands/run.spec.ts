/**
 * Contract: run -- wiring, startup failure and signal-driven shutdown of `keywin run`.
 *
 * The session bus and the Stream Deck are replaced with in-process fakes; the
 * KWin transport, script host and coordinator are the real ones.
 *
 * Sections:
 *   1. Wiring order
 *   2. Startup failures
 *   3. Termination
 */
import type { Message } from "dbus-next";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { SessionBus } from "../dbus/session";

const mocks = vi.hoisted(() => ({
    connectSessionBus: vi.fn<() => SessionBus>(),
    openFirst: vi.fn<() => Promise<FakeDeck>>(),
}));

vi.mock("../dbus/session", () => ({ connectSessionBus: mocks.connectSessionBus }));
vi.mock("../device/stream-deck", () => ({ StreamDeckKeys: { openFirst: mocks.openFirst } }));

import { run } from "./run";

type FakeDeck = ReturnType<typeof createDeck>;

function createDeck(steps: string[]) {
    return {
        keyCount: 8,
        keySize: { width: 72, height: 72 },
        prepare: vi.fn(async (_brightness: number) => {
            steps.push("prepare");
        }),
        setKeyImage: vi.fn(async () => {}),
        onKeyStateChange: vi.fn(() => () => {}),
        close: vi.fn(async () => {
            steps.push("close");
        }),
    };
}

function createBus(steps: string[]) {
    let nextId = 1;
    const held = new Map<string, Promise<void>>();
    const failing = new Set<string>();
    const closeListeners = new Set<(reason: string) => void>();
    const bus = {
        call: vi.fn(async (message: Message) => {
            steps.push(message.member);
            await held.get(message.member);
            if (failing.has(message.member)) throw new Error(`${message.member} refused`);
            if (message.member === "loadScript") return { body: [nextId++] };
            if (message.member === "unloadScript") return { body: [true] };
            return { body: [] };
        }),
        exportListener: vi.fn(() => {
            steps.push("export");
        }),
        claimName: vi.fn(async (_name: string) => {
            steps.push("claim");
            return true;
        }),
        onClose: vi.fn((listener: (reason: string) => void) => {
            closeListeners.add(listener);
            return () => {
                closeListeners.delete(listener);
            };
        }),
        disconnect: vi.fn(() => {
            steps.push("disconnect");
        }),
    } satisfies SessionBus;

    return {
        bus,
        /** Park calls to `member` until the returned function is called. */
        hold(member: string): () => void {
            let release: () => void = () => {};
            held.set(
                member,
                new Promise<void>((resolve) => {
                    release = resolve;
                }),
            );
            return () => release();
        },
        fail(member: string): void {
            failing.add(member);
        },
        close(reason: string): void {
            for (const listener of closeListeners) listener(reason);
        },
    };
}

describe("run", () => {
    let steps: string[];
    let deck: FakeDeck;
    let session: ReturnType<typeof createBus>;
    let baselineSigint: number;
    let baselineSigterm: number;
    const flags = { logLevel: "error" };

    const count = (step: string) => steps.filter((s) => s === step).length;

    beforeEach(() => {
        steps = [];
        deck = createDeck(steps);
        session = createBus(steps);
        mocks.openFirst.mockImplementation(async () => {
            steps.push("open");
            return deck;
        });
        mocks.connectSessionBus.mockImplementation(() => {
            steps.push("connect");
            return session.bus;
        });
        baselineSigint = process.listenerCount("SIGINT");
        baselineSigterm = process.listenerCount("SIGTERM");
        process.exitCode = undefined;
    });

    afterEach(() => {
        process.exitCode = undefined;
        vi.restoreAllMocks();
    });

    // -- 1. Wiring order --
    describe("Wiring order", () => {
        it("brings the bridge up and down in order", async () => {
            const running = run(flags);
            await vi.waitFor(() => expect(steps).toContain("run"));
            process.emit("SIGINT");
            await running;

            expect(steps).toEqual([
                "open",
                "prepare",
                "connect",
                "export",
                "claim",
                "loadScript",
                "run",
                "stop",
                "unloadScript",
                "close",
                "disconnect",
            ]);
            expect(deck.prepare).toHaveBeenCalledWith(30);
            expect(session.bus.claimName).toHaveBeenCalledWith("net.keywin.WindowListener");
            expect(process.exitCode).toBeUndefined();
            expect(process.listenerCount("SIGINT")).toBe(baselineSigint);
            expect(process.listenerCount("SIGTERM")).toBe(baselineSigterm);
        });
    });

    // -- 2. Startup failures --
    describe("Startup failures", () => {
        it("exits with 1 when KWin refuses the observer", async () => {
            vi.spyOn(console, "error").mockImplementation(() => {});
            session.fail("loadScript");
            await run(flags);

            expect(process.exitCode).toBe(1);
            expect(count("stop")).toBe(0);
            expect(steps.slice(-2)).toEqual(["close", "disconnect"]);
            expect(process.listenerCount("SIGINT")).toBe(baselineSigint);
        });

        it("exits with 1 when the bus name is taken", async () => {
            vi.spyOn(console, "error").mockImplementation(() => {});
            session.bus.claimName.mockResolvedValueOnce(false);
            await run(flags);

            expect(process.exitCode).toBe(1);
            expect(count("loadScript")).toBe(0);
            expect(steps.slice(-2)).toEqual(["close", "disconnect"]);
        });

        it("rejects bad flags before touching the device", async () => {
            vi.spyOn(console, "error").mockImplementation(() => {});
            await run({ brightness: "full" });
            expect(process.exitCode).toBe(1);
            expect(steps).toEqual([]);
        });
    });

    // -- 3. Termination --
    describe("Termination", () => {
        it("holds a signal that arrives while the observer starts", async () => {
            const acknowledgeRun = session.hold("run");
            const running = run(flags);
            await vi.waitFor(() => expect(steps).toContain("run"));

            expect(process.listenerCount("SIGINT")).toBeGreaterThan(baselineSigint);
            process.emit("SIGINT");
            acknowledgeRun();
            await running;

            expect(count("stop")).toBe(1);
            expect(count("unloadScript")).toBe(1);
            expect(steps.indexOf("stop")).toBeLessThan(steps.indexOf("unloadScript"));
            expect(process.exitCode).toBeUndefined();
        });

        it("ignores further signals while the observer stops", async () => {
            const acknowledgeStop = session.hold("stop");
            const running = run(flags);
            await vi.waitFor(() => expect(steps).toContain("run"));
            process.emit("SIGINT");
            await vi.waitFor(() => expect(steps).toContain("stop"));

            expect(process.listenerCount("SIGINT")).toBeGreaterThan(baselineSigint);
            process.emit("SIGINT");
            process.emit("SIGTERM");
            acknowledgeStop();
            await running;

            expect(count("stop")).toBe(1);
            expect(count("unloadScript")).toBe(1);
            expect(steps.slice(-4)).toEqual(["stop", "unloadScript", "close", "disconnect"]);
            expect(process.listenerCount("SIGINT")).toBe(baselineSigint);
        });

        it("shuts down when the session bus goes away", async () => {
            const running = run(flags);
            await vi.waitFor(() => expect(steps).toContain("run"));
            session.close("bus disconnected");
            await running;

            expect(steps.slice(-4)).toEqual(["stop", "unloadScript", "close", "disconnect"]);
            expect(session.bus.onClose).toHaveBeenCalledOnce();
        });
    });
});
