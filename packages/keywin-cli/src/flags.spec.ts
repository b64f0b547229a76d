import { describe, expect, it } from "vitest";
import { configFromFlags } from "./flags";

describe("configFromFlags", () => {
    it("uses defaults without flags", () => {
        const config = configFromFlags({});
        expect(config.brightness).toBe(30);
        expect(config.listener.busName).toBe("net.keywin.WindowListener");
        expect(config.logLevel).toBe("info");
    });

    it("maps every flag", () => {
        const config = configFromFlags({
            brightness: 80,
            busName: "org.example.Deck",
            objectPath: "/org/example/Deck",
            logLevel: "debug",
            reapDelay: 250,
            iconTheme: "breeze",
        });
        expect(config).toMatchObject({
            brightness: 80,
            listener: { busName: "org.example.Deck", objectPath: "/org/example/Deck", interfaceName: "org.example.Deck" },
            logLevel: "debug",
            activationReapDelayMs: 250,
            iconTheme: "breeze",
        });
    });

    it("rejects a non-numeric brightness", () => {
        expect(() => configFromFlags({ brightness: "bright" })).toThrow(
            '[keywin] --brightness expects a number, got "bright"',
        );
    });

    it("rejects an unknown log level", () => {
        expect(() => configFromFlags({ logLevel: "trace" })).toThrow(
            '[keywin] --log-level must be debug, info, warn or error, got "trace"',
        );
    });

    it("rejects a flag given without a value", () => {
        expect(() => configFromFlags({ busName: true })).toThrow("[keywin] --bus-name expects a value");
    });

    it("leaves range checks to defineConfig", () => {
        expect(() => configFromFlags({ brightness: 150 })).toThrow(
            "[keywin] defineConfig: brightness must be an integer between 0 and 100, got 150",
        );
    });
});
