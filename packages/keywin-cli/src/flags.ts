import { defineConfig, isLogLevel, type KeywinConfig, type LogLevel } from "keywin";

/** Options as cac hands them over: numbers when they parse as one, strings otherwise. */
export interface RunFlags {
    brightness?: unknown;
    busName?: unknown;
    objectPath?: unknown;
    logLevel?: unknown;
    reapDelay?: unknown;
    iconTheme?: unknown;
}

function fail(message: string): never {
    throw new Error(`[keywin] ${message}`);
}

function optionalNumber(flag: string, value: unknown): number | undefined {
    if (value === undefined) return undefined;
    if (typeof value !== "number") fail(`--${flag} expects a number, got "${String(value)}"`);
    return value;
}

function optionalString(flag: string, value: unknown): string | undefined {
    if (value === undefined) return undefined;
    if (typeof value !== "string") fail(`--${flag} expects a value`);
    return value;
}

function optionalLogLevel(value: unknown): LogLevel | undefined {
    const level = optionalString("log-level", value);
    if (level === undefined) return undefined;
    if (!isLogLevel(level)) fail(`--log-level must be debug, info, warn or error, got "${level}"`);
    return level;
}

/** Map `keywin run` flags onto the validated configuration. */
export function configFromFlags(flags: RunFlags): KeywinConfig {
    return defineConfig({
        listener: {
            busName: optionalString("bus-name", flags.busName),
            objectPath: optionalString("object-path", flags.objectPath),
        },
        brightness: optionalNumber("brightness", flags.brightness),
        activationReapDelayMs: optionalNumber("reap-delay", flags.reapDelay),
        logLevel: optionalLogLevel(flags.logLevel),
        iconTheme: optionalString("icon-theme", flags.iconTheme),
    });
}
