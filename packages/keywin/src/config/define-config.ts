import {
    DEFAULT_ACTIVATION_REAP_DELAY_MS,
    DEFAULT_BRIGHTNESS,
    DEFAULT_BUS_NAME,
    DEFAULT_ICON_THEME,
    DEFAULT_OBJECT_PATH,
    defaultApplicationDirs,
    defaultIconDirs,
} from "./defaults";
import type { DefineConfigInput, KeywinConfig } from "./types";

// D-Bus naming rules: dot-separated elements, no element starting with a digit, at most 255 chars.
const BUS_NAME_PATTERN = /^[A-Za-z_-][A-Za-z0-9_-]*(\.[A-Za-z_-][A-Za-z0-9_-]*)+$/;
const INTERFACE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)+$/;
const OBJECT_PATH_PATTERN = /^\/$|^(\/[A-Za-z0-9_]+)+$/;
const MAX_NAME_LENGTH = 255;

function fail(message: string): never {
    throw new Error(`[keywin] defineConfig: ${message}`);
}

export function defineConfig(input: DefineConfigInput = {}): KeywinConfig {
    const busName = input.listener?.busName ?? DEFAULT_BUS_NAME;
    const objectPath = input.listener?.objectPath ?? DEFAULT_OBJECT_PATH;
    const interfaceName = input.listener?.interfaceName ?? busName;

    if (busName.length > MAX_NAME_LENGTH || !BUS_NAME_PATTERN.test(busName)) {
        fail(`listener.busName "${busName}" is not a valid well-known bus name`);
    }
    if (interfaceName.length > MAX_NAME_LENGTH || !INTERFACE_NAME_PATTERN.test(interfaceName)) {
        fail(`listener.interfaceName "${interfaceName}" is not a valid interface name`);
    }
    if (!OBJECT_PATH_PATTERN.test(objectPath)) {
        fail(`listener.objectPath "${objectPath}" is not a valid object path`);
    }

    const brightness = input.brightness ?? DEFAULT_BRIGHTNESS;
    if (!Number.isInteger(brightness) || brightness < 0 || brightness > 100) {
        fail(`brightness must be an integer between 0 and 100, got ${brightness}`);
    }

    const activationReapDelayMs = input.activationReapDelayMs ?? DEFAULT_ACTIVATION_REAP_DELAY_MS;
    if (!Number.isFinite(activationReapDelayMs) || activationReapDelayMs < 0) {
        fail(`activationReapDelayMs must be a non-negative number, got ${activationReapDelayMs}`);
    }

    const iconTheme = input.iconTheme ?? DEFAULT_ICON_THEME;
    if (iconTheme.trim().length === 0 || iconTheme.includes("/")) {
        fail(`iconTheme "${iconTheme}" must be a plain directory name`);
    }

    return {
        listener: { busName, objectPath, interfaceName },
        brightness,
        activationReapDelayMs,
        scratchDir: input.scratchDir,
        logLevel: input.logLevel ?? "info",
        applicationDirs: input.applicationDirs ?? defaultApplicationDirs(),
        iconDirs: input.iconDirs ?? defaultIconDirs(),
        iconTheme,
    };
}
