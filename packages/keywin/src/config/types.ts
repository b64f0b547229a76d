import type { LogLevel } from "../core/logger/types";
import type { CallbackAddress } from "../script/types";

export type DefineConfigInput = {
    listener?: Partial<CallbackAddress>;
    /** Device brightness in percent. */
    brightness?: number;
    /** How long an activation script stays loaded after it was run. */
    activationReapDelayMs?: number;
    scratchDir?: string;
    logLevel?: LogLevel;
    applicationDirs?: string[];
    iconDirs?: string[];
    iconTheme?: string;
};

export type KeywinConfig = {
    readonly listener: Readonly<CallbackAddress>;
    readonly brightness: number;
    readonly activationReapDelayMs: number;
    readonly scratchDir: string | undefined;
    readonly logLevel: LogLevel;
    readonly applicationDirs: readonly string[];
    readonly iconDirs: readonly string[];
    readonly iconTheme: string;
};
