import type { LoggerContext } from "../core/logger/types";
import type { ScriptHost } from "../host/script-host";
import type { ScriptSynthesizer } from "../script/synthesizer";
import type { SlotIndex } from "../slots/types";

/** Pre-encoded key bitmap, produced by the image pipeline and passed through untouched. */
export type KeyImage = {
    readonly width: number;
    readonly height: number;
    readonly data: Uint8Array;
};

export type KeyStateListener = (key: SlotIndex, pressed: boolean) => void;

export interface DeckDevice {
    readonly keyCount: number;
    /** `null` clears the key. */
    setKeyImage(key: SlotIndex, image: KeyImage | null): Promise<void>;
    /** Returns an unsubscribe function. */
    onKeyStateChange(listener: KeyStateListener): () => void;
}

export interface IconResolver {
    /** Image for an application class, or null when it has none. */
    resolve(resourceClass: string): Promise<KeyImage | null>;
}

export type CoordinatorOptions = {
    device: DeckDevice;
    icons: IconResolver;
    host: ScriptHost;
    synthesizer: ScriptSynthesizer;
    logger: LoggerContext;
    /** Delay before a run activation script is unloaded. */
    activationReapDelayMs?: number;
};
