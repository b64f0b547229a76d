import type { SlotIndex } from "../slots/types";
import type { WindowData, WindowIdentity } from "../windows/types";

/** Everything the coordinator reacts to, from either the host or the device. */
export type BridgeEvent =
    | { kind: "window-added"; window: WindowData }
    | { kind: "window-removed"; identity: WindowIdentity }
    | { kind: "log"; message: string }
    | { kind: "key-state"; key: SlotIndex; pressed: boolean };

export type BridgeEventKind = BridgeEvent["kind"];

export interface EventSink {
    /** Accept an event for ordered processing. Never throws for a well-formed event. */
    enqueue(event: BridgeEvent): void;
}

/**
 * Methods the remote scripting host calls back into. Names and arity are part of
 * the wire contract with the injected scripts.
 */
export interface HostCallbacks {
    Log(message: string): void;
    WindowAdded(identity: string, caption: string, resourceClass: string): void;
    WindowRemoved(identity: string): void;
}
