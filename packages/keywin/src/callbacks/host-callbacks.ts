import type { EventSink, HostCallbacks } from "./types";

function requireString(method: string, name: string, value: unknown): string {
    if (typeof value !== "string") {
        throw new TypeError(`[keywin] ${method}: ${name} must be a string, got ${typeof value}`);
    }
    return value;
}

function requireIdentity(method: string, value: unknown): string {
    const identity = requireString(method, "identity", value);
    if (identity.length === 0) {
        throw new TypeError(`[keywin] ${method}: identity must not be empty`);
    }
    return identity;
}

/**
 * Turn host callbacks into {@link BridgeEvent}s. Arguments arrive from another
 * process, so each one is checked before it reaches the sink.
 */
export function createHostCallbacks(sink: EventSink): HostCallbacks {
    return {
        Log(message: unknown) {
            sink.enqueue({ kind: "log", message: requireString("Log", "message", message) });
        },
        WindowAdded(identity: unknown, caption: unknown, resourceClass: unknown) {
            sink.enqueue({
                kind: "window-added",
                window: {
                    identity: requireIdentity("WindowAdded", identity),
                    caption: requireString("WindowAdded", "caption", caption),
                    resourceClass: requireString("WindowAdded", "resourceClass", resourceClass),
                },
            });
        },
        WindowRemoved(identity: unknown) {
            sink.enqueue({ kind: "window-removed", identity: requireIdentity("WindowRemoved", identity) });
        },
    };
}
