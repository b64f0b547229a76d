import { EventEmitter } from "node:events";
import dbus, { type MessageBus } from "dbus-next";
import { type LoggerContext, toError } from "keywin";
import type { MethodCaller } from "./kwin-scripting";
import type { WindowListener } from "./window-listener";

/** The session bus as `keywin run` uses it. */
export interface SessionBus extends MethodCaller {
    exportListener(objectPath: string, listener: WindowListener): void;
    /** False when another process already owns `name`. */
    claimName(name: string): Promise<boolean>;
    /** Calls `listener` with a reason when the connection fails or is closed by the other end. */
    onClose(listener: (reason: string) => void): () => void;
    disconnect(): void;
}

// MessageBus re-emits connection errors but not the connection's `end`.
function connectionOf(bus: MessageBus): EventEmitter | null {
    const connection: unknown = Reflect.get(bus, "_connection");
    return connection instanceof EventEmitter ? connection : null;
}

export function connectSessionBus(logger: LoggerContext): SessionBus {
    const bus = dbus.sessionBus();
    const connection = connectionOf(bus);
    bus.on("error", (err: unknown) => {
        logger.error("dbus", "session bus error", { error: toError(err) });
    });

    return {
        call: (message) => bus.call(message),
        exportListener(objectPath, listener) {
            bus.export(objectPath, listener);
        },
        async claimName(name) {
            const reply = await bus.requestName(name, dbus.NameFlag.DO_NOT_QUEUE);
            return reply === dbus.RequestNameReply.PRIMARY_OWNER || reply === dbus.RequestNameReply.ALREADY_OWNER;
        },
        onClose(listener) {
            const onError = (err: unknown) => listener(`bus error: ${toError(err).message}`);
            const onEnd = () => listener("bus disconnected");
            bus.on("error", onError);
            connection?.on("end", onEnd);
            return () => {
                bus.off("error", onError);
                connection?.off("end", onEnd);
            };
        },
        disconnect() {
            bus.disconnect();
        },
    };
}
