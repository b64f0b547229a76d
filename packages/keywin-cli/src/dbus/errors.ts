import dbus from "dbus-next";
import { BridgeError, BridgeErrorKind, toError } from "keywin";

// Replies meaning nobody is there to answer, as opposed to an answer that says no.
const UNAVAILABLE_ERROR_NAMES = new Set([
    "org.freedesktop.DBus.Error.ServiceUnknown",
    "org.freedesktop.DBus.Error.NameHasNoOwner",
    "org.freedesktop.DBus.Error.NoReply",
    "org.freedesktop.DBus.Error.Disconnected",
    "org.freedesktop.DBus.Error.NoServer",
    "org.freedesktop.DBus.Error.Timeout",
]);

const SOCKET_ERROR_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ENOENT", "EPIPE", "ETIMEDOUT"]);

export function classifyDBusError(err: unknown): BridgeErrorKind {
    if (err instanceof dbus.DBusError) {
        return UNAVAILABLE_ERROR_NAMES.has(err.type) ? BridgeErrorKind.TransportUnavailable : BridgeErrorKind.HostRejected;
    }
    if (err instanceof Error && "code" in err && typeof err.code === "string" && SOCKET_ERROR_CODES.has(err.code)) {
        return BridgeErrorKind.TransportUnavailable;
    }
    return BridgeErrorKind.HostRejected;
}

/** Wrap a failed bus call as a {@link BridgeError}, prefixed with what was attempted. */
export function toBusError(err: unknown, message: string): BridgeError {
    if (err instanceof BridgeError) return err;
    const detail = err instanceof dbus.DBusError ? `${err.type}: ${err.text}` : toError(err).message;
    return new BridgeError(classifyDBusError(err), `${message}: ${detail}`, { cause: err });
}
