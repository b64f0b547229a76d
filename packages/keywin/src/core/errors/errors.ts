import { BridgeErrorKind } from "./enums";

export class BridgeError extends Error {
    readonly kind: BridgeErrorKind;

    constructor(kind: BridgeErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "BridgeError";
        this.kind = kind;
    }
}

export function isBridgeError(err: unknown, kind?: BridgeErrorKind): err is BridgeError {
    return err instanceof BridgeError && (kind === undefined || err.kind === kind);
}

/** Normalize anything thrown into an `Error`. */
export function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}

/**
 * Wrap a failed remote call. Errors that already carry a kind keep it;
 * anything else counts as the host refusing the request.
 */
export function toRemoteError(err: unknown, message: string): BridgeError {
    if (isBridgeError(err)) return err;
    return new BridgeError(BridgeErrorKind.HostRejected, `${message}: ${toError(err).message}`, { cause: err });
}
