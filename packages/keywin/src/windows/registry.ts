import { BridgeErrorKind } from "../core/errors/enums";
import type { LoggerContext } from "../core/logger/types";
import type { WindowData, WindowIdentity } from "./types";

/**
 * WindowRegistry — every live window the observer script has reported,
 * whether or not it holds a key.
 */
export class WindowRegistry {
    private readonly windows = new Map<WindowIdentity, WindowData>();

    constructor(private readonly logger: LoggerContext) {}

    get size(): number {
        return this.windows.size;
    }

    /** Add or refresh a window. Returns true when the identity was new. */
    insert(data: WindowData): boolean {
        const known = this.windows.has(data.identity);
        if (known) {
            this.logger.debug("registry", "window already registered, refreshing metadata", {
                identity: data.identity,
            });
        }
        this.windows.set(data.identity, data);
        return !known;
    }

    /** Remove a window. Unknown identities are logged, never thrown. */
    remove(identity: WindowIdentity): WindowData | null {
        const data = this.windows.get(identity);
        if (!data) {
            this.logger.warn("registry", "removal of unknown window", {
                kind: BridgeErrorKind.RegistryInconsistency,
                identity,
            });
            return null;
        }
        this.windows.delete(identity);
        return data;
    }

    get(identity: WindowIdentity): WindowData | null {
        return this.windows.get(identity) ?? null;
    }

    has(identity: WindowIdentity): boolean {
        return this.windows.has(identity);
    }

    list(): WindowData[] {
        return [...this.windows.values()];
    }
}
