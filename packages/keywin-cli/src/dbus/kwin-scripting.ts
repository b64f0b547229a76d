import dbus, { type Message } from "dbus-next";
import { BridgeError, BridgeErrorKind, type ScriptId, type ScriptingTransport } from "keywin";
import { toBusError } from "./errors";

const KWIN_SERVICE = "org.kde.KWin";
const SCRIPTING_PATH = "/Scripting";
const SCRIPTING_INTERFACE = "org.kde.kwin.Scripting";
const SCRIPT_INTERFACE = "org.kde.kwin.Script";

/** The part of a `MessageBus` this transport needs. */
export interface MethodCaller {
    call(message: Message): Promise<{ body: unknown[] } | null>;
}

/** KWin's scripting service on the session bus. */
export class KWinScripting implements ScriptingTransport {
    constructor(private readonly bus: MethodCaller) {}

    async loadScript(path: string): Promise<ScriptId> {
        const [id] = await this.call(SCRIPTING_PATH, SCRIPTING_INTERFACE, "loadScript", "s", [path]);
        if (typeof id !== "number") {
            throw new BridgeError(BridgeErrorKind.HostRejected, `loadScript: expected a script id, got ${typeof id}`);
        }
        return id;
    }

    async run(id: ScriptId): Promise<void> {
        await this.call(scriptPath(id), SCRIPT_INTERFACE, "run");
    }

    async stop(id: ScriptId): Promise<void> {
        await this.call(scriptPath(id), SCRIPT_INTERFACE, "stop");
    }

    async unloadScript(path: string): Promise<boolean> {
        const [unloaded] = await this.call(SCRIPTING_PATH, SCRIPTING_INTERFACE, "unloadScript", "s", [path]);
        return unloaded === true;
    }

    private async call(
        path: string,
        interfaceName: string,
        member: string,
        signature = "",
        body: unknown[] = [],
    ): Promise<unknown[]> {
        const message = new dbus.Message({
            destination: KWIN_SERVICE,
            path,
            interface: interfaceName,
            member,
            signature,
            body,
        });
        try {
            const reply = await this.bus.call(message);
            return reply?.body ?? [];
        } catch (err) {
            throw toBusError(err, `${member} ${path}`);
        }
    }
}

function scriptPath(id: ScriptId): string {
    return `${SCRIPTING_PATH}/Script${id}`;
}
