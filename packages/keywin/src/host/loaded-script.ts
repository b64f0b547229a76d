import { ScriptStatus } from "./enums";
import type { LoadedScriptInit, ScriptId } from "./types";

/** Handle to one script loaded into the host, backed by its own temp directory. */
export class LoadedScript {
    readonly scriptId: ScriptId;
    readonly label: string;
    readonly sourceText: string;
    /** Backing file handed to the host; also the name it is unloaded by. */
    readonly path: string;
    readonly directory: string;
    private _status: ScriptStatus = ScriptStatus.Loaded;

    constructor(init: LoadedScriptInit) {
        this.scriptId = init.scriptId;
        this.label = init.label;
        this.sourceText = init.sourceText;
        this.path = init.path;
        this.directory = init.directory;
    }

    get status(): ScriptStatus {
        return this._status;
    }

    /** @internal Only the owning ScriptHost moves a handle between states. */
    setStatus(status: ScriptStatus): void {
        this._status = status;
    }

    toString(): string {
        return `script #${this.scriptId} (${this.label})`;
    }
}
