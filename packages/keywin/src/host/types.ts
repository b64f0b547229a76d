/** Script number issued by the scripting host on load. */
export type ScriptId = number;

/**
 * The scripting host as seen over IPC. Implementations reject with a
 * `BridgeError` when they can tell a dead transport from a refusal.
 */
export interface ScriptingTransport {
    /** Load the script file at `path`; the path doubles as the plugin name. */
    loadScript(path: string): Promise<ScriptId>;
    /** Returns once the host has acknowledged; the script body may still be starting. */
    run(id: ScriptId): Promise<void>;
    stop(id: ScriptId): Promise<void>;
    /** False when the host had no script registered under `path`. */
    unloadScript(path: string): Promise<boolean>;
}

export type ScriptHostOptions = {
    /** Parent directory for per-script temp directories. Defaults to `os.tmpdir()`. */
    scratchDir?: string;
};

export type LoadedScriptInit = {
    scriptId: ScriptId;
    label: string;
    sourceText: string;
    path: string;
    directory: string;
};
