export enum ScriptStatus {
    Loaded = "loaded",
    Running = "running",
    Stopped = "stopped",
    /** A run/stop was refused; the handle may only be unloaded. */
    Invalid = "invalid",
    Unloaded = "unloaded",
}
