export enum BridgeState {
    CREATED = "created",
    INITIALIZING = "initializing",
    RUNNING = "running",
    SHUTTING_DOWN = "shutting-down",
    STOPPED = "stopped",
    FAILED = "failed",
}
