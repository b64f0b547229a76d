export enum BridgeErrorKind {
    /** The IPC connection is gone or was refused. */
    TransportUnavailable = "transport-unavailable",
    /** The scripting host answered a load/run/stop/unload with an error. */
    HostRejected = "host-rejected",
    /** Ephemeral storage for a script could not be allocated. */
    ResourceExhausted = "resource-exhausted",
    /** A lookup or removal named a window the registry does not know. */
    RegistryInconsistency = "registry-inconsistency",
}
