// ── Config ──────────────────────────────────────────────────────────
export {
    DEFAULT_ACTIVATION_REAP_DELAY_MS,
    DEFAULT_BRIGHTNESS,
    DEFAULT_BUS_NAME,
    DEFAULT_ICON_THEME,
    DEFAULT_OBJECT_PATH,
    defaultApplicationDirs,
    defaultIconDirs,
} from "./config/defaults";
export { defineConfig } from "./config/define-config";
export type { DefineConfigInput, KeywinConfig } from "./config/types";
// ── Logger ──────────────────────────────────────────────────────────
export { createConsoleHandler, formatEntry } from "./core/logger/console-handler";
export type { ConsoleHandlerOptions } from "./core/logger/console-handler";
export { Logger } from "./core/logger/logger";
export { isLogLevel, LOG_LEVEL_ORDER } from "./core/logger/types";
export type { LogEntry, LogHandler, LoggerContext, LogLevel } from "./core/logger/types";
// ── Errors ──────────────────────────────────────────────────────────
export { BridgeErrorKind } from "./core/errors/enums";
export { BridgeError, isBridgeError, toError, toRemoteError } from "./core/errors/errors";
// ── State machine ───────────────────────────────────────────────────
export { StateMachine } from "./core/state-machine/state-machine";
export type { StateMachineConfig, TransitionListener, TransitionTable } from "./core/state-machine/types";
// ── Slots & windows ─────────────────────────────────────────────────
export { SlotTable } from "./slots/slot-table";
export type { SlotIndex } from "./slots/types";
export { WindowRegistry } from "./windows/registry";
export type { WindowData, WindowIdentity } from "./windows/types";
// ── Scripts ─────────────────────────────────────────────────────────
export { toScriptLiteral } from "./script/escape";
export { renderTemplate, ScriptSynthesizer } from "./script/synthesizer";
export { ACTIVATION_TEMPLATE, OBSERVER_TEMPLATE } from "./script/templates";
export type { CallbackAddress, TemplateParams } from "./script/types";
// ── Script host ─────────────────────────────────────────────────────
export { ScriptStatus } from "./host/enums";
export { LoadedScript } from "./host/loaded-script";
export { ScriptHost } from "./host/script-host";
export type { ScriptHostOptions, ScriptId, ScriptingTransport } from "./host/types";
// ── Callbacks ───────────────────────────────────────────────────────
export { createHostCallbacks } from "./callbacks/host-callbacks";
export type { BridgeEvent, BridgeEventKind, EventSink, HostCallbacks } from "./callbacks/types";
// ── Coordinator ─────────────────────────────────────────────────────
export { Coordinator } from "./coordinator/coordinator";
export { BridgeState } from "./coordinator/enums";
export type { CoordinatorOptions, DeckDevice, IconResolver, KeyImage, KeyStateListener } from "./coordinator/types";
