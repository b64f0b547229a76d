import { Mutex, noop } from "es-toolkit";
import { DEFAULT_ACTIVATION_REAP_DELAY_MS } from "../config/defaults";
import type { BridgeEvent, EventSink } from "../callbacks/types";
import { toError } from "../core/errors/errors";
import type { LoggerContext } from "../core/logger/types";
import { StateMachine } from "../core/state-machine/state-machine";
import type { LoadedScript } from "../host/loaded-script";
import { SlotTable } from "../slots/slot-table";
import type { SlotIndex } from "../slots/types";
import { WindowRegistry } from "../windows/registry";
import type { WindowData, WindowIdentity } from "../windows/types";
import { BridgeState } from "./enums";
import type { CoordinatorOptions, KeyImage } from "./types";

const BRIDGE_TRANSITIONS: Record<BridgeState, BridgeState[]> = {
    [BridgeState.CREATED]: [BridgeState.INITIALIZING],
    [BridgeState.INITIALIZING]: [BridgeState.RUNNING, BridgeState.FAILED],
    [BridgeState.RUNNING]: [BridgeState.SHUTTING_DOWN],
    [BridgeState.SHUTTING_DOWN]: [BridgeState.STOPPED],
    [BridgeState.STOPPED]: [],
    [BridgeState.FAILED]: [],
};

/**
 * Coordinator — owns the slot table and window registry and keeps the device
 * in step with KWin.
 *
 * Host callbacks and key events are funnelled through one mutex: an event's
 * slot/registry mutation and its device I/O finish before the next event starts.
 *
 * State machine: `created → initializing → running → shutting-down → stopped`,
 * with `initializing → failed` when the observer script cannot be started.
 */
export class Coordinator implements EventSink {
    readonly state: StateMachine<BridgeState>;
    private readonly slots: SlotTable;
    private readonly registry: WindowRegistry;
    private readonly logger: LoggerContext;
    private readonly mutex = new Mutex();
    private readonly reapDelayMs: number;
    private readonly pendingActivations = new Map<LoadedScript, NodeJS.Timeout>();
    private readonly reaping = new Set<Promise<void>>();
    private observer: LoadedScript | null = null;
    private unsubscribeKeys: (() => void) | null = null;

    constructor(private readonly options: CoordinatorOptions) {
        this.state = new StateMachine<BridgeState>({
            transitions: BRIDGE_TRANSITIONS,
            initial: BridgeState.CREATED,
            name: "Coordinator",
        });
        this.logger = options.logger;
        this.slots = new SlotTable(options.device.keyCount);
        this.registry = new WindowRegistry(options.logger);
        this.reapDelayMs = options.activationReapDelayMs ?? DEFAULT_ACTIVATION_REAP_DELAY_MS;
    }

    // ── Lifecycle ────────────────────────────────────────────────────────

    /** Load and run the observer script. Any failure here is fatal and rethrown. */
    async start(): Promise<void> {
        this.state.transition(BridgeState.INITIALIZING);
        this.unsubscribeKeys = this.options.device.onKeyStateChange((key, pressed) => {
            this.enqueue({ kind: "key-state", key, pressed });
        });

        try {
            const observer = await this.options.host.load(this.options.synthesizer.observer(), "observer");
            this.observer = observer;
            await this.options.host.run(observer);
        } catch (err) {
            this.detachDevice();
            await this.releaseObserver(false);
            this.state.transition(BridgeState.FAILED);
            throw err;
        }

        this.state.transition(BridgeState.RUNNING);
        this.logger.info("coordinator", "observing windows", { keys: this.slots.size });
    }

    /** Stop then unload the observer, and unload any activation script still pending. */
    async shutdown(): Promise<void> {
        this.state.assertState(BridgeState.RUNNING);
        this.state.transition(BridgeState.SHUTTING_DOWN);
        this.detachDevice();

        await this.settle();
        await this.releaseObserver(true);
        for (const handle of [...this.pendingActivations.keys()]) {
            this.reap(handle).catch(noop);
        }
        await Promise.all(this.reaping);

        this.state.transition(BridgeState.STOPPED);
        this.logger.info("coordinator", "stopped");
    }

    // ── Events ───────────────────────────────────────────────────────────

    /** Queue an event without waiting for it. */
    enqueue(event: BridgeEvent): void {
        this.dispatch(event).catch((err: unknown) => {
            this.logger.error("coordinator", "event handling failed", { kind: event.kind, error: toError(err) });
        });
    }

    /** Process an event after every event queued before it. */
    async dispatch(event: BridgeEvent): Promise<void> {
        await this.mutex.acquire();
        try {
            if (!this.state.is(BridgeState.INITIALIZING, BridgeState.RUNNING)) {
                this.logger.debug("coordinator", "event ignored", { kind: event.kind, state: this.state.current });
                return;
            }
            await this.handle(event);
        } finally {
            this.mutex.release();
        }
    }

    /** Resolves once every event queued so far has been handled. */
    async settle(): Promise<void> {
        await this.mutex.acquire();
        this.mutex.release();
    }

    // ── Diagnostics ──────────────────────────────────────────────────────

    slotSnapshot(): readonly (WindowIdentity | null)[] {
        return this.slots.snapshot();
    }

    windows(): WindowData[] {
        return this.registry.list();
    }

    // ── Private: Handlers ───────────────────────────────────────────────

    private async handle(event: BridgeEvent): Promise<void> {
        switch (event.kind) {
            case "key-state":
                if (event.pressed) await this.activate(event.key);
                return;
            case "window-added":
                await this.addWindow(event.window);
                return;
            case "window-removed":
                await this.removeWindow(event.identity);
                return;
            case "log":
                this.logger.debug("script", event.message);
                return;
        }
    }

    private async activate(key: SlotIndex): Promise<void> {
        const identity = this.slots.occupant(key);
        if (identity === null) {
            this.logger.debug("coordinator", "key has no window", { key });
            return;
        }

        let handle: LoadedScript | null = null;
        try {
            handle = await this.options.host.load(this.options.synthesizer.activation(identity), "activate");
            await this.options.host.run(handle);
        } catch (err) {
            this.logger.error("coordinator", "window activation failed", { key, identity, error: toError(err) });
            if (handle) await this.unloadActivation(handle);
            return;
        }
        this.scheduleReap(handle);
        this.logger.debug("coordinator", "activation requested", { key, identity });
    }

    private async addWindow(window: WindowData): Promise<void> {
        if (!this.registry.insert(window)) return;

        const slot = this.slots.assign(window.identity);
        if (slot === null) {
            this.logger.info("slots", "no free key for window", {
                identity: window.identity,
                resourceClass: window.resourceClass,
            });
            return;
        }
        this.logger.debug("slots", "window assigned", { slot, identity: window.identity });
        await this.showIcon(slot, window);
    }

    private async removeWindow(identity: WindowIdentity): Promise<void> {
        const slot = this.slots.release(identity);
        this.registry.remove(identity);
        if (slot === null) return;
        this.logger.debug("slots", "window released", { slot, identity });
        await this.clearKey(slot);
    }

    // ── Private: Device ─────────────────────────────────────────────────

    private async showIcon(slot: SlotIndex, window: WindowData): Promise<void> {
        let image: KeyImage | null = null;
        try {
            image = await this.options.icons.resolve(window.resourceClass);
        } catch (err) {
            this.logger.warn("icons", "icon resolution failed", {
                resourceClass: window.resourceClass,
                error: toError(err),
            });
        }

        try {
            await this.options.device.setKeyImage(slot, image);
        } catch (err) {
            this.logger.error("device", "failed to set key image", { slot, error: toError(err) });
            // Never leave a half-written bitmap on the key.
            await this.clearKey(slot);
        }
    }

    private async clearKey(slot: SlotIndex): Promise<void> {
        try {
            await this.options.device.setKeyImage(slot, null);
        } catch (err) {
            this.logger.error("device", "failed to clear key", { slot, error: toError(err) });
        }
    }

    private detachDevice(): void {
        this.unsubscribeKeys?.();
        this.unsubscribeKeys = null;
    }

    // ── Private: Scripts ────────────────────────────────────────────────

    private async releaseObserver(stop: boolean): Promise<void> {
        const observer = this.observer;
        if (!observer) return;
        this.observer = null;

        if (stop) {
            try {
                await this.options.host.stop(observer);
            } catch (err) {
                this.logger.error("coordinator", "failed to stop observer script", { error: toError(err) });
            }
        }
        try {
            await this.options.host.unload(observer);
        } catch (err) {
            this.logger.error("coordinator", "failed to unload observer script", { error: toError(err) });
        }
    }

    // KWin reads the script file asynchronously after run() is acknowledged, so unloading waits a little.
    private scheduleReap(handle: LoadedScript): void {
        const timer = setTimeout(() => {
            this.reap(handle).catch(noop);
        }, this.reapDelayMs);
        timer.unref();
        this.pendingActivations.set(handle, timer);
    }

    /** Unload an activation script now. Safe to call more than once per handle. */
    private reap(handle: LoadedScript): Promise<void> {
        const timer = this.pendingActivations.get(handle);
        if (timer === undefined) return Promise.resolve();
        clearTimeout(timer);
        this.pendingActivations.delete(handle);

        const task = this.unloadActivation(handle).finally(() => {
            this.reaping.delete(task);
        });
        this.reaping.add(task);
        return task;
    }

    private async unloadActivation(handle: LoadedScript): Promise<void> {
        try {
            await this.options.host.unload(handle);
        } catch (err) {
            this.logger.warn("coordinator", "failed to unload activation script", {
                id: handle.scriptId,
                error: toError(err),
            });
        }
    }
}
