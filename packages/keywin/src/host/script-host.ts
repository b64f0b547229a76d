import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { BridgeErrorKind } from "../core/errors/enums";
import { BridgeError, toError, toRemoteError } from "../core/errors/errors";
import type { LoggerContext } from "../core/logger/types";
import { ScriptStatus } from "./enums";
import { LoadedScript } from "./loaded-script";
import type { ScriptHostOptions, ScriptingTransport } from "./types";

const LABEL_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

/**
 * ScriptHost — load/run/stop/unload against the remote scripting engine.
 *
 * Each load gets a fresh temp directory holding the script source. The directory
 * and the host-side registration are released together by `unload()`, which must
 * be called once per handle.
 */
export class ScriptHost {
    private readonly handles = new Set<LoadedScript>();
    private readonly scratchDir: string;

    constructor(
        private readonly transport: ScriptingTransport,
        private readonly logger: LoggerContext,
        options: ScriptHostOptions = {},
    ) {
        this.scratchDir = options.scratchDir ?? tmpdir();
    }

    /** Handles loaded and not yet unloaded. */
    get live(): number {
        return this.handles.size;
    }

    async load(sourceText: string, label = "script"): Promise<LoadedScript> {
        if (!LABEL_PATTERN.test(label)) {
            throw new Error(`[keywin] ScriptHost: invalid label "${label}"`);
        }

        const directory = await this.allocate();
        const path = join(directory, `${label}.js`);

        try {
            await writeFile(path, sourceText, "utf8");
        } catch (err) {
            await this.discard(directory);
            throw new BridgeError(BridgeErrorKind.ResourceExhausted, `write ${path}: ${toError(err).message}`, {
                cause: err,
            });
        }

        let scriptId: number;
        try {
            scriptId = await this.transport.loadScript(path);
        } catch (err) {
            await this.discard(directory);
            throw toRemoteError(err, `load ${label}`);
        }

        if (!Number.isInteger(scriptId) || scriptId < 0) {
            await this.discard(directory);
            throw new BridgeError(BridgeErrorKind.HostRejected, `load ${label}: host refused the script (id ${scriptId})`);
        }

        const handle = new LoadedScript({ scriptId, label, sourceText, path, directory });
        this.handles.add(handle);
        this.logger.debug("host", "script loaded", { id: scriptId, label, path });
        return handle;
    }

    async run(handle: LoadedScript): Promise<void> {
        this.assertUsable(handle, "run");
        try {
            await this.transport.run(handle.scriptId);
        } catch (err) {
            this.settle(handle, ScriptStatus.Invalid);
            throw toRemoteError(err, `run ${handle}`);
        }
        this.settle(handle, ScriptStatus.Running);
    }

    async stop(handle: LoadedScript): Promise<void> {
        this.assertUsable(handle, "stop");
        try {
            await this.transport.stop(handle.scriptId);
        } catch (err) {
            this.settle(handle, ScriptStatus.Invalid);
            throw toRemoteError(err, `stop ${handle}`);
        }
        this.settle(handle, ScriptStatus.Stopped);
    }

    /**
     * Unregister the script from the host and delete its backing directory.
     * The directory goes even when the remote call fails. A repeated call is a logged no-op.
     */
    async unload(handle: LoadedScript): Promise<void> {
        if (handle.status === ScriptStatus.Unloaded) {
            this.logger.warn("host", "script already unloaded", { id: handle.scriptId, label: handle.label });
            return;
        }
        handle.setStatus(ScriptStatus.Unloaded);
        this.handles.delete(handle);

        try {
            const known = await this.transport.unloadScript(handle.path);
            if (!known) {
                this.logger.warn("host", "host had no script registered for path", {
                    id: handle.scriptId,
                    path: handle.path,
                });
            }
        } catch (err) {
            throw toRemoteError(err, `unload ${handle}`);
        } finally {
            await this.discard(handle.directory);
        }
        this.logger.debug("host", "script unloaded", { id: handle.scriptId, label: handle.label });
    }

    private assertUsable(handle: LoadedScript, action: string): void {
        if (!this.handles.has(handle)) {
            throw new Error(`[keywin] ScriptHost: cannot ${action} ${handle}, it is not loaded by this host`);
        }
        if (handle.status === ScriptStatus.Invalid) {
            throw new Error(`[keywin] ScriptHost: cannot ${action} ${handle}, it was rejected earlier`);
        }
    }

    // A handle unloaded while its run/stop was in flight stays unloaded.
    private settle(handle: LoadedScript, status: ScriptStatus): void {
        if (handle.status !== ScriptStatus.Unloaded) handle.setStatus(status);
    }

    private async allocate(): Promise<string> {
        try {
            return await mkdtemp(join(this.scratchDir, "keywin-"));
        } catch (err) {
            throw new BridgeError(
                BridgeErrorKind.ResourceExhausted,
                `allocate script directory in ${this.scratchDir}: ${toError(err).message}`,
                { cause: err },
            );
        }
    }

    private async discard(directory: string): Promise<void> {
        try {
            await rm(directory, { recursive: true, force: true });
        } catch (err) {
            this.logger.warn("host", "failed to remove script directory", { directory, error: toError(err) });
        }
    }
}
