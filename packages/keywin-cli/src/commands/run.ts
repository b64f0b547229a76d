import { noop } from "es-toolkit";
import {
    Coordinator,
    createConsoleHandler,
    type KeywinConfig,
    Logger,
    type LoggerContext,
    ScriptHost,
    ScriptSynthesizer,
    toError,
} from "keywin";
import { KWinScripting } from "../dbus/kwin-scripting";
import { connectSessionBus, type SessionBus } from "../dbus/session";
import { WindowListener } from "../dbus/window-listener";
import { StreamDeckKeys } from "../device/stream-deck";
import { configFromFlags, type RunFlags } from "../flags";
import { ThemeIconResolver } from "../icons/resolver";

/**
 * Holds SIGINT/SIGTERM for the whole run. The first signal (or a closed bus)
 * requests shutdown, even while the coordinator is still starting; later ones
 * are logged and ignored so the observer always gets unloaded.
 */
class ExitRequest {
    readonly requested: Promise<string>;
    private reason: string | null = null;
    private resolve: (reason: string) => void = noop;
    private readonly onSigint = () => this.request("SIGINT");
    private readonly onSigterm = () => this.request("SIGTERM");

    constructor(private readonly logger: LoggerContext) {
        this.requested = new Promise((resolve) => {
            this.resolve = resolve;
        });
        process.on("SIGINT", this.onSigint);
        process.on("SIGTERM", this.onSigterm);
    }

    request(reason: string): void {
        if (this.reason !== null) {
            this.logger.warn("cli", "already shutting down, ignoring", { reason, pending: this.reason });
            return;
        }
        this.reason = reason;
        this.resolve(reason);
    }

    dispose(): void {
        process.off("SIGINT", this.onSigint);
        process.off("SIGTERM", this.onSigterm);
    }
}

export async function run(flags: RunFlags): Promise<void> {
    let config: KeywinConfig;
    try {
        config = configFromFlags(flags);
    } catch (err) {
        console.error(toError(err).message);
        process.exitCode = 1;
        return;
    }

    const logger = new Logger();
    logger.addHandler(createConsoleHandler({ level: config.logLevel, colors: process.stdout.isTTY }));
    const exit = new ExitRequest(logger);

    let deck: StreamDeckKeys | null = null;
    let bus: SessionBus | null = null;
    let unwatchBus: () => void = noop;
    try {
        // 1. Device
        deck = await StreamDeckKeys.openFirst(logger);
        await deck.prepare(config.brightness);

        // 2. Session bus and the listener KWin scripts call back into
        bus = connectSessionBus(logger);
        unwatchBus = bus.onClose((reason) => exit.request(reason));
        const coordinator = createCoordinator(config, deck, bus, logger);
        bus.exportListener(config.listener.objectPath, new WindowListener(config.listener.interfaceName, coordinator));
        if (!(await bus.claimName(config.listener.busName))) {
            throw new Error(`[keywin] bus name "${config.listener.busName}" is owned by another process`);
        }

        // 3. Observe until told to stop
        await coordinator.start();
        const reason = await exit.requested;
        logger.info("cli", "shutting down", { reason });
        await coordinator.shutdown();
    } catch (err) {
        logger.error("cli", "bridge failed", { error: toError(err) });
        process.exitCode = 1;
    } finally {
        unwatchBus();
        if (deck) await closeDevice(deck, logger);
        bus?.disconnect();
        exit.dispose();
    }
}

function createCoordinator(config: KeywinConfig, deck: StreamDeckKeys, bus: SessionBus, logger: LoggerContext): Coordinator {
    const { width, height } = deck.keySize;
    return new Coordinator({
        device: deck,
        icons: new ThemeIconResolver({
            applicationDirs: config.applicationDirs,
            iconDirs: config.iconDirs,
            theme: config.iconTheme,
            width,
            height,
            logger,
        }),
        host: new ScriptHost(new KWinScripting(bus), logger, { scratchDir: config.scratchDir }),
        synthesizer: new ScriptSynthesizer(config.listener),
        logger,
        activationReapDelayMs: config.activationReapDelayMs,
    });
}

async function closeDevice(deck: StreamDeckKeys, logger: LoggerContext): Promise<void> {
    try {
        await deck.close();
    } catch (err) {
        logger.warn("device", "failed to reset stream deck", { error: toError(err) });
    }
}
