import { listStreamDecks, openStreamDeck, type StreamDeck } from "@elgato-stream-deck/node";
import type { DeckDevice, KeyImage, KeyStateListener, LoggerContext } from "keywin";

type LcdKey = {
    /** Control index on the device. */
    index: number;
    width: number;
    height: number;
};

/** LCD buttons in control order. Slot N of the bridge is the Nth entry. */
function lcdKeys(deck: StreamDeck): LcdKey[] {
    return deck.CONTROLS.flatMap((control) =>
        control.type === "button" && control.feedbackType === "lcd"
            ? [{ index: control.index, width: control.pixelSize.width, height: control.pixelSize.height }]
            : [],
    ).sort((a, b) => a.index - b.index);
}

/**
 * The LCD keys of one Stream Deck as a {@link DeckDevice}. Keys without a
 * display (Pedal, Neo touch points) are not slots.
 */
export class StreamDeckKeys implements DeckDevice {
    readonly keyCount: number;
    private readonly keys: LcdKey[];
    private readonly slotByControl: Map<number, number>;

    private constructor(
        private readonly deck: StreamDeck,
        private readonly logger: LoggerContext,
    ) {
        this.keys = lcdKeys(deck);
        this.keyCount = this.keys.length;
        this.slotByControl = new Map(this.keys.map((key, slot) => [key.index, slot]));
        deck.on("error", (err) => {
            this.logger.error("device", "stream deck error", { error: err });
        });
    }

    /** Open the first Stream Deck that has LCD keys. */
    static async openFirst(logger: LoggerContext): Promise<StreamDeckKeys> {
        const devices = await listStreamDecks();
        for (const info of devices) {
            const deck = await openStreamDeck(info.path);
            const keys = new StreamDeckKeys(deck, logger);
            if (keys.keyCount > 0) {
                logger.info("device", "opened stream deck", {
                    model: deck.PRODUCT_NAME,
                    path: info.path,
                    keys: keys.keyCount,
                });
                return keys;
            }
            logger.debug("device", "skipping device without LCD keys", { model: deck.PRODUCT_NAME });
            await deck.close();
        }
        throw new Error("[keywin] no Stream Deck with LCD keys found");
    }

    /** Pixel size of the first key; every LCD key on a model has the same size. */
    get keySize(): { width: number; height: number } {
        const first = this.keys[0];
        return { width: first?.width ?? 0, height: first?.height ?? 0 };
    }

    async prepare(brightness: number): Promise<void> {
        await this.deck.resetToLogo();
        await this.deck.setBrightness(brightness);
    }

    async setKeyImage(slot: number, image: KeyImage | null): Promise<void> {
        const key = this.keys[slot];
        if (!key) throw new RangeError(`[keywin] StreamDeckKeys: no key for slot ${slot}`);

        if (image === null) {
            await this.deck.clearKey(key.index);
            return;
        }
        if (image.width !== key.width || image.height !== key.height) {
            throw new RangeError(
                `[keywin] StreamDeckKeys: image is ${image.width}x${image.height}, key ${slot} is ${key.width}x${key.height}`,
            );
        }
        await this.deck.fillKeyBuffer(key.index, image.data, { format: "rgb" });
    }

    onKeyStateChange(listener: KeyStateListener): () => void {
        const notify = (index: number, pressed: boolean) => {
            const slot = this.slotByControl.get(index);
            if (slot !== undefined) listener(slot, pressed);
        };
        const onDown = (control: { index: number }) => notify(control.index, true);
        const onUp = (control: { index: number }) => notify(control.index, false);
        this.deck.on("down", onDown);
        this.deck.on("up", onUp);
        return () => {
            this.deck.off("down", onDown);
            this.deck.off("up", onUp);
        };
    }

    /** Put the factory logo back and release the HID handle. */
    async close(): Promise<void> {
        await this.deck.resetToLogo();
        await this.deck.close();
    }
}

export type DeckSummary = {
    model: string;
    serialNumber: string | null;
    path: string;
};

export async function listDecks(): Promise<DeckSummary[]> {
    const devices = await listStreamDecks();
    return devices.map((info) => ({ model: info.model, serialNumber: info.serialNumber ?? null, path: info.path }));
}
