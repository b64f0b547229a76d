import { listDecks } from "../device/stream-deck";

export async function devices(): Promise<void> {
    const decks = await listDecks();
    if (decks.length === 0) {
        console.log("No Stream Deck connected");
        return;
    }
    for (const deck of decks) {
        console.log(`${deck.model}\t${deck.serialNumber ?? "-"}\t${deck.path}`);
    }
}
