import type { WindowIdentity } from "../windows/types";
import type { SlotIndex } from "./types";

/**
 * Fixed-size map from key index to the window shown on that key.
 *
 * The size never changes after construction and an identity occupies at most one slot.
 */
export class SlotTable {
    private readonly slots: (WindowIdentity | null)[];

    constructor(size: number) {
        if (!Number.isInteger(size) || size < 0) {
            throw new Error(`[keywin] SlotTable: size must be a non-negative integer, got ${size}`);
        }
        this.slots = new Array<WindowIdentity | null>(size).fill(null);
    }

    get size(): number {
        return this.slots.length;
    }

    get occupied(): number {
        return this.slots.filter((slot) => slot !== null).length;
    }

    /**
     * Place `identity` in the first empty slot. Returns null when every slot is taken;
     * an identity that already holds a slot keeps it.
     */
    assign(identity: WindowIdentity): SlotIndex | null {
        const existing = this.indexOf(identity);
        if (existing !== null) return existing;

        const free = this.slots.indexOf(null);
        if (free === -1) return null;
        this.slots[free] = identity;
        return free;
    }

    /** Clear the slot holding `identity`, if any. */
    release(identity: WindowIdentity): SlotIndex | null {
        const index = this.indexOf(identity);
        if (index === null) return null;
        this.slots[index] = null;
        return index;
    }

    occupant(index: SlotIndex): WindowIdentity | null {
        return this.slots[index] ?? null;
    }

    indexOf(identity: WindowIdentity): SlotIndex | null {
        const index = this.slots.indexOf(identity);
        return index === -1 ? null : index;
    }

    snapshot(): readonly (WindowIdentity | null)[] {
        return [...this.slots];
    }
}
