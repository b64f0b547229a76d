/** Zero-based key position on the device. */
export type SlotIndex = number;
