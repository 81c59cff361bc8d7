import { WorkKind } from "./enums";
import type { EmptySlot, VariantSlot } from "./types";

export const EMPTY_SLOT: EmptySlot = { kind: WorkKind.Empty };

/** Copy a slot: clone the holder of the active payload only. */
export function cloneSlot(slot: VariantSlot): VariantSlot {
    switch (slot.kind) {
        case WorkKind.Empty:
            return EMPTY_SLOT;
        case WorkKind.Subscription:
            return { kind: slot.kind, handle: slot.handle.clone() };
        case WorkKind.Timer:
            return { kind: slot.kind, handle: slot.handle.clone() };
        case WorkKind.Service:
            return { kind: slot.kind, handle: slot.handle.clone() };
        case WorkKind.Client:
            return { kind: slot.kind, handle: slot.handle.clone() };
        case WorkKind.Waitable:
            return { kind: slot.kind, handle: slot.handle.clone() };
    }
}

/** Release the holder of the active payload. Empty slots hold nothing. */
export function releaseSlot(slot: VariantSlot): void {
    if (slot.kind === WorkKind.Empty) return;
    slot.handle.release();
}

export function isSlotReleased(slot: VariantSlot): boolean {
    return slot.kind !== WorkKind.Empty && slot.handle.released;
}
