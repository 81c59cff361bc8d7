import type { ClientBase, ServiceBase, SubscriptionBase, TimerBase, Waitable } from "../entities/types";
import type { Shared } from "../shared/shared";
import { WorkKind } from "./enums";
import { cloneSlot, EMPTY_SLOT, isSlotReleased, releaseSlot } from "./slot";
import type { SlotOf, VariantSlot, WorkVisitor } from "./types";

/**
 * One unit of dispatchable work: exactly one of the five entity kinds, or empty.
 *
 * `K` tracks the kind statically. The `is*()` guards narrow an unknown item to
 * `WorkItem<K>`, and each `get*()` accessor only type-checks on its own kind.
 *
 * Constructors take ownership of the holder they are given; pass a
 * `clone()` to keep your own.
 */
export class WorkItem<K extends WorkKind = WorkKind> {
    private constructor(private readonly slot: SlotOf<K>) {}

    // ── Construction ─────────────────────────────────────────────────────

    static empty(): WorkItem<WorkKind.Empty> {
        return new WorkItem<WorkKind.Empty>(EMPTY_SLOT);
    }

    static subscription(handle: Shared<SubscriptionBase>): WorkItem<WorkKind.Subscription> {
        return new WorkItem<WorkKind.Subscription>({ kind: WorkKind.Subscription, handle });
    }

    static timer(handle: Shared<TimerBase>): WorkItem<WorkKind.Timer> {
        return new WorkItem<WorkKind.Timer>({ kind: WorkKind.Timer, handle });
    }

    static service(handle: Shared<ServiceBase>): WorkItem<WorkKind.Service> {
        return new WorkItem<WorkKind.Service>({ kind: WorkKind.Service, handle });
    }

    static client(handle: Shared<ClientBase>): WorkItem<WorkKind.Client> {
        return new WorkItem<WorkKind.Client>({ kind: WorkKind.Client, handle });
    }

    static waitable(handle: Shared<Waitable>): WorkItem<WorkKind.Waitable> {
        return new WorkItem<WorkKind.Waitable>({ kind: WorkKind.Waitable, handle });
    }

    get kind(): WorkKind {
        return this.slot.kind;
    }

    /** True once the active payload's holder has been released. Empty items never are. */
    get released(): boolean {
        return isSlotReleased(this.slot);
    }

    // ── Copy / destroy ───────────────────────────────────────────────────

    /** Same kind, cloned holder of the same referent. */
    clone(): WorkItem {
        return new WorkItem<WorkKind>(cloneSlot(this.slot));
    }

    /** Release the active payload's holder. Idempotent. */
    release(): void {
        releaseSlot(this.slot);
    }

    // ── Kind guards ──────────────────────────────────────────────────────

    isEmpty(): this is WorkItem<WorkKind.Empty> {
        return this.slot.kind === WorkKind.Empty;
    }

    isSubscription(): this is WorkItem<WorkKind.Subscription> {
        return this.slot.kind === WorkKind.Subscription;
    }

    isTimer(): this is WorkItem<WorkKind.Timer> {
        return this.slot.kind === WorkKind.Timer;
    }

    isService(): this is WorkItem<WorkKind.Service> {
        return this.slot.kind === WorkKind.Service;
    }

    isClient(): this is WorkItem<WorkKind.Client> {
        return this.slot.kind === WorkKind.Client;
    }

    isWaitable(): this is WorkItem<WorkKind.Waitable> {
        return this.slot.kind === WorkKind.Waitable;
    }

    // ── Accessors (kind-checked at compile time) ─────────────────────────

    getSubscription(this: WorkItem<WorkKind.Subscription>): Shared<SubscriptionBase> {
        return this.slot.handle;
    }

    getTimer(this: WorkItem<WorkKind.Timer>): Shared<TimerBase> {
        return this.slot.handle;
    }

    getService(this: WorkItem<WorkKind.Service>): Shared<ServiceBase> {
        return this.slot.handle;
    }

    getClient(this: WorkItem<WorkKind.Client>): Shared<ClientBase> {
        return this.slot.handle;
    }

    getWaitable(this: WorkItem<WorkKind.Waitable>): Shared<Waitable> {
        return this.slot.handle;
    }

    /** Exhaustive branch over the active kind. */
    match<R>(visitor: WorkVisitor<R>): R {
        const slot: VariantSlot = this.slot;
        switch (slot.kind) {
            case WorkKind.Empty:
                return visitor.empty();
            case WorkKind.Subscription:
                return visitor.subscription(slot.handle);
            case WorkKind.Timer:
                return visitor.timer(slot.handle);
            case WorkKind.Service:
                return visitor.service(slot.handle);
            case WorkKind.Client:
                return visitor.client(slot.handle);
            case WorkKind.Waitable:
                return visitor.waitable(slot.handle);
        }
    }
}
