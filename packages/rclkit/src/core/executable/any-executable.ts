import type { CallbackGroup, ClientBase, NodeBase, ServiceBase, SubscriptionBase, TimerBase, Waitable } from "../entities/types";
import type { Shared } from "../shared/shared";
import type { WorkKind } from "../work-item/enums";
import type { WorkVisitor } from "../work-item/types";
import { WorkItem } from "../work-item/work-item";
import type { ExecutableOf } from "./types";

/**
 * The handle an executor passes from "found ready in the wait set" to
 * "callback invoked".
 *
 * Holds one {@link WorkItem} plus three keep-alive holders. None of the
 * holders are read by the handle itself; they exist so the entity, its
 * callback group and its node cannot be torn down mid-dispatch.
 *
 * Lifecycle: empty → populated (once) → released. Both steps are one-way,
 * so a narrowing from an `is*()` guard stays true for the handle's lifetime.
 */
export class AnyExecutable {
    callbackGroup: Shared<CallbackGroup> | null = null;
    nodeBase: Shared<NodeBase> | null = null;
    /** Per-dispatch scratch, e.g. a message already taken from the subscription. */
    data: Shared<unknown> | null = null;

    private _work: WorkItem = WorkItem.empty();
    private _released = false;

    get work(): WorkItem {
        return this._work;
    }

    get kind(): WorkKind {
        return this._work.kind;
    }

    // ── Kind guards ──────────────────────────────────────────────────────

    isEmpty(): this is ExecutableOf<WorkKind.Empty> {
        return this._work.isEmpty();
    }

    isSubscription(): this is ExecutableOf<WorkKind.Subscription> {
        return this._work.isSubscription();
    }

    isTimer(): this is ExecutableOf<WorkKind.Timer> {
        return this._work.isTimer();
    }

    isService(): this is ExecutableOf<WorkKind.Service> {
        return this._work.isService();
    }

    isClient(): this is ExecutableOf<WorkKind.Client> {
        return this._work.isClient();
    }

    isWaitable(): this is ExecutableOf<WorkKind.Waitable> {
        return this._work.isWaitable();
    }

    // ── Accessors ────────────────────────────────────────────────────────

    getSubscription(this: ExecutableOf<WorkKind.Subscription>): Shared<SubscriptionBase> {
        return this.work.getSubscription();
    }

    getTimer(this: ExecutableOf<WorkKind.Timer>): Shared<TimerBase> {
        return this.work.getTimer();
    }

    getService(this: ExecutableOf<WorkKind.Service>): Shared<ServiceBase> {
        return this.work.getService();
    }

    getClient(this: ExecutableOf<WorkKind.Client>): Shared<ClientBase> {
        return this.work.getClient();
    }

    getWaitable(this: ExecutableOf<WorkKind.Waitable>): Shared<Waitable> {
        return this.work.getWaitable();
    }

    match<R>(visitor: WorkVisitor<R>): R {
        return this._work.match(visitor);
    }

    // ── Population ───────────────────────────────────────────────────────

    /** Populate with a subscription. Takes ownership of `subscription`. */
    setExecutable(subscription: Shared<SubscriptionBase>): void {
        this.assign(WorkItem.subscription(subscription));
    }

    /**
     * Populate with any item. Takes ownership of `work`.
     *
     * A handle is populated once: the kind never changes after an `is*()`
     * guard has narrowed it. To dispatch other work, release this handle
     * and start a new one.
     *
     * @throws If the handle is released or already populated, or `work` is released.
     */
    assign(work: WorkItem): void {
        if (this._released) {
            throw new Error(`AnyExecutable: cannot assign "${work.kind}" work to a released handle`);
        }
        if (!this._work.isEmpty()) {
            throw new Error(
                `AnyExecutable: cannot assign "${work.kind}" work, handle already holds "${this._work.kind}" work`,
            );
        }
        if (work.released) {
            throw new Error(`AnyExecutable: cannot assign released "${work.kind}" work`);
        }
        this._work = work;
    }

    // ── Copy / destroy ───────────────────────────────────────────────────

    /** True once {@link AnyExecutable.release} has run. */
    get released(): boolean {
        return this._released;
    }

    /**
     * Copy with cloned holders: same kind, same referents, use counts +1.
     *
     * @throws If this handle, its work or any keep-alive holder is released. Nothing is cloned then.
     */
    clone(): AnyExecutable {
        if (this._released) throw new Error("AnyExecutable: cannot clone a released handle");
        const held = [
            ["work", this._work],
            ["callbackGroup", this.callbackGroup],
            ["nodeBase", this.nodeBase],
            ["data", this.data],
        ] as const;
        for (const [field, holder] of held) {
            if (holder?.released) throw new Error(`AnyExecutable: cannot clone, "${field}" is already released`);
        }

        const copy = new AnyExecutable();
        copy._work = this._work.clone();
        copy.callbackGroup = this.callbackGroup?.clone() ?? null;
        copy.nodeBase = this.nodeBase?.clone() ?? null;
        copy.data = this.data?.clone() ?? null;
        return copy;
    }

    /**
     * Release the work and every keep-alive holder. Idempotent and terminal:
     * the kind and fields stay in place, so a stale accessor fails on the
     * released holder instead of reading other work. The work goes first,
     * the callback group last.
     */
    release(): void {
        this._released = true;

        const errors: unknown[] = [];
        for (const holder of [this._work, this.data, this.nodeBase, this.callbackGroup]) {
            try {
                holder?.release();
            } catch (err) {
                errors.push(err);
            }
        }

        if (errors.length === 1) throw errors[0];
        if (errors.length > 1) throw new AggregateError(errors, "AnyExecutable: multiple teardowns failed");
    }
}
