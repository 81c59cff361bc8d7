import type { ClientBase, ServiceBase, SubscriptionBase, TimerBase, Waitable } from "../entities/types";
import type { Shared } from "../shared/shared";
import { WorkKind } from "./enums";

export type EmptySlot = { readonly kind: WorkKind.Empty };
export type SubscriptionSlot = { readonly kind: WorkKind.Subscription; readonly handle: Shared<SubscriptionBase> };
export type TimerSlot = { readonly kind: WorkKind.Timer; readonly handle: Shared<TimerBase> };
export type ServiceSlot = { readonly kind: WorkKind.Service; readonly handle: Shared<ServiceBase> };
export type ClientSlot = { readonly kind: WorkKind.Client; readonly handle: Shared<ClientBase> };
export type WaitableSlot = { readonly kind: WorkKind.Waitable; readonly handle: Shared<Waitable> };

/**
 * Storage for one unit of work. `kind` is the only discriminant and decides
 * which `handle` type is present; the compiler rejects reads of any other.
 */
export type VariantSlot = EmptySlot | SubscriptionSlot | TimerSlot | ServiceSlot | ClientSlot | WaitableSlot;

type SlotMap = {
    [WorkKind.Empty]: EmptySlot;
    [WorkKind.Subscription]: SubscriptionSlot;
    [WorkKind.Timer]: TimerSlot;
    [WorkKind.Service]: ServiceSlot;
    [WorkKind.Client]: ClientSlot;
    [WorkKind.Waitable]: WaitableSlot;
};

/**
 * The slot variant for a given kind (`VariantSlot` itself for the full `WorkKind`).
 * An indexed lookup keeps `WorkItem<K>` covariant in `K`, so a narrowed item
 * is assignable to `WorkItem`.
 */
export type SlotOf<K extends WorkKind> = SlotMap[K];

/** One callback per kind. Missing a kind is a type error. */
export type WorkVisitor<R> = {
    empty: () => R;
    subscription: (handle: Shared<SubscriptionBase>) => R;
    timer: (handle: Shared<TimerBase>) => R;
    service: (handle: Shared<ServiceBase>) => R;
    client: (handle: Shared<ClientBase>) => R;
    waitable: (handle: Shared<Waitable>) => R;
};
