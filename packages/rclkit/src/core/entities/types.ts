import type { CallbackGroupType } from "./enums";

/**
 * Structural contracts for the entities a work item can point at.
 *
 * These are owned by the node / wait-set layer. The executor handle only
 * keeps them alive, so each contract carries just enough to identify the
 * entity in logs and tests.
 */

export interface SubscriptionBase {
    readonly topicName: string;
}

export interface TimerBase {
    readonly periodMs: number;
    isCanceled(): boolean;
}

export interface ServiceBase {
    readonly serviceName: string;
}

export interface ClientBase {
    readonly serviceName: string;
    isServiceReady(): boolean;
}

/** Generic readiness source (guard conditions, events, composite entities). */
export interface Waitable {
    isReady(): boolean;
}

export interface CallbackGroup {
    readonly type: CallbackGroupType;
}

export interface NodeBase {
    readonly name: string;
    readonly namespace: string;
}
