// ── Ownership ───────────────────────────────────────────────────────
export { Shared } from "./core/shared/shared";
export type { SharedOptions } from "./core/shared/types";
// ── Entities ────────────────────────────────────────────────────────
export { CallbackGroupType } from "./core/entities/enums";
export type {
    CallbackGroup,
    ClientBase,
    NodeBase,
    ServiceBase,
    SubscriptionBase,
    TimerBase,
    Waitable,
} from "./core/entities/types";
// ── Work items ──────────────────────────────────────────────────────
export { WorkKind } from "./core/work-item/enums";
export { cloneSlot, EMPTY_SLOT, releaseSlot } from "./core/work-item/slot";
export type {
    ClientSlot,
    EmptySlot,
    ServiceSlot,
    SlotOf,
    SubscriptionSlot,
    TimerSlot,
    VariantSlot,
    WaitableSlot,
    WorkVisitor,
} from "./core/work-item/types";
export { WorkItem } from "./core/work-item/work-item";
// ── Executable handle ───────────────────────────────────────────────
export { AnyExecutable } from "./core/executable/any-executable";
export { createAnyExecutable } from "./core/executable/helpers";
export type { AnyExecutableConfig, ExecutableOf } from "./core/executable/types";
// ── Logger ──────────────────────────────────────────────────────────
export { createConsoleHandler } from "./core/logger/console-handler";
export { Logger } from "./core/logger/logger";
export type { ConsoleHandlerOptions, LogEntry, LoggerConfig, LogHandler, LogLevel } from "./core/logger/types";
export type { LoggerContext } from "./core/types";
