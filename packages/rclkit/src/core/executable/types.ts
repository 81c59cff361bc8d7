import type { CallbackGroup, NodeBase } from "../entities/types";
import type { Shared } from "../shared/shared";
import type { WorkKind } from "../work-item/enums";
import type { WorkItem } from "../work-item/work-item";
import type { AnyExecutable } from "./any-executable";

/** An {@link AnyExecutable} whose kind has been narrowed by one of its `is*()` guards. */
export type ExecutableOf<K extends WorkKind> = AnyExecutable & { readonly work: WorkItem<K> };

export type AnyExecutableConfig = {
    work?: WorkItem;
    callbackGroup?: Shared<CallbackGroup>;
    nodeBase?: Shared<NodeBase>;
    data?: Shared<unknown>;
};
