import { AnyExecutable } from "./any-executable";
import type { AnyExecutableConfig } from "./types";

/**
 * Build a populated {@link AnyExecutable} in one step. The handle takes
 * ownership of every holder in `config`.
 *
 * @throws If any supplied holder is already released.
 */
export function createAnyExecutable(config: AnyExecutableConfig = {}): AnyExecutable {
    const held = [
        ["work", config.work],
        ["callbackGroup", config.callbackGroup],
        ["nodeBase", config.nodeBase],
        ["data", config.data],
    ] as const;
    for (const [field, holder] of held) {
        if (holder?.released) throw new Error(`createAnyExecutable: "${field}" is already released`);
    }

    const executable = new AnyExecutable();
    if (config.work) executable.assign(config.work);
    executable.callbackGroup = config.callbackGroup ?? null;
    executable.nodeBase = config.nodeBase ?? null;
    executable.data = config.data ?? null;
    return executable;
}
