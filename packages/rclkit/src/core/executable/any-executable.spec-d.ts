/**
 * Contract: AnyExecutable -- compile-time accessor gating.
 *
 * Sections:
 *   1. Guards
 *   2. Accessor gating
 */
import { describe, expectTypeOf, it } from "vitest";
import type { TimerBase } from "../entities/types";
import { Shared } from "../shared/shared";
import type { WorkKind } from "../work-item/enums";
import { WorkItem } from "../work-item/work-item";
import { AnyExecutable } from "./any-executable";
import type { ExecutableOf } from "./types";

const heartbeat: TimerBase = { periodMs: 100, isCanceled: () => false };

function timerExecutable(): AnyExecutable {
    const exec = new AnyExecutable();
    exec.assign(WorkItem.timer(Shared.make(heartbeat)));
    return exec;
}

describe("AnyExecutable types", () => {
    // -- 1. Guards --
    describe("Guards", () => {
        it("guards narrow to ExecutableOf<K>", () => {
            const exec = timerExecutable();
            if (exec.isTimer()) {
                expectTypeOf(exec).toMatchTypeOf<ExecutableOf<WorkKind.Timer>>();
                expectTypeOf(exec.getTimer()).toEqualTypeOf<Shared<TimerBase>>();
            }
        });
    });

    // -- 2. Accessor gating --
    describe("Accessor gating", () => {
        it("accessors demand the matching narrowed handle", () => {
            const exec = new AnyExecutable();
            expectTypeOf(exec.getSubscription).thisParameter.toEqualTypeOf<ExecutableOf<WorkKind.Subscription>>();
            expectTypeOf(exec.getWaitable).thisParameter.toEqualTypeOf<ExecutableOf<WorkKind.Waitable>>();
            expectTypeOf<AnyExecutable>().not.toMatchTypeOf<ExecutableOf<WorkKind.Waitable>>();
        });

        it("an unnarrowed handle rejects the accessors", () => {
            const exec = timerExecutable();
            // @ts-expect-error getTimer() needs a guard first
            exec.getTimer();
        });

        it("a timer-narrowed handle rejects the waitable accessor", () => {
            const exec = timerExecutable();
            if (exec.isTimer()) {
                // @ts-expect-error getWaitable() needs a waitable handle
                exec.getWaitable();
            }
        });
    });
});
