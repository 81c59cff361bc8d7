/**
 * Contract: WorkItem -- compile-time kind tracking.
 *
 * Sections:
 *   1. Builders
 *   2. Accessor gating
 *   3. Assignability
 */
import { describe, expectTypeOf, it } from "vitest";
import type { Waitable } from "../entities/types";
import { Shared } from "../shared/shared";
import type { WorkKind } from "./enums";
import { WorkItem } from "./work-item";

const guard: Waitable = { isReady: () => true };

describe("WorkItem types", () => {
    // -- 1. Builders --
    describe("Builders", () => {
        it("each builder returns an item narrowed to its kind", () => {
            expectTypeOf(WorkItem.empty()).toEqualTypeOf<WorkItem<WorkKind.Empty>>();
            expectTypeOf(WorkItem.waitable(Shared.make(guard))).toEqualTypeOf<WorkItem<WorkKind.Waitable>>();
        });

        it("clone() forgets the static kind", () => {
            expectTypeOf(WorkItem.waitable(Shared.make(guard)).clone()).toEqualTypeOf<WorkItem>();
        });
    });

    // -- 2. Accessor gating --
    describe("Accessor gating", () => {
        it("each accessor only accepts an item of its own kind", () => {
            const item = WorkItem.waitable(Shared.make(guard));
            expectTypeOf(item.getWaitable).thisParameter.toEqualTypeOf<WorkItem<WorkKind.Waitable>>();
            expectTypeOf(item.getTimer).thisParameter.toEqualTypeOf<WorkItem<WorkKind.Timer>>();
        });

        it("a waitable item rejects the timer accessor", () => {
            const item = WorkItem.waitable(Shared.make(guard));
            // @ts-expect-error getTimer() needs a timer item
            item.getTimer();
        });

        it("an unnarrowed item rejects every accessor until a guard runs", () => {
            const item: WorkItem = WorkItem.waitable(Shared.make(guard));
            // @ts-expect-error getWaitable() needs a waitable item
            item.getWaitable();
            if (item.isWaitable()) {
                expectTypeOf(item.getWaitable()).toEqualTypeOf<Shared<Waitable>>();
            }
        });
    });

    // -- 3. Assignability --
    describe("Assignability", () => {
        it("a narrowed item is a WorkItem", () => {
            expectTypeOf<WorkItem<WorkKind.Timer>>().toMatchTypeOf<WorkItem>();
        });

        it("items of different kinds are not interchangeable", () => {
            expectTypeOf<WorkItem<WorkKind.Waitable>>().not.toMatchTypeOf<WorkItem<WorkKind.Timer>>();
        });
    });
});
