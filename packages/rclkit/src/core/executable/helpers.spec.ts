import { describe, expect, it } from "vitest";
import { CallbackGroupType } from "../entities/enums";
import type { CallbackGroup, NodeBase, TimerBase } from "../entities/types";
import { Shared } from "../shared/shared";
import { WorkKind } from "../work-item/enums";
import { WorkItem } from "../work-item/work-item";
import { createAnyExecutable } from "./helpers";

const heartbeat: TimerBase = { periodMs: 100, isCanceled: () => false };
const group: CallbackGroup = { type: CallbackGroupType.Reentrant };
const talker: NodeBase = { name: "talker", namespace: "/demo" };

describe("createAnyExecutable", () => {
    it("with no config returns an empty handle", () => {
        const exec = createAnyExecutable();
        expect(exec.isEmpty()).toBe(true);
        expect(exec.callbackGroup).toBeNull();
        expect(exec.nodeBase).toBeNull();
        expect(exec.data).toBeNull();
    });

    it("adopts the work and every keep-alive holder", () => {
        const work = WorkItem.timer(Shared.make(heartbeat));
        const callbackGroup = Shared.make(group);
        const nodeBase = Shared.make(talker);
        const data = Shared.make("tick");

        const exec = createAnyExecutable({ work, callbackGroup, nodeBase, data });
        expect(exec.kind).toBe(WorkKind.Timer);
        expect(exec.work).toBe(work);
        expect(exec.callbackGroup).toBe(callbackGroup);
        expect(exec.nodeBase).toBe(nodeBase);
        expect(exec.data).toBe(data);
        expect(nodeBase.useCount).toBe(1);
    });

    it("throws on a released work item", () => {
        const work = WorkItem.timer(Shared.make(heartbeat));
        work.release();
        expect(() => createAnyExecutable({ work })).toThrow('createAnyExecutable: "work" is already released');
    });

    it("throws on a released keep-alive holder", () => {
        const nodeBase = Shared.make(talker);
        nodeBase.release();
        expect(() => createAnyExecutable({ nodeBase })).toThrow(
            'createAnyExecutable: "nodeBase" is already released',
        );
    });
});
