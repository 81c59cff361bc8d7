import { once } from "es-toolkit";
import type { SharedOptions } from "./types";

type ControlBlock<T> = {
    readonly value: T;
    readonly name: string;
    useCount: number;
    expired: boolean;
    readonly destroy: () => void;
};

/**
 * Reference-counted ownership handle.
 *
 * Every holder points at one control block shared by all its clones. The
 * referent's teardown (`onDestroy`) runs once, when the last live holder
 * calls {@link Shared.release}. Holding a clone is what keeps an entity
 * alive between "found ready" and "dispatched".
 *
 * Lifecycle per holder: live → released. Per referent: alive → expired.
 */
export class Shared<T> {
    private _released = false;

    private constructor(private readonly block: ControlBlock<T>) {
        block.useCount++;
    }

    /** Create the first holder of `value` (use count 1). */
    static make<T>(value: T, options: SharedOptions<T> = {}): Shared<T> {
        const name = options.name ?? "shared";
        const { onDestroy, logger } = options;

        const block: ControlBlock<T> = {
            value,
            name,
            useCount: 0,
            expired: false,
            destroy: once(() => {
                block.expired = true;
                try {
                    onDestroy?.(value);
                } catch (err) {
                    const error = err instanceof Error ? err : new Error(String(err));
                    logger?.error("Shared", `teardown of "${name}" failed`, { name, error: error.message });
                    throw error;
                }
                logger?.debug("Shared", `"${name}" destroyed`, { name });
            }),
        };

        return new Shared(block);
    }

    get name(): string {
        return this.block.name;
    }

    /** Number of live holders across all clones. */
    get useCount(): number {
        return this.block.useCount;
    }

    /** True once this holder has been released. */
    get released(): boolean {
        return this._released;
    }

    /** True once the last holder released and teardown ran. */
    get expired(): boolean {
        return this.block.expired;
    }

    /** The referent. Throws on a released holder. */
    get(): T {
        this.assertLive("get");
        return this.block.value;
    }

    /** New holder over the same referent. */
    clone(): Shared<T> {
        this.assertLive("clone");
        return new Shared(this.block);
    }

    /** Drop this holder. Idempotent. The last release runs teardown. */
    release(): void {
        if (this._released) return;
        this._released = true;
        this.block.useCount--;
        if (this.block.useCount === 0) {
            this.block.destroy();
        }
    }

    /** Whether both holders point at the same control block. */
    sameReferent(other: Shared<unknown>): boolean {
        return this.block === other.block;
    }

    private assertLive(op: string): void {
        if (this._released) {
            throw new Error(`Cannot ${op}() a released handle to "${this.block.name}"`);
        }
    }
}
