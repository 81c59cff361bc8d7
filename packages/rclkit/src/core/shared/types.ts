import type { LoggerContext } from "../types";

export type SharedOptions<T> = {
    /** Label used in log entries. Defaults to `"shared"`. */
    name?: string;
    /** Teardown, run exactly once when the last holder releases. */
    onDestroy?: (value: T) => void;
    logger?: LoggerContext;
};
