/**
 * Algo logging.
 *
 * The engine reads orders from stdout, so every message goes to stderr.
 * Debug and info lines can be switched off for batch runs and tests; warnings
 * always print.
 */

type Level = "debug" | "info" | "warn";

const TAGS: Record<Level, string | null> = {
    debug: null,
    info: "[info]",
    warn: "[warn]",
};

let debugEnabled = true;

export function setAlgoDebug(enabled: boolean): void {
    debugEnabled = enabled;
}

function emit(level: Level, args: unknown[]): void {
    if (level !== "warn" && !debugEnabled) return;
    const tag = TAGS[level];
    if (tag === null) {
        console.error(...args);
    } else {
        console.error(tag, ...args);
    }
}

export function algoLog(...args: unknown[]): void {
    emit("debug", args);
}

export function algoInfo(...args: unknown[]): void {
    emit("info", args);
}

/** Always printed, regardless of the debug switch. */
export function algoWarn(...args: unknown[]): void {
    emit("warn", args);
}
