import { existsSync, readFileSync } from "node:fs";
import dotenv from "dotenv";

export type AlgoOptions = {
    /** Seed for the algo's random source. */
    seed: string;
    /** Whether the seed came from the environment rather than being drawn. */
    seedProvided: boolean;
    debug: boolean;
};

type EnvLike = Record<string, string | undefined>;

function asFlag(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined) return fallback;
    const normalized = value.trim().toLowerCase();
    if (normalized === "1" || normalized === "true" || normalized === "yes") return true;
    if (normalized === "0" || normalized === "false" || normalized === "no") return false;
    return fallback;
}

/**
 * Reads runtime options. Variables already in `env` win over the `.env` file.
 */
export function loadAlgoOptions(env: EnvLike = process.env, envFile?: string): AlgoOptions {
    const fromFile: Record<string, string> = envFile && existsSync(envFile) ? dotenv.parse(readFileSync(envFile, "utf8")) : {};
    const pick = (name: string): string | undefined => {
        const value = env[name] ?? fromFile[name];
        return value === undefined || value.trim() === "" ? undefined : value.trim();
    };

    const seed = pick("ALGO_SEED");
    return {
        seed: seed ?? String(Math.floor(Math.random() * Number.MAX_SAFE_INTEGER)),
        seedProvided: seed !== undefined,
        debug: asFlag(pick("ALGO_DEBUG"), true),
    };
}
