import seedrandom from "seedrandom";

/** Uniform source in [0, 1). Injected wherever the algo draws, so tests can pin it. */
export interface RandomSource {
    next(): number;
}

export function createRandomSource(seed: string): RandomSource {
    const prng = seedrandom(seed);
    return { next: () => prng() };
}

export function randomIndex(rng: RandomSource, length: number): number {
    // Clamp guards a source that returns exactly 1.
    return Math.min(length - 1, Math.floor(rng.next() * length));
}

export function pickRandom<T>(rng: RandomSource, options: readonly T[]): T | null {
    if (options.length === 0) return null;
    return options[randomIndex(rng, options.length)];
}
