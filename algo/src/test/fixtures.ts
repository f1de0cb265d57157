import { AlgoConfig, RawGameConfig, resolveAlgoConfig } from "../config/game-config.js";
import { AlgoOptions } from "../config/algo-options.js";
import { RandomSource } from "../algo/random.js";

export const TEST_GAME_CONFIG: RawGameConfig = {
    unitInformation: [
        { shorthand: "FF", cost1: 1, upgrade: { cost1: 1 } },
        { shorthand: "EF", cost1: 4, upgrade: { cost1: 4 } },
        { shorthand: "DF", cost1: 3, attackDamage: 6, upgrade: { cost1: 3 } },
        { shorthand: "PI", cost2: 1 },
        { shorthand: "EI", cost2: 3 },
        { shorthand: "SI", cost2: 1 },
    ],
};

export const TEST_OPTIONS: AlgoOptions = { seed: "test-seed", seedProvided: true, debug: false };

export function testConfig(): AlgoConfig {
    return resolveAlgoConfig(TEST_GAME_CONFIG);
}

/** Replays `values` in order, wrapping around. Counts draws. */
export class SequenceRandom implements RandomSource {
    draws = 0;

    constructor(private readonly values: number[]) {}

    next(): number {
        const value = this.values[this.draws % this.values.length];
        this.draws++;
        return value;
    }
}
