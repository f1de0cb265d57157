import { beforeAll, describe, expect, it } from "vitest";
import { coord } from "../core/grid.js";
import { FakeBattlefield } from "../test/fake-battlefield.js";
import { testConfig } from "../test/fixtures.js";
import { setAlgoDebug } from "./debug-logging.js";
import { ResourceLedger } from "./resource-ledger.js";

describe("ResourceLedger", () => {
    const config = testConfig();

    beforeAll(() => setAlgoDebug(false));

    it("always reads the engine's balance", () => {
        const field = new FakeBattlefield(config, { structure: 5, spawn: 2 });
        const ledger = new ResourceLedger(field);
        expect(ledger.read("structure")).toBe(5);
        field.setResource("structure", 3);
        expect(ledger.read("structure")).toBe(3);
        expect(ledger.canAfford("structure", 3)).toBe(true);
        expect(ledger.canAfford("structure", 3.5)).toBe(false);
    });

    it("never reports a negative balance", () => {
        const field = new FakeBattlefield(config, { spawn: -1 });
        expect(new ResourceLedger(field).read("spawn")).toBe(0);
    });

    it("reconciles a spend against the engine", () => {
        const field = new FakeBattlefield(config, { spawn: 10 });
        const ledger = new ResourceLedger(field);

        const result = ledger.spend("spawn", 3, () => field.attemptSpawn("EI", coord(13, 0), 2));

        expect(result).toEqual({ accepted: 2, predicted: 4, balance: 4 });
        expect(ledger.discrepancies).toEqual([]);
    });

    it("tolerates small rounding drift", () => {
        const field = new FakeBattlefield(config, { spawn: 10, spawnSurcharge: 0.01 });
        const ledger = new ResourceLedger(field);

        const result = ledger.spend("spawn", 1, () => field.attemptSpawn("PI", coord(13, 0), 4));

        expect(result.predicted).toBe(6);
        expect(result.balance).toBeCloseTo(5.99, 10);
        expect(ledger.discrepancies).toEqual([]);
    });

    it("records drift beyond the tolerance and trusts the engine", () => {
        const field = new FakeBattlefield(config, { spawn: 10, spawnSurcharge: 1 });
        const ledger = new ResourceLedger(field);

        const result = ledger.spend("spawn", 1, () => field.attemptSpawn("PI", coord(13, 0), 4));

        expect(result.balance).toBe(5);
        expect(ledger.discrepancies).toEqual([{ kind: "spawn", predicted: 6, actual: 5 }]);
    });

    it("predicts no change when the engine accepts nothing", () => {
        const field = new FakeBattlefield(config, { structure: 0 });
        const ledger = new ResourceLedger(field);
        const result = ledger.spend("structure", 1, () => field.attemptSpawn("FF", coord(5, 11)));
        expect(result).toEqual({ accepted: 0, predicted: 0, balance: 0 });
    });
});
