import { Battlefield } from "../core/battlefield.js";
import { ACCOUNTING_TOLERANCE } from "../core/constants.js";
import { ResourceKind } from "../core/types.js";
import { algoLog, algoWarn } from "./debug-logging.js";

export type SpendResult = {
    /** Units the engine accepted. */
    accepted: number;
    /** Balance we expected after the spend. */
    predicted: number;
    /** Balance the engine reports after the spend. Always the one to trust. */
    balance: number;
};

export type Discrepancy = {
    kind: ResourceKind;
    predicted: number;
    actual: number;
};

/**
 * Per-turn accessor for the two resource pools.
 *
 * Holds no balance of its own: every read goes to the engine, and every spend is
 * followed by a fresh read that is compared against the local prediction.
 */
export class ResourceLedger {
    private readonly drift: Discrepancy[] = [];

    constructor(private readonly field: Battlefield, private readonly tolerance: number = ACCOUNTING_TOLERANCE) {}

    read(kind: ResourceKind): number {
        return Math.max(0, this.field.getResource(kind));
    }

    canAfford(kind: ResourceKind, cost: number): boolean {
        return this.read(kind) >= cost;
    }

    /**
     * Runs one engine spend call and reconciles the pool afterwards.
     * @param unitCost - Cost charged per accepted unit.
     * @param perform - Engine call returning the number of units accepted.
     */
    spend(kind: ResourceKind, unitCost: number, perform: () => number): SpendResult {
        const before = this.read(kind);
        const accepted = Math.max(0, perform());
        const predicted = before - unitCost * accepted;
        const balance = this.read(kind);

        const diff = Math.abs(balance - predicted);
        if (diff > this.tolerance) {
            this.drift.push({ kind, predicted, actual: balance });
            algoWarn(`Ledger drift on ${kind}: predicted ${predicted}, engine reports ${balance}`);
        } else if (diff > 0) {
            algoLog(`Ledger rounding on ${kind}: ${predicted} vs ${balance}`);
        }

        return { accepted, predicted, balance };
    }

    get discrepancies(): readonly Discrepancy[] {
        return this.drift;
    }
}
