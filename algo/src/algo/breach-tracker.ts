import { FRAME_OWNER_OPPONENT } from "../core/constants.js";
import { coordKey } from "../core/grid.js";
import { BreachRecord, Coordinate } from "../core/types.js";
import { algoLog } from "./debug-logging.js";

/**
 * Remembers where the opponent scored on us. Append-only.
 */
export class BreachTracker {
    private readonly records: BreachRecord[] = [];
    private turn = 0;

    /** Turn stamped on subsequent records. */
    setTurn(turn: number): void {
        this.turn = turn;
    }

    /**
     * Records a breach if it was scored by an opponent unit.
     * @returns Whether a record was appended.
     */
    onEnemyBreachEvent(coordinate: Coordinate, ownerFlag: number): boolean {
        if (ownerFlag !== FRAME_OWNER_OPPONENT) return false;
        this.records.push(Object.freeze({ coordinate, turn: this.turn }));
        algoLog(`Got scored on at ${coordKey(coordinate)} (${this.records.length} total)`);
        return true;
    }

    get history(): readonly BreachRecord[] {
        return this.records;
    }
}
