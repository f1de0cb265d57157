import { Coordinate, PlayerSide, ResourceKind, UnitTypeId } from "./types.js";

/**
 * The engine's view of one turn, as the algo sees it.
 *
 * The engine owns the board, the pathfinder and the resource pools. Spend calls
 * queue orders for the turn's single submission and update the pools; the algo
 * must read balances back instead of predicting them.
 */
export interface Battlefield {
    readonly turnNumber: number;

    getResource(kind: ResourceKind): number;

    /**
     * Queues up to `quantity` units at `at`. Returns how many the engine accepted,
     * which is capped by the current balance and is 0 for occupied or invalid tiles.
     */
    attemptSpawn(unit: UnitTypeId, at: Coordinate, quantity?: number): number;

    /** Returns 1 if a structure at `at` was queued for upgrade, 0 otherwise. */
    attemptUpgrade(at: Coordinate): number;

    containsStationaryUnit(at: Coordinate): boolean;

    /** Route a mobile unit would take to the far edge. Single pass; empty if unreachable. */
    findPathToEdge(at: Coordinate): Iterable<Coordinate>;

    /** Number of `owner` structures able to strike `at`. */
    getAttackers(at: Coordinate, owner: PlayerSide): number;

    canSpawn(unit: UnitTypeId, at: Coordinate, quantity: number): boolean;

    /** Our deployable edge tiles (both bottom edges). */
    friendlyEdges(): Coordinate[];

    /** Flushes the queued orders to the engine. */
    submitTurn(): void;
}
