export type Coordinate = Readonly<{ x: number; y: number }>;

/** Pools the engine tracks for each player. `structure` is cores, `spawn` is bits. */
export type ResourceKind = "structure" | "spawn";

export type StructureRole = "barrier" | "reinforced-barrier" | "support";

export type MobileRole = "ping" | "emp" | "interceptor";

export type PlanTier = "initial" | "secondary" | "tertiary";

/** Whose units a query should count. */
export type PlayerSide = "self" | "enemy";

/** Engine shorthand for a unit type, e.g. "FF" or "PI". */
export type UnitTypeId = string;

export type PlanEntry = Readonly<{
    coordinate: Coordinate;
    role: StructureRole;
    tier: PlanTier;
    requiresUpgrade: boolean;
}>;

export type ReinforcementPass = Readonly<{
    name: string;
    /** Every coordinate here must hold a structure before the pass may spend. */
    requires: readonly Coordinate[];
    entries: readonly PlanEntry[];
    /** Entries are already standing; only their upgrades are bought. */
    upgradeOnly: boolean;
}>;

export type PlacementPlan = Readonly<{
    initial: readonly PlanEntry[];
    secondary: readonly PlanEntry[];
    reinforcements: readonly ReinforcementPass[];
}>;

export type DefenseOrder =
    | { type: "Build"; unit: UnitTypeId; coordinate: Coordinate; tier: PlanTier; pass?: string }
    | { type: "Upgrade"; coordinate: Coordinate; tier: PlanTier; pass?: string };

export type LaunchOrder = {
    strategy: LaunchStrategy;
    unit: UnitTypeId;
    coordinate: Coordinate;
    quantity: number;
};

export type LaunchCandidate = {
    coordinate: Coordinate;
    risk: number;
};

export type StrategyKind = "undecided" | "hold" | "mass-small" | "mass-burst" | "scrambler-stall";

export type LaunchStrategy = Extract<StrategyKind, "mass-small" | "mass-burst" | "scrambler-stall">;

export type BreachRecord = Readonly<{
    coordinate: Coordinate;
    turn: number;
}>;

export type TurnReport = {
    turn: number;
    defense: DefenseOrder[];
    launches: LaunchOrder[];
    strategy: StrategyKind;
    minimumSpawnThreshold: number;
    /** Phases that threw and were skipped this turn. */
    failures: string[];
    /** Ledger reconciliations that exceeded the tolerance band. */
    discrepancies: number;
};
