import { AlgoConfig } from "../config/game-config.js";
import { Battlefield } from "../core/battlefield.js";
import { coordKey } from "../core/grid.js";
import { Coordinate, DefenseOrder, PlacementPlan, PlanEntry } from "../core/types.js";
import { algoLog } from "./debug-logging.js";
import { ResourceLedger } from "./resource-ledger.js";

/** Structure currency an entry needs before we commit to it. */
export function entryCost(entry: PlanEntry, config: AlgoConfig, upgradeOnly = false): number {
    const cost = config.structureCosts[entry.role];
    if (upgradeOnly) return cost.upgrade;
    return entry.requiresUpgrade ? cost.build + cost.upgrade : cost.build;
}

/** True when every coordinate in `required` currently holds a structure. */
export function allStanding(field: Battlefield, required: readonly Coordinate[]): boolean {
    return required.every(c => field.containsStationaryUnit(c));
}

type SpendOutcome = "spent" | "exhausted";

function placeEntry(
    field: Battlefield,
    ledger: ResourceLedger,
    entry: PlanEntry,
    config: AlgoConfig,
    orders: DefenseOrder[],
    pass?: string,
    upgradeOnly = false,
): void {
    const unit = config.structureUnits[entry.role];
    const cost = config.structureCosts[entry.role];

    if (!upgradeOnly) {
        const built = ledger.spend("structure", cost.build, () => field.attemptSpawn(unit, entry.coordinate, 1));
        if (built.accepted > 0) {
            orders.push({ type: "Build", unit, coordinate: entry.coordinate, tier: entry.tier, pass });
        }
    }

    if (!entry.requiresUpgrade) return;
    const upgraded = ledger.spend("structure", cost.upgrade, () => field.attemptUpgrade(entry.coordinate));
    if (upgraded.accepted > 0) {
        orders.push({ type: "Upgrade", coordinate: entry.coordinate, tier: entry.tier, pass });
    }
}

/**
 * Spends on entries in order until one is unaffordable. The balance is re-read
 * before every entry, so a build/upgrade pair is only started when both fit.
 */
function spendInOrder(
    field: Battlefield,
    ledger: ResourceLedger,
    planEntries: readonly PlanEntry[],
    config: AlgoConfig,
    orders: DefenseOrder[],
    pass?: string,
    upgradeOnly = false,
): SpendOutcome {
    for (const entry of planEntries) {
        const needed = entryCost(entry, config, upgradeOnly);
        if (!ledger.canAfford("structure", needed)) {
            algoLog(`Defense stop at ${coordKey(entry.coordinate)} (${pass ?? entry.tier}): need ${needed}, have ${ledger.read("structure")}`);
            return "exhausted";
        }
        placeEntry(field, ledger, entry, config, orders, pass, upgradeOnly);
    }
    return "spent";
}

/**
 * Walks the placement plan for this turn and returns the orders the engine accepted.
 *
 * Initial entries are rebuilt unconditionally (occupied tiles are engine no-ops).
 * Secondary entries and reinforcement passes are currency gated, and running out
 * ends the whole allocation. A reinforcement pass whose prerequisites are not all
 * standing is skipped for the turn. An upgrade-only pass is gated on the upgrade
 * cost alone; the engine reports an already upgraded structure as zero upgrades.
 */
export function allocateDefense(
    field: Battlefield,
    ledger: ResourceLedger,
    plan: PlacementPlan,
    config: AlgoConfig,
): DefenseOrder[] {
    const orders: DefenseOrder[] = [];

    for (const entry of plan.initial) {
        placeEntry(field, ledger, entry, config, orders);
    }

    if (spendInOrder(field, ledger, plan.secondary, config, orders) === "exhausted") {
        return orders;
    }

    for (const reinforcement of plan.reinforcements) {
        if (!allStanding(field, reinforcement.requires)) {
            algoLog(`Skipping ${reinforcement.name}: prerequisites not standing`);
            continue;
        }
        const outcome = spendInOrder(field, ledger, reinforcement.entries, config, orders, reinforcement.name, reinforcement.upgradeOnly);
        if (outcome === "exhausted") {
            break;
        }
    }

    return orders;
}
