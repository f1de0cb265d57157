import { AlgoConfig } from "../config/game-config.js";
import { Battlefield } from "../core/battlefield.js";
import { INITIAL_SPAWN_THRESHOLD, LAUNCH_RISK_TOLERANCE, SPAWN_THRESHOLD_STEPS } from "../core/constants.js";
import { coordKey } from "../core/grid.js";
import { Coordinate, LaunchCandidate, LaunchOrder, LaunchStrategy, MobileRole, StrategyKind } from "../core/types.js";
import { estimatePathRisk } from "./damage-risk.js";
import { algoInfo, algoLog, algoWarn } from "./debug-logging.js";
import { RandomSource, pickRandom } from "./random.js";
import { ResourceLedger } from "./resource-ledger.js";

export type DrawableStrategy = Exclude<StrategyKind, "undecided">;

export const DRAWABLE_STRATEGIES: readonly DrawableStrategy[] = ["hold", "mass-small", "mass-burst", "scrambler-stall"];

const MASS_UNIT: Record<Extract<LaunchStrategy, "mass-small" | "mass-burst">, MobileRole> = {
    "mass-small": "ping",
    "mass-burst": "emp",
};

type ActionResult = {
    status: "completed" | "aborted";
    orders: LaunchOrder[];
};

/** Spawn-currency floor for the next strategy, by turn. Never decreases. */
export function thresholdForTurn(turn: number): number {
    for (const step of SPAWN_THRESHOLD_STEPS) {
        if (turn <= step.maxTurn) return step.threshold;
    }
    return SPAWN_THRESHOLD_STEPS[SPAWN_THRESHOLD_STEPS.length - 1].threshold;
}

export function scoreLaunchPoints(
    field: Battlefield,
    points: readonly Coordinate[],
    config: Pick<AlgoConfig, "turretDamage">,
): LaunchCandidate[] {
    const risks = estimatePathRisk(field, points, config);
    return points.map((coordinate, i) => ({ coordinate, risk: risks[i] }));
}

/** Candidates whose risk is within the tolerance band of the safest one. */
export function acceptableCandidates(candidates: readonly LaunchCandidate[]): LaunchCandidate[] {
    if (candidates.length === 0) return [];
    const minRisk = Math.min(...candidates.map(c => c.risk));
    return candidates.filter(c => c.risk <= LAUNCH_RISK_TOLERANCE * minRisk);
}

export type LaunchSelectorState = {
    strategy: StrategyKind;
    minimumSpawnThreshold: number;
};

/**
 * Decides when and where mobile units go.
 *
 * Keeps a strategy and a spawn-currency threshold for the whole game. When the
 * threshold is met the strategy runs, then a new one is drawn and the threshold
 * is recomputed for the current turn. An aborted launch keeps both for a retry.
 */
export class LaunchSelector {
    private strategy: StrategyKind;
    private threshold: number;

    constructor(
        private readonly config: AlgoConfig,
        private readonly rng: RandomSource,
        initial: Partial<LaunchSelectorState> = {},
    ) {
        this.strategy = initial.strategy ?? "undecided";
        this.threshold = initial.minimumSpawnThreshold ?? INITIAL_SPAWN_THRESHOLD;
    }

    get state(): LaunchSelectorState {
        return { strategy: this.strategy, minimumSpawnThreshold: this.threshold };
    }

    decide(field: Battlefield, ledger: ResourceLedger): LaunchOrder[] {
        const available = ledger.read("spawn");
        if (available < this.threshold) {
            algoLog(`Holding ${this.strategy}: ${available} spawn currency < ${this.threshold}`);
            return [];
        }

        const result = this.execute(field, ledger);
        if (result.status === "aborted") {
            return result.orders;
        }

        this.strategy = pickRandom(this.rng, DRAWABLE_STRATEGIES) ?? "hold";
        this.threshold = thresholdForTurn(field.turnNumber);
        algoInfo(`Next strategy ${this.strategy}, threshold ${this.threshold}`);
        return result.orders;
    }

    private execute(field: Battlefield, ledger: ResourceLedger): ActionResult {
        switch (this.strategy) {
            case "undecided":
            case "hold":
                return { status: "completed", orders: [] };
            case "mass-small":
            case "mass-burst":
                return this.massLaunch(field, ledger, this.strategy);
            case "scrambler-stall":
                return this.scatterInterceptors(field, ledger);
        }
    }

    private massLaunch(field: Battlefield, ledger: ResourceLedger, strategy: "mass-small" | "mass-burst"): ActionResult {
        const role = MASS_UNIT[strategy];
        const unit = this.config.mobileUnits[role];
        const unitCost = this.config.spawnCosts[role];
        if (unitCost <= 0) {
            algoWarn(`Launch aborted: ${role} has no spawn cost configured`);
            return { status: "aborted", orders: [] };
        }

        const open = this.config.launchPoints.filter(point => !field.containsStationaryUnit(point));
        const choice = pickRandom(this.rng, acceptableCandidates(scoreLaunchPoints(field, open, this.config)));
        if (!choice) {
            algoWarn("Launch aborted: every launch point is blocked");
            return { status: "aborted", orders: [] };
        }

        const quantity = Math.floor(ledger.read("spawn") / unitCost);
        if (quantity <= 0) {
            return { status: "aborted", orders: [] };
        }
        if (!field.canSpawn(unit, choice.coordinate, quantity)) {
            algoWarn(`Launch aborted: engine refuses ${quantity}x${unit} at ${coordKey(choice.coordinate)}`);
            return { status: "aborted", orders: [] };
        }

        const spent = ledger.spend("spawn", unitCost, () => field.attemptSpawn(unit, choice.coordinate, quantity));
        if (spent.accepted === 0) {
            algoWarn(`Launch aborted: engine placed nothing at ${coordKey(choice.coordinate)}`);
            return { status: "aborted", orders: [] };
        }

        algoInfo(`Launching ${spent.accepted}x${unit} at ${coordKey(choice.coordinate)} (risk ${choice.risk})`);
        return {
            status: "completed",
            orders: [{ strategy, unit, coordinate: choice.coordinate, quantity: spent.accepted }],
        };
    }

    /** Scatters single interceptors over open edge tiles while currency lasts. */
    private scatterInterceptors(field: Battlefield, ledger: ResourceLedger): ActionResult {
        const unit = this.config.mobileUnits.interceptor;
        const unitCost = this.config.spawnCosts.interceptor;
        if (unitCost <= 0) {
            algoWarn("Stall aborted: interceptor has no spawn cost configured");
            return { status: "aborted", orders: [] };
        }

        const open = field.friendlyEdges().filter(edge => !field.containsStationaryUnit(edge));
        const placed = new Map<string, LaunchOrder>();

        // At most one spawn per interceptor affordable at the start of the stall.
        const maxSpawns = Math.floor(ledger.read("spawn") / unitCost);
        for (let attempt = 0; attempt < maxSpawns && ledger.canAfford("spawn", unitCost); attempt++) {
            const at = pickRandom(this.rng, open);
            if (!at) break;
            // Mobile units stack, so the tile stays available.
            const spent = ledger.spend("spawn", unitCost, () => field.attemptSpawn(unit, at, 1));
            if (spent.accepted === 0) break;

            const key = coordKey(at);
            const existing = placed.get(key);
            if (existing) {
                existing.quantity += spent.accepted;
            } else {
                placed.set(key, { strategy: "scrambler-stall", unit, coordinate: at, quantity: spent.accepted });
            }
        }

        return { status: "completed", orders: [...placed.values()] };
    }
}
