import { AlgoOptions, loadAlgoOptions } from "../config/algo-options.js";
import { AlgoConfig, resolveAlgoConfig } from "../config/game-config.js";
import { Battlefield } from "../core/battlefield.js";
import { AlgoLifecycleError } from "../core/errors.js";
import { BreachRecord, DefenseOrder, LaunchOrder, PlacementPlan, TurnReport } from "../core/types.js";
import { parseActionFrame } from "./action-frame.js";
import { BreachTracker } from "./breach-tracker.js";
import { algoInfo, algoLog, algoWarn, setAlgoDebug } from "./debug-logging.js";
import { allocateDefense } from "./defense-allocator.js";
import { LaunchSelector, LaunchSelectorState } from "./launch-selector.js";
import { buildPlacementPlan } from "./placement-plan.js";
import { RandomSource, createRandomSource } from "./random.js";
import { ResourceLedger } from "./resource-ledger.js";

export type AlgoStrategyDeps = {
    options?: AlgoOptions;
    /** Overrides the seeded source built from `options.seed`. */
    rng?: RandomSource;
    plan?: PlacementPlan;
    initialSelectorState?: Partial<LaunchSelectorState>;
};

type GameContext = {
    config: AlgoConfig;
    plan: PlacementPlan;
    selector: LaunchSelector;
    breaches: BreachTracker;
};

function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Entry points for the turn-loop driver: one game start, one call per turn and
 * one call per action frame.
 */
export class AlgoStrategy {
    private game: GameContext | null = null;

    constructor(private readonly deps: AlgoStrategyDeps = {}) {}

    /**
     * Resolves the game configuration and sets up per-game state.
     * @throws AlgoConfigError when the configuration is malformed.
     */
    onGameStart(rawConfig: unknown): AlgoConfig {
        const options = this.deps.options ?? loadAlgoOptions(process.env, ".env");
        setAlgoDebug(options.debug);

        const config = resolveAlgoConfig(rawConfig);
        const rng = this.deps.rng ?? createRandomSource(options.seed);
        if (!this.deps.rng) {
            algoInfo(`Random seed: ${options.seed}${options.seedProvided ? " (from environment)" : ""}`);
        }

        this.game = {
            config,
            plan: this.deps.plan ?? buildPlacementPlan(),
            selector: new LaunchSelector(config, rng, this.deps.initialSelectorState),
            breaches: new BreachTracker(),
        };
        return config;
    }

    onTurn(field: Battlefield): TurnReport {
        const game = this.requireGame("onTurn");
        algoLog(`Performing turn ${field.turnNumber}`);
        game.breaches.setTurn(field.turnNumber);

        const ledger = new ResourceLedger(field);
        const failures: string[] = [];
        let defense: DefenseOrder[] = [];
        let launches: LaunchOrder[] = [];

        // A failing phase costs us that phase, not the turn.
        try {
            defense = allocateDefense(field, ledger, game.plan, game.config);
        } catch (err) {
            algoWarn(`Defense allocation failed on turn ${field.turnNumber}: ${describeError(err)}`);
            failures.push(`defense: ${describeError(err)}`);
        }

        try {
            launches = game.selector.decide(field, ledger);
        } catch (err) {
            algoWarn(`Launch selection failed on turn ${field.turnNumber}: ${describeError(err)}`);
            failures.push(`launch: ${describeError(err)}`);
        }

        field.submitTurn();

        const { strategy, minimumSpawnThreshold } = game.selector.state;
        return {
            turn: field.turnNumber,
            defense,
            launches,
            strategy,
            minimumSpawnThreshold,
            failures,
            discrepancies: ledger.discrepancies.length,
        };
    }

    /**
     * Feeds one raw action frame to the breach tracker.
     * @returns Number of breach records appended.
     */
    onActionFrame(raw: string): number {
        const game = this.requireGame("onActionFrame");
        const result = parseActionFrame(raw);
        if (!result.ok) {
            algoWarn(`Dropping action frame: ${result.error}`);
            return 0;
        }

        for (const problem of result.frame.skipped) {
            algoWarn(`Skipping breach event: ${problem}`);
        }
        if (result.frame.turn !== undefined) {
            game.breaches.setTurn(result.frame.turn);
        }
        let recorded = 0;
        for (const breach of result.frame.breaches) {
            if (game.breaches.onEnemyBreachEvent(breach.coordinate, breach.ownerFlag)) {
                recorded++;
            }
        }
        return recorded;
    }

    get breachHistory(): readonly BreachRecord[] {
        return this.game?.breaches.history ?? [];
    }

    private requireGame(hook: string): GameContext {
        if (!this.game) {
            throw new AlgoLifecycleError(`${hook} called before onGameStart`);
        }
        return this.game;
    }
}
