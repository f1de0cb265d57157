export * from "./core/types.js";
export * from "./core/constants.js";
export * from "./core/grid.js";
export * from "./core/errors.js";
export type { Battlefield } from "./core/battlefield.js";
export * from "./config/game-config.js";
export * from "./config/algo-options.js";
export * from "./algo/debug-logging.js";
export * from "./algo/random.js";
export * from "./algo/resource-ledger.js";
export * from "./algo/placement-plan.js";
export * from "./algo/defense-allocator.js";
export * from "./algo/damage-risk.js";
export * from "./algo/launch-selector.js";
export * from "./algo/action-frame.js";
export * from "./algo/breach-tracker.js";
export * from "./algo/algo-strategy.js";
