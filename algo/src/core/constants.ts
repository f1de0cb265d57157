/** Width and height of the diamond board. */
export const BOARD_SIZE = 28;
/** Rows 0..13 belong to us, 14..27 to the opponent. */
export const HALF_BOARD = BOARD_SIZE / 2;

/** Columns kept clear of structures so our mobile units always have a lane. */
export const PROTECTED_CORRIDOR = { minX: 12, maxX: 15 } as const;

/** A launch point stays eligible while its risk is within this multiple of the safest one. */
export const LAUNCH_RISK_TOLERANCE = 1.5;

/** Spawn-currency floor before the first strategy executes. */
export const INITIAL_SPAWN_THRESHOLD = 5;

/**
 * Step function for the launch threshold, checked in order.
 * The last step has no upper bound.
 */
export const SPAWN_THRESHOLD_STEPS: ReadonlyArray<{ maxTurn: number; threshold: number }> = [
    { maxTurn: 5, threshold: 5 },
    { maxTurn: 9, threshold: 10 },
    { maxTurn: 15, threshold: 15 },
    { maxTurn: Number.POSITIVE_INFINITY, threshold: 20 },
];

/** Largest ledger drift (engine vs prediction) that is not worth a warning. */
export const ACCOUNTING_TOLERANCE = 0.05;

/** Raw action-frame owner flag for our own units. The opponent is 2. */
export const FRAME_OWNER_SELF = 1;
export const FRAME_OWNER_OPPONENT = 2;
