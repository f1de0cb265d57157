import { z } from "zod";
import { AlgoConfigError } from "../core/errors.js";
import { coord, coordKey, isOnBoard } from "../core/grid.js";
import { Coordinate, MobileRole, StructureRole, UnitTypeId } from "../core/types.js";

const unitInformationSchema = z.object({
    shorthand: z.string().min(1),
    cost1: z.number().nonnegative().default(0),
    cost2: z.number().nonnegative().default(0),
    attackDamage: z.number().nonnegative().optional(),
    upgrade: z
        .object({
            cost1: z.number().nonnegative().default(0),
        })
        .optional(),
});

const coordinatePairSchema = z.tuple([z.number().int(), z.number().int()]);

export const gameConfigSchema = z.object({
    // Fixed engine order: barrier, support, turret, ping, emp, interceptor.
    unitInformation: z.array(unitInformationSchema).min(6),
    algo: z
        .object({
            launchPoints: z.array(coordinatePairSchema).min(1).optional(),
        })
        .optional(),
});

export type RawGameConfig = z.input<typeof gameConfigSchema>;

export type StructureCost = Readonly<{ build: number; upgrade: number }>;

export type AlgoConfig = Readonly<{
    structureUnits: Readonly<Record<StructureRole, UnitTypeId>>;
    mobileUnits: Readonly<Record<MobileRole, UnitTypeId>>;
    structureCosts: Readonly<Record<StructureRole, StructureCost>>;
    spawnCosts: Readonly<Record<MobileRole, number>>;
    /** Per-hit damage of the enemy turret, the representative path threat. */
    turretDamage: number;
    /** Fixed set of coordinates considered for mass launches. */
    launchPoints: readonly Coordinate[];
}>;

/** Edge tiles spread along both bottom edges, center first. */
export const DEFAULT_LAUNCH_POINTS: readonly Coordinate[] = [
    coord(13, 0),
    coord(14, 0),
    coord(6, 7),
    coord(21, 7),
    coord(3, 10),
    coord(24, 10),
];

/**
 * Validates the engine's startup configuration and resolves it into the immutable
 * config every component receives.
 * @throws AlgoConfigError when the payload is malformed.
 */
export function resolveAlgoConfig(raw: unknown): AlgoConfig {
    const parsed = gameConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
        throw new AlgoConfigError("Invalid game configuration", issues);
    }

    const [barrier, support, turret, ping, emp, interceptor] = parsed.data.unitInformation;
    if (turret.attackDamage === undefined) {
        throw new AlgoConfigError("Invalid game configuration", ["unitInformation.2.attackDamage: turret damage is required"]);
    }

    const launchPoints = parsed.data.algo?.launchPoints
        ? parsed.data.algo.launchPoints.map(([x, y]) => coord(x, y))
        : DEFAULT_LAUNCH_POINTS;
    const offBoard = launchPoints.filter(point => !isOnBoard(point));
    if (offBoard.length > 0) {
        throw new AlgoConfigError(
            "Invalid game configuration",
            offBoard.map(point => `algo.launchPoints: ${coordKey(point)} is off the board`),
        );
    }

    return Object.freeze({
        structureUnits: Object.freeze({
            "barrier": barrier.shorthand,
            "reinforced-barrier": turret.shorthand,
            "support": support.shorthand,
        }),
        mobileUnits: Object.freeze({
            ping: ping.shorthand,
            emp: emp.shorthand,
            interceptor: interceptor.shorthand,
        }),
        structureCosts: Object.freeze({
            "barrier": Object.freeze({ build: barrier.cost1, upgrade: barrier.upgrade?.cost1 ?? 0 }),
            "reinforced-barrier": Object.freeze({ build: turret.cost1, upgrade: turret.upgrade?.cost1 ?? 0 }),
            "support": Object.freeze({ build: support.cost1, upgrade: support.upgrade?.cost1 ?? 0 }),
        }),
        spawnCosts: Object.freeze({
            ping: ping.cost2,
            emp: emp.cost2,
            interceptor: interceptor.cost2,
        }),
        turretDamage: turret.attackDamage,
        launchPoints: Object.freeze([...launchPoints]),
    });
}
