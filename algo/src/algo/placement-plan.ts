import { coord, inProtectedCorridor, mirrorInward, uniqueCoords } from "../core/grid.js";
import { Coordinate, PlacementPlan, PlanEntry, PlanTier, ReinforcementPass, StructureRole } from "../core/types.js";

type Pair = readonly [number, number];

const TURRET_GOALS: Pair[] = [[3, 12], [24, 12], [13, 3], [14, 3]];

// Diagonal funnel, left and right arms interleaved so both sides grow evenly.
const BARRIER_GOALS: Pair[] = [
    [5, 11], [22, 11],
    [6, 10], [21, 10],
    [7, 9], [20, 9],
    [8, 8], [19, 8],
    [9, 7], [18, 7],
    [10, 6], [17, 6],
];

const SUPPORT_GOALS: Pair[] = [[11, 4], [16, 4]];

// Left-side bases; the right side comes from mirrorInward.
const CORNER_BASES: Pair[] = [[1, 12], [2, 11]];
const SECOND_LINE_BASES: Pair[] = [[6, 11], [7, 10], [8, 9], [9, 8], [10, 7], [11, 6], [12, 5]];

function toCoords(pairs: readonly Pair[]): Coordinate[] {
    return pairs.map(([x, y]) => coord(x, y));
}

function entries(coords: readonly Coordinate[], role: StructureRole, tier: PlanTier, requiresUpgrade: boolean): PlanEntry[] {
    return coords.map(coordinate => Object.freeze({ coordinate, role, tier, requiresUpgrade }));
}

/**
 * Pairs each base coordinate with its inward mirror, in base order, then removes
 * anything inside the protected corridor.
 */
export function mirroredCoordinates(bases: readonly Coordinate[]): Coordinate[] {
    const paired = bases.flatMap(base => [base, mirrorInward(base)]);
    return uniqueCoords(paired.filter(c => !inProtectedCorridor(c)));
}

function pass(name: string, requires: readonly Coordinate[], passEntries: PlanEntry[], upgradeOnly = false): ReinforcementPass {
    return Object.freeze({
        name,
        requires: Object.freeze([...requires]),
        entries: Object.freeze(passEntries),
        upgradeOnly,
    });
}

/**
 * The static build plan for one game.
 *
 * Turrets first, then the upgraded barrier funnel, then reinforcement passes that
 * each wait on an earlier layer being fully standing. Turret upgrades take
 * whatever is left at the end.
 */
export function buildPlacementPlan(): PlacementPlan {
    const turrets = toCoords(TURRET_GOALS);
    const barriers = toCoords(BARRIER_GOALS);

    return Object.freeze({
        initial: Object.freeze(entries(turrets, "reinforced-barrier", "initial", false)),
        secondary: Object.freeze(entries(barriers, "barrier", "secondary", true)),
        reinforcements: Object.freeze([
            pass("support", barriers, entries(toCoords(SUPPORT_GOALS), "support", "tertiary", false)),
            pass("corner-reinforcements", turrets, entries(mirroredCoordinates(toCoords(CORNER_BASES)), "reinforced-barrier", "tertiary", false)),
            pass("second-line", barriers, entries(mirroredCoordinates(toCoords(SECOND_LINE_BASES)), "barrier", "tertiary", true)),
            pass("turret-upgrades", turrets, entries(turrets, "reinforced-barrier", "tertiary", true), true),
        ]),
    });
}
