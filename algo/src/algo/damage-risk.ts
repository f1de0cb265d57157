import { AlgoConfig } from "../config/game-config.js";
import { Battlefield } from "../core/battlefield.js";
import { Coordinate } from "../core/types.js";

/**
 * Damage a unit launched at `start` would soak on its way to the far edge:
 * for every tile of the route, enemy turrets in range times turret damage.
 * Long routes score higher; there is no decay or cap.
 */
export function routeRisk(field: Battlefield, start: Coordinate, config: Pick<AlgoConfig, "turretDamage">): number {
    // The path is single pass; take it all before querying the board.
    const route = Array.from(field.findPathToEdge(start));
    let risk = 0;
    for (const tile of route) {
        risk += field.getAttackers(tile, "enemy") * config.turretDamage;
    }
    return risk;
}

/** One risk score per candidate, in input order. */
export function estimatePathRisk(
    field: Battlefield,
    candidates: readonly Coordinate[],
    config: Pick<AlgoConfig, "turretDamage">,
): number[] {
    return candidates.map(candidate => routeRisk(field, candidate, config));
}
