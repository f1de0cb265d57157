import { BOARD_SIZE, HALF_BOARD, PROTECTED_CORRIDOR } from "./constants.js";
import { Coordinate } from "./types.js";

export function coord(x: number, y: number): Coordinate {
    return Object.freeze({ x, y });
}

/**
 * Converts a coordinate to a string key "x,y".
 * @param c - The coordinate.
 */
export function coordKey(c: Coordinate): string {
    return `${c.x},${c.y}`;
}

/**
 * Inclusive column span of a board row. The board is a diamond: row 0 and row 27
 * are two tiles wide, rows 13 and 14 span the full width.
 */
export function rowSpan(y: number): { minX: number; maxX: number } {
    if (y < HALF_BOARD) {
        return { minX: HALF_BOARD - 1 - y, maxX: HALF_BOARD + y };
    }
    const fromTop = BOARD_SIZE - 1 - y;
    return { minX: HALF_BOARD - 1 - fromTop, maxX: HALF_BOARD + fromTop };
}

export function isOnBoard(c: Coordinate): boolean {
    if (!Number.isInteger(c.x) || !Number.isInteger(c.y)) return false;
    if (c.y < 0 || c.y >= BOARD_SIZE) return false;
    const span = rowSpan(c.y);
    return c.x >= span.minX && c.x <= span.maxX;
}

/**
 * Reflects a coordinate across the vertical centerline, then shifts the reflection
 * one column toward the center.
 */
export function mirrorInward(c: Coordinate): Coordinate {
    const mirroredX = BOARD_SIZE - 1 - c.x;
    const towardCenter = mirroredX >= HALF_BOARD ? -1 : 1;
    return coord(mirroredX + towardCenter, c.y);
}

export function inProtectedCorridor(c: Coordinate): boolean {
    return c.x >= PROTECTED_CORRIDOR.minX && c.x <= PROTECTED_CORRIDOR.maxX;
}

/** Drops repeated coordinates, keeping the first occurrence. */
export function uniqueCoords(coords: Iterable<Coordinate>): Coordinate[] {
    const seen = new Set<string>();
    const out: Coordinate[] = [];
    for (const c of coords) {
        const key = coordKey(c);
        if (seen.has(key)) continue;
        seen.add(key);
        out.push(c);
    }
    return out;
}
