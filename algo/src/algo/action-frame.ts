import { z } from "zod";
import { coord } from "../core/grid.js";
import { Coordinate } from "../core/types.js";

// [location, damage, unit type, unit id, owner flag]
const breachEventSchema = z
    .tuple([z.tuple([z.number().int(), z.number().int()]), z.number(), z.unknown(), z.unknown(), z.number().int()])
    .rest(z.unknown());

const actionFrameSchema = z.object({
    turnInfo: z.array(z.number()).optional(),
    events: z
        .object({
            breach: z.array(z.unknown()).default([]),
        })
        .passthrough()
        .default({}),
});

function describeIssues(issues: z.ZodIssue[]): string {
    return issues.map(i => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`).join("; ");
}

export type BreachEvent = {
    coordinate: Coordinate;
    ownerFlag: number;
};

export type ActionFrame = {
    /** Turn the frame belongs to, when the engine reports it. */
    turn?: number;
    breaches: BreachEvent[];
    /** One message per breach entry that did not match the expected shape. */
    skipped: string[];
};

export type FrameParseResult =
    | { ok: true; frame: ActionFrame }
    | { ok: false; error: string };

/**
 * Parses one raw action frame. Only breach events are extracted; everything else
 * in the frame is ignored. A malformed breach entry is skipped without dropping
 * the rest of the frame.
 */
export function parseActionFrame(raw: string): FrameParseResult {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (err) {
        return { ok: false, error: `frame is not JSON: ${err instanceof Error ? err.message : String(err)}` };
    }

    const parsed = actionFrameSchema.safeParse(json);
    if (!parsed.success) {
        return { ok: false, error: describeIssues(parsed.error.issues) };
    }

    const breaches: BreachEvent[] = [];
    const skipped: string[] = [];
    parsed.data.events.breach.forEach((entry, index) => {
        const event = breachEventSchema.safeParse(entry);
        if (event.success) {
            breaches.push({ coordinate: coord(event.data[0][0], event.data[0][1]), ownerFlag: event.data[4] });
        } else {
            skipped.push(`events.breach.${index}: ${describeIssues(event.error.issues)}`);
        }
    });

    const turnInfo = parsed.data.turnInfo;
    return {
        ok: true,
        frame: {
            turn: turnInfo && turnInfo.length > 1 ? turnInfo[1] : undefined,
            breaches,
            skipped,
        },
    };
}
