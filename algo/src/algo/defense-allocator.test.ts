import { beforeAll, describe, expect, it } from "vitest";
import { coord, coordKey } from "../core/grid.js";
import { FakeBattlefield } from "../test/fake-battlefield.js";
import { testConfig } from "../test/fixtures.js";
import { setAlgoDebug } from "./debug-logging.js";
import { allStanding, allocateDefense, entryCost } from "./defense-allocator.js";
import { buildPlacementPlan } from "./placement-plan.js";
import { ResourceLedger } from "./resource-ledger.js";

describe("allocateDefense", () => {
    const config = testConfig();
    const plan = buildPlacementPlan();
    const turretCoords = plan.initial.map(e => e.coordinate);

    beforeAll(() => setAlgoDebug(false));

    function run(field: FakeBattlefield) {
        return allocateDefense(field, new ResourceLedger(field), plan, config);
    }

    it("prices entries as build plus upgrade when an upgrade is required", () => {
        expect(entryCost(plan.initial[0], config)).toBe(3);
        expect(entryCost(plan.secondary[0], config)).toBe(2);
        expect(entryCost(plan.reinforcements[0].entries[0], config)).toBe(4);
        expect(entryCost(plan.reinforcements[3].entries[0], config)).toBe(6);
        expect(entryCost(plan.reinforcements[3].entries[0], config, true)).toBe(3);
    });

    it("stops before the secondary tier when one core is left", () => {
        const field = new FakeBattlefield(config, { structure: 13 });

        const orders = run(field);

        expect(orders).toEqual(turretCoords.map(coordinate => ({ type: "Build", unit: "DF", coordinate, tier: "initial", pass: undefined })));
        expect(field.getResource("structure")).toBe(1);
        expect(field.spawnCalls).toHaveLength(4);
        expect(field.upgradeCalls).toHaveLength(0);
    });

    it("reissues initial builds even when nothing else is affordable", () => {
        const field = new FakeBattlefield(config, {
            structure: 1,
            structures: turretCoords.map(at => ({ at, unit: "DF" })),
        });

        const orders = run(field);

        expect(orders).toEqual([]);
        expect(field.spawnCalls.map(c => coordKey(c.at))).toEqual(["3,12", "24,12", "13,3", "14,3"]);
        expect(field.spawnCalls.every(c => c.placed === 0)).toBe(true);
    });

    it("never starts a pair it cannot finish", () => {
        const costByKey = new Map<string, number>();
        const building = plan.reinforcements.filter(p => !p.upgradeOnly);
        for (const entry of [...plan.secondary, ...building.flatMap(p => p.entries)]) {
            costByKey.set(coordKey(entry.coordinate), entryCost(entry, config));
        }

        for (let structure = 0; structure <= 100; structure++) {
            const field = new FakeBattlefield(config, { structure });
            run(field);
            for (const call of field.spawnCalls.slice(plan.initial.length)) {
                expect(call.balanceBefore).toBeGreaterThanOrEqual(costByKey.get(coordKey(call.at)) ?? Number.POSITIVE_INFINITY);
            }
        }
    });

    it("builds and upgrades the whole plan when currency allows", () => {
        const field = new FakeBattlefield(config, { structure: 1000 });

        const orders = run(field);

        expect(orders).toHaveLength(60);
        expect(field.getResource("structure")).toBe(910);
        expect(orders.slice(4, 6)).toEqual([
            { type: "Build", unit: "FF", coordinate: coord(5, 11), tier: "secondary", pass: undefined },
            { type: "Upgrade", coordinate: coord(5, 11), tier: "secondary", pass: undefined },
        ]);
        const turretUpgrades = orders.filter(o => o.pass === "turret-upgrades");
        expect(turretUpgrades.map(o => o.type)).toEqual(["Upgrade", "Upgrade", "Upgrade", "Upgrade"]);
        expect(turretCoords.every(c => field.isUpgraded(c))).toBe(true);
        expect(orders.filter(o => o.pass === "second-line")).toHaveLength(22);
    });

    it("issues nothing on a board that is already complete", () => {
        const field = new FakeBattlefield(config, { structure: 1000 });
        run(field);
        const balance = field.getResource("structure");

        expect(() => run(field)).not.toThrow();
        expect(run(field)).toEqual([]);
        expect(field.getResource("structure")).toBe(balance);
    });

    it("skips passes whose prerequisites are not standing", () => {
        const field = new FakeBattlefield(config, { structure: 1000, rejected: [coord(24, 12)] });

        const orders = run(field);

        const passes = new Set(orders.map(o => o.pass).filter(p => p !== undefined));
        expect([...passes]).toEqual(["support", "second-line"]);
        expect(allStanding(field, plan.reinforcements[0].requires)).toBe(true);
        expect(allStanding(field, plan.reinforcements[1].requires)).toBe(false);
    });

    it("ends every later pass once a reinforcement runs dry", () => {
        // 12 turrets + 24 barrier pairs + one support, with 3 left over.
        const field = new FakeBattlefield(config, { structure: 43 });

        const orders = run(field);

        const last = orders[orders.length - 1];
        expect(last).toEqual({ type: "Build", unit: "EF", coordinate: coord(11, 4), tier: "tertiary", pass: "support" });
        expect(orders.some(o => o.pass === "corner-reinforcements")).toBe(false);
        expect(field.getResource("structure")).toBe(3);
    });

    function standingLayers(turretsUpgraded: boolean) {
        const building = plan.reinforcements.filter(p => !p.upgradeOnly);
        return [
            ...plan.initial.map(e => ({ at: e.coordinate, unit: "DF", upgraded: turretsUpgraded })),
            ...[...plan.secondary, ...building.flatMap(p => p.entries)].map(e => ({
                at: e.coordinate,
                unit: config.structureUnits[e.role],
                upgraded: e.requiresUpgrade,
            })),
        ];
    }

    it("reaches the support pass once the turret layer is finished", () => {
        const layers = standingLayers(true).slice(0, plan.initial.length + plan.secondary.length);
        const field = new FakeBattlefield(config, { structure: 5, structures: layers });

        const orders = run(field);

        expect(orders).toEqual([{ type: "Build", unit: "EF", coordinate: coord(11, 4), tier: "tertiary", pass: "support" }]);
        expect(field.getResource("structure")).toBe(1);
    });

    it("upgrades turrets with whatever is left after the other passes", () => {
        const field = new FakeBattlefield(config, { structure: 7, structures: standingLayers(false) });

        const orders = run(field);

        expect(orders).toEqual([
            { type: "Upgrade", coordinate: coord(3, 12), tier: "tertiary", pass: "turret-upgrades" },
            { type: "Upgrade", coordinate: coord(24, 12), tier: "tertiary", pass: "turret-upgrades" },
        ]);
        expect(field.getResource("structure")).toBe(1);
        expect(field.spawnCalls.filter(c => c.placed > 0)).toEqual([]);
    });
});
