import { describe, expect, it } from "vitest";

import { ExpansionStrategy } from "../src/index";

function make(overrides: Partial<ConstructorParameters<typeof ExpansionStrategy>[0]> = {}) {
    return new ExpansionStrategy({
        initialRadiusMs: 7500,
        radiusIncrementMs: 7500,
        maxExpansions: 3,
        totalDurationMs: 180000,
        ...overrides,
    });
}

describe("ExpansionStrategy", () => {
    it("produces maxExpansions + 1 windows centred on the expected gap", () => {
        expect(make().windows(40000)).toEqual([
            { startMs: 0, endMs: 47500, radiusMs: 7500, expansionIndex: 0 },
            { startMs: 25000, endMs: 55000, radiusMs: 15000, expansionIndex: 1 },
            { startMs: 17500, endMs: 62500, radiusMs: 22500, expansionIndex: 2 },
            { startMs: 10000, endMs: 70000, radiusMs: 30000, expansionIndex: 3 },
        ]);
    });

    it("always starts the first window at zero", () => {
        for (const expected of [1, 5000, 60000, 179000]) {
            expect(make().windows(expected)[0]?.startMs).toBe(0);
        }
    });

    it("grows the radius monotonically", () => {
        const radii = make().windows(10000).map((w) => w.radiusMs);
        for (let i = 1; i < radii.length; i++) {
            expect(radii[i] ?? 0).toBeGreaterThan(radii[i - 1] ?? 0);
        }

        const flat = make({ radiusIncrementMs: 0 }).windows(10000).map((w) => w.radiusMs);
        expect(flat).toEqual([7500, 7500, 7500, 7500]);
    });

    it("clamps windows to the track", () => {
        const windows = make({ totalDurationMs: 20000 }).windows(15000);
        for (const w of windows) {
            expect(w.startMs).toBeGreaterThanOrEqual(0);
            expect(w.endMs).toBeLessThanOrEqual(20000);
            expect(w.startMs).toBeLessThanOrEqual(w.endMs);
        }
        expect(windows[3]).toEqual({ startMs: 0, endMs: 20000, radiusMs: 30000, expansionIndex: 3 });
    });

    it("keeps windows inside the track when the expected gap lies past its end", () => {
        const windows = make({ totalDurationMs: 30000 }).windows(100000);
        for (const w of windows) {
            expect(w.startMs).toBeGreaterThanOrEqual(0);
            expect(w.endMs).toBeLessThanOrEqual(30000);
            expect(w.startMs).toBeLessThanOrEqual(w.endMs);
        }
        expect(windows[0]).toEqual({ startMs: 0, endMs: 30000, radiusMs: 7500, expansionIndex: 0 });
        expect(windows[1]).toEqual({ startMs: 30000, endMs: 30000, radiusMs: 15000, expansionIndex: 1 });
        expect(windows[3]).toEqual({ startMs: 30000, endMs: 30000, radiusMs: 30000, expansionIndex: 3 });
    });

    it("continues only while nothing was found and expansions remain", () => {
        const s = make();
        expect(s.shouldContinue(0, false)).toBe(true);
        expect(s.shouldContinue(2, false)).toBe(true);
        expect(s.shouldContinue(3, false)).toBe(false);
        expect(s.shouldContinue(0, true)).toBe(false);
    });
});
