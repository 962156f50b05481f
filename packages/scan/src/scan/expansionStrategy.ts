import type { SearchWindow } from "../types";

export type ExpansionStrategyOptions = {
    initialRadiusMs: number;
    radiusIncrementMs: number;
    maxExpansions: number;
    totalDurationMs: number;
};

/**
 * Expanding search windows around an expected onset.
 *
 * Window `i` has radius `initialRadiusMs + i * radiusIncrementMs` and ends at
 * `expected + radius`. Windows after the first start at `expected - radius`;
 * the first one always starts at 0 so vocals that begin immediately are
 * reachable on the cheapest pass, whatever the expected position says. Both
 * bounds are clamped to the track.
 */
export class ExpansionStrategy {
    readonly initialRadiusMs: number;
    readonly radiusIncrementMs: number;
    readonly maxExpansions: number;
    readonly totalDurationMs: number;

    constructor(options: ExpansionStrategyOptions) {
        this.initialRadiusMs = options.initialRadiusMs;
        this.radiusIncrementMs = options.radiusIncrementMs;
        this.maxExpansions = options.maxExpansions;
        this.totalDurationMs = options.totalDurationMs;
    }

    /** `maxExpansions + 1` windows, widest last. */
    windows(expectedMs: number): readonly SearchWindow[] {
        const windows: SearchWindow[] = [];
        for (let i = 0; i <= this.maxExpansions; i++) {
            windows.push(this.window(expectedMs, i));
        }
        return windows;
    }

    window(expectedMs: number, expansionIndex: number): SearchWindow {
        const radiusMs = this.initialRadiusMs + expansionIndex * this.radiusIncrementMs;
        const startMs =
            expansionIndex === 0 ? 0 : Math.min(this.totalDurationMs, Math.max(0, expectedMs - radiusMs));
        const endMs = Math.max(startMs, Math.min(this.totalDurationMs, expectedMs + radiusMs));
        return { startMs, endMs, radiusMs, expansionIndex };
    }

    shouldContinue(expansionIndex: number, found: boolean): boolean {
        if (found) return false;
        return expansionIndex < this.maxExpansions;
    }
}
