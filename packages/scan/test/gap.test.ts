import { describe, expect, it } from "vitest";

import {
    ConfigError,
    VocalEnergyProvider,
    detectGap,
    detectGapFromSilence,
    silentLogger,
    snrToConfidence,
    validateGapRequest,
} from "../src/index";
import { IdentitySeparator, MemoryLoader, buildSignal } from "./support";

const FILE = "song.wav";

function provider(segments: Parameters<typeof buildSignal>[1] = [], durationMs = 30000) {
    const loader = new MemoryLoader().add(FILE, buildSignal(durationMs, segments));
    const separator = new IdentitySeparator();
    return {
        loader,
        separator,
        provider: new VocalEnergyProvider({ loader, separator, logger: silentLogger }),
    };
}

describe("detectGapFromSilence", () => {
    it("picks the silence end closest to the expected gap", () => {
        expect(
            detectGapFromSilence(
                [
                    [0, 1000],
                    [5000, 6000],
                ],
                5500
            )
        ).toBe(6000);
        expect(detectGapFromSilence([[0, 44980]], 10000)).toBe(44980);
    });

    it("keeps the first of equally close boundaries", () => {
        expect(
            detectGapFromSilence(
                [
                    [0, 1000],
                    [0, 2000],
                ],
                1500
            )
        ).toBe(1000);
    });

    it("returns zero without silence", () => {
        expect(detectGapFromSilence([], 12000)).toBe(0);
    });
});

describe("validateGapRequest", () => {
    it("lists every problem", () => {
        expect(() => validateGapRequest({ filePath: " ", expectedGapMs: -5 })).toThrow(
            new ConfigError("invalid gap request", [
                "filePath must not be empty",
                "expectedGapMs must be a non-negative number, got -5",
            ])
        );
    });
});

describe("detectGap", () => {
    it("detects, rounds and scores the gap", async () => {
        const { provider: p, separator } = provider([{ startMs: 8000, endMs: 12000 }]);
        const result = await detectGap({ filePath: FILE, expectedGapMs: 8000 }, p);

        expect(result.method).toBe("vocal-energy");
        expect(result.status).toBe("found");
        expect(result.gapMs).toBe(7980);
        // the confidence pass reuses the cached scan chunk
        expect(result.confidence).toBeCloseTo(snrToConfidence(20), 10);
        expect(result.needsReview).toBe(false);
        expect(result.outcome.silencePeriods).toEqual([[0, 7980]]);
        expect(separator.calls).toHaveLength(1);
    });

    it("flags results below the confidence threshold", async () => {
        const { provider: p } = provider([{ startMs: 8000, endMs: 12000 }]);
        const result = await detectGap({ filePath: FILE, expectedGapMs: 8000 }, p, { confidenceThreshold: 0.9 });
        expect(result.needsReview).toBe(true);
    });

    it("flags songs where nothing was found", async () => {
        const { provider: p } = provider();
        const result = await detectGap({ filePath: FILE, expectedGapMs: 8000 }, p);

        expect(result.status).toBe("not-found");
        expect(result.gapMs).toBe(0);
        expect(result.needsReview).toBe(true);
    });

    it("skips confidence when cancelled", async () => {
        const { provider: p, separator } = provider([{ startMs: 8000, endMs: 12000 }]);
        const result = await detectGap({ filePath: FILE, expectedGapMs: 8000, isCancelled: () => true }, p);

        expect(result.status).toBe("cancelled");
        expect(result.confidence).toBeNull();
        expect(result.needsReview).toBe(true);
        expect(separator.calls).toHaveLength(0);
    });

    it("rejects invalid requests before scanning", async () => {
        const { provider: p, loader } = provider();
        await expect(detectGap({ filePath: "", expectedGapMs: 0 }, p)).rejects.toThrow(ConfigError);
        expect(loader.loads).toHaveLength(0);
    });
});

describe("VocalEnergyProvider", () => {
    it("isolates a preview around a position and serves repeats from its cache", async () => {
        const { provider: p, separator, loader } = provider([{ startMs: 8000, endMs: 12000 }]);

        const vocals = await p.getVocals(FILE, 5000);
        expect(vocals.startMs).toBe(2000);
        expect(vocals.endMs).toBe(14000);
        expect(loader.loads).toEqual([{ startFrame: 16000, frameCount: 96000 }]);

        const again = await p.getVocals(FILE, 6000);
        expect(again.vocals).toBe(vocals.vocals);
        expect(separator.calls).toHaveLength(1);
    });

    it("clearCache forgets every separation", async () => {
        const { provider: p } = provider([{ startMs: 8000, endMs: 12000 }]);
        await p.detectSilencePeriods(FILE, 8000);
        expect(p.cache.size).toBe(1);
        p.clearCache();
        expect(p.cache.size).toBe(0);
    });

    it("validates its config up front", () => {
        const loader = new MemoryLoader();
        expect(
            () =>
                new VocalEnergyProvider({
                    loader,
                    separator: new IdentitySeparator(),
                    config: { confidenceThreshold: 2 },
                })
        ).toThrow(ConfigError);
    });
});
