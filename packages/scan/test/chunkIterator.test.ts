import { describe, expect, it } from "vitest";

import { ChunkIterator, ConfigError, sameChunk } from "../src/index";

function make(totalDurationMs = 30000) {
    return new ChunkIterator({ chunkDurationMs: 12000, chunkOverlapMs: 6000, totalDurationMs });
}

describe("ChunkIterator", () => {
    it("steps by duration minus overlap and clamps to the track", () => {
        const chunks = [...make().generate(0, 25000)];
        expect(chunks).toEqual([
            { startMs: 0, endMs: 12000 },
            { startMs: 6000, endMs: 18000 },
            { startMs: 12000, endMs: 24000 },
            { startMs: 18000, endMs: 30000 },
            { startMs: 24000, endMs: 30000 },
        ]);
    });

    it("never yields a boundary twice across calls", () => {
        const chunks = make();
        expect([...chunks.generate(0, 7500)].map((c) => c.startMs)).toEqual([0, 6000]);
        expect([...chunks.generate(0, 25000)].map((c) => c.startMs)).toEqual([12000, 18000, 24000]);
        expect([...chunks.generate(0, 25000)]).toEqual([]);
        expect(chunks.chunksProcessedCount).toBe(5);
    });

    it("reset forgets emitted boundaries", () => {
        const chunks = make();
        expect([...chunks.generate(0, 7500)]).toHaveLength(2);
        chunks.reset();
        expect(chunks.chunksProcessedCount).toBe(0);
        expect([...chunks.generate(0, 7500)]).toHaveLength(2);
    });

    it("is lazy", () => {
        const chunks = make();
        const gen = chunks.generate(0, 25000);
        gen.next();
        expect(chunks.chunksProcessedCount).toBe(1);
    });

    it("stops at the end of the track even inside a wider window", () => {
        const chunks = [...make(10000).generate(0, 40000)];
        expect(chunks).toEqual([
            { startMs: 0, endMs: 10000 },
            { startMs: 6000, endMs: 10000 },
        ]);
    });

    it("compares boundaries by truncated milliseconds", () => {
        expect(sameChunk({ startMs: 1000.2, endMs: 2000.9 }, { startMs: 1000.7, endMs: 2000.1 })).toBe(true);
        expect(sameChunk({ startMs: 1000, endMs: 2000 }, { startMs: 1001, endMs: 2000 })).toBe(false);

        const chunks = new ChunkIterator({ chunkDurationMs: 1000, chunkOverlapMs: 500, totalDurationMs: 10000 });
        expect([...chunks.generate(0.4, 600)]).toHaveLength(2);
        // starts 0.4 and 500.4 truncate to boundaries already seen
        expect([...chunks.generate(0.9, 600)]).toEqual([]);
    });

    it("rejects an overlap that is not shorter than the chunk", () => {
        expect(() => new ChunkIterator({ chunkDurationMs: 1000, chunkOverlapMs: 1000, totalDurationMs: 5000 })).toThrow(
            ConfigError
        );
        expect(() => new ChunkIterator({ chunkDurationMs: 0, chunkOverlapMs: 0, totalDurationMs: 5000 })).toThrow(
            ConfigError
        );
    });
});
