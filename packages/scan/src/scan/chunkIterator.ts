import { ConfigError } from "../errors";
import type { ChunkBoundary } from "../types";

export type ChunkIteratorOptions = {
    chunkDurationMs: number;
    chunkOverlapMs: number;
    totalDurationMs: number;
};

/** Dedup key: boundaries compare equal when their truncated milliseconds match. */
export function chunkKey(chunk: ChunkBoundary): string {
    return `${Math.trunc(chunk.startMs)}:${Math.trunc(chunk.endMs)}`;
}

export function sameChunk(a: ChunkBoundary, b: ChunkBoundary): boolean {
    return chunkKey(a) === chunkKey(b);
}

/**
 * Generates overlapping chunk boundaries inside a search window, never
 * yielding the same boundary twice.
 *
 * The set of emitted boundaries survives across `generate()` calls, so a
 * wider window only yields the chunks a narrower one did not. Call `reset()`
 * to start over.
 */
export class ChunkIterator {
    readonly chunkDurationMs: number;
    readonly chunkOverlapMs: number;
    readonly totalDurationMs: number;
    readonly chunkHopMs: number;

    private readonly emitted = new Set<string>();

    constructor(options: ChunkIteratorOptions) {
        const { chunkDurationMs, chunkOverlapMs, totalDurationMs } = options;
        if (!(chunkDurationMs > 0)) {
            throw new ConfigError("invalid chunking", [`chunkDurationMs must be positive, got ${chunkDurationMs}`]);
        }
        if (!(chunkOverlapMs >= 0) || chunkOverlapMs >= chunkDurationMs) {
            throw new ConfigError("invalid chunking", [
                `chunkOverlapMs (${chunkOverlapMs}) must be in [0, chunkDurationMs (${chunkDurationMs}))`,
            ]);
        }

        this.chunkDurationMs = chunkDurationMs;
        this.chunkOverlapMs = chunkOverlapMs;
        this.totalDurationMs = totalDurationMs;
        this.chunkHopMs = chunkDurationMs - chunkOverlapMs;
    }

    /**
     * Lazily yield unseen chunks starting at `startMs`, one hop apart, while
     * the chunk start is below `endMs`. Chunk ends are clamped to the track.
     */
    *generate(startMs: number, endMs: number): Generator<ChunkBoundary, void, undefined> {
        for (let current = startMs; current < endMs; current += this.chunkHopMs) {
            const chunk: ChunkBoundary = {
                startMs: current,
                endMs: Math.min(current + this.chunkDurationMs, this.totalDurationMs),
            };
            if (chunk.endMs <= chunk.startMs) break;

            const key = chunkKey(chunk);
            if (this.emitted.has(key)) continue;

            this.emitted.add(key);
            yield chunk;
        }
    }

    reset(): void {
        this.emitted.clear();
    }

    /** Distinct boundaries emitted since construction or the last reset. */
    get chunksProcessedCount(): number {
        return this.emitted.size;
    }
}
