import type { AudioBufferLike } from "../types";
import { silentLogger, type Logger } from "../util/log";

export const DEFAULT_CACHE_CAPACITY = 6;

export type CachedVocals = {
    readonly vocals: AudioBufferLike;
    readonly startMs: number;
    readonly endMs: number;
};

type Entry = CachedVocals & { readonly filePath: string };

// Exact bounds, compared the same way `get` compares positions.
function entryKey(filePath: string, startMs: number, endMs: number): string {
    return `${filePath}\u0000${startMs}\u0000${endMs}`;
}

export type VocalsCacheOptions = {
    capacity?: number;
    logger?: Logger;
};

/**
 * Bounded store of isolated-vocal chunks keyed by `(file, startMs, endMs)`.
 *
 * Eviction is by insertion order, not by last access: reading an entry does
 * not protect it. Not safe for concurrent writers; one scan owns it at a time.
 */
export class VocalsCache {
    readonly capacity: number;

    private readonly entries = new Map<string, Entry>();
    private readonly log: Logger;

    constructor(options: VocalsCacheOptions = {}) {
        const capacity = options.capacity ?? DEFAULT_CACHE_CAPACITY;
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`cache capacity must be a positive integer, got ${capacity}`);
        }
        this.capacity = capacity;
        this.log = options.logger ?? silentLogger;
    }

    get size(): number {
        return this.entries.size;
    }

    /** First entry of `filePath` whose range covers `positionMs`, inclusive at both ends. */
    get(filePath: string, positionMs: number): CachedVocals | undefined {
        for (const entry of this.entries.values()) {
            if (entry.filePath === filePath && entry.startMs <= positionMs && positionMs <= entry.endMs) {
                this.log.debug(`hit ${positionMs}ms -> [${entry.startMs}, ${entry.endMs}]`);
                return entry;
            }
        }
        this.log.debug(`miss ${positionMs}ms`);
        return undefined;
    }

    /** Entry stored for exactly this range, if any. */
    peek(filePath: string, startMs: number, endMs: number): CachedVocals | undefined {
        return this.entries.get(entryKey(filePath, startMs, endMs));
    }

    put(filePath: string, startMs: number, endMs: number, vocals: AudioBufferLike): void {
        const key = entryKey(filePath, startMs, endMs);
        // Re-inserting a range replaces it and moves it to the back of the queue.
        this.entries.delete(key);

        while (this.entries.size >= this.capacity) {
            const oldest = this.entries.keys().next();
            if (oldest.done) break;
            const evicted = this.entries.get(oldest.value);
            this.entries.delete(oldest.value);
            if (evicted) this.log.debug(`evict [${evicted.startMs}, ${evicted.endMs}]`);
        }

        this.entries.set(key, { filePath, startMs, endMs, vocals });
    }

    clear(): void {
        this.entries.clear();
    }
}
