import { nanoid } from "nanoid";

import type { AudioChunkLoader } from "../audio/types";
import type { VocalsCache } from "../cache/vocalsCache";
import { resolveScanConfig, type ScanConfigInput } from "../config";
import { mergePeriods } from "../dsp/energy";
import { AudioLoadError, CancelledError, ConfigError, SeparationError, errorMessage } from "../errors";
import type { VocalSeparator } from "../separation/types";
import type { AudioInfo, CancellationCheck, DetectionOutcome, Period } from "../types";
import { createLogger, type Logger } from "../util/log";
import { ChunkIterator } from "./chunkIterator";
import { ChunkProcessor } from "./chunkProcessor";
import { ExpansionStrategy } from "./expansionStrategy";

/** Onsets closer than this to an earlier candidate are the same onset seen through an overlapping chunk. */
export const DUPLICATE_CANDIDATE_MS = 1000;

export type ScanOptions = {
    loader: AudioChunkLoader;
    separator: VocalSeparator;
    /** Shared with the confidence pass for the same song. */
    cache: VocalsCache;
    config?: ScanConfigInput;
    isCancelled?: CancellationCheck;
    logger?: Logger;
};

type Candidate = {
    onsetMs: number;
    distanceMs: number;
};

export function assertExpectedGap(expectedGapMs: number): void {
    if (!Number.isFinite(expectedGapMs) || expectedGapMs < 0) {
        throw new ConfigError("invalid expected gap", [`expectedGapMs must be a non-negative number, got ${expectedGapMs}`]);
    }
}

export async function probeAudio(loader: AudioChunkLoader, filePath: string): Promise<AudioInfo> {
    try {
        return await loader.probe(filePath);
    } catch (err) {
        if (err instanceof AudioLoadError) throw err;
        throw new AudioLoadError(filePath, `cannot open audio: ${errorMessage(err)}`, { cause: err });
    }
}

/**
 * Find where vocals start in `filePath`, searching expanding windows around
 * `expectedGapMs`.
 *
 * Chunks are processed one at a time in ascending order within a window, and
 * never twice across windows. A chunk whose load or separation fails is
 * skipped; only a file that cannot be opened at all, or an invalid config,
 * rejects. Cancellation resolves with whatever was found so far.
 */
export async function scanForOnset(
    filePath: string,
    expectedGapMs: number,
    options: ScanOptions
): Promise<DetectionOutcome> {
    const config = resolveScanConfig(options.config);
    assertExpectedGap(expectedGapMs);

    const log = (options.logger ?? createLogger("scan", config.logLevel)).child(nanoid(8));
    const isCancelled = options.isCancelled ?? (() => false);

    const info = await probeAudio(options.loader, filePath);
    log.info(`scanning ${filePath}: expected=${expectedGapMs}ms duration=${Math.round(info.durationMs)}ms`);

    const iterator = new ChunkIterator({
        chunkDurationMs: config.chunkDurationMs,
        chunkOverlapMs: config.chunkOverlapMs,
        totalDurationMs: info.durationMs,
    });
    const strategy = new ExpansionStrategy({
        initialRadiusMs: config.initialRadiusMs,
        radiusIncrementMs: config.radiusIncrementMs,
        maxExpansions: config.maxExpansions,
        totalDurationMs: info.durationMs,
    });
    const processor = new ChunkProcessor({
        loader: options.loader,
        separator: options.separator,
        cache: options.cache,
        config,
        isCancelled,
        logger: log,
    });

    const candidates: number[] = [];
    const voiced: Period[] = [];
    let best: Candidate | null = null;
    let cancelled = false;
    let earlyStop = false;
    let expansionReached = 0;

    for (let index = 0; index <= config.maxExpansions; index++) {
        const window = strategy.window(expectedGapMs, index);
        expansionReached = index;
        log.debug(`expansion ${index}: [${window.startMs}, ${window.endMs}] radius=${window.radiusMs}ms`);

        for (const chunk of iterator.generate(window.startMs, window.endMs)) {
            if (isCancelled()) {
                cancelled = true;
                break;
            }
            log.debug(`chunk #${iterator.chunksProcessedCount} [${chunk.startMs}, ${chunk.endMs}] (expansion ${index})`);

            let onsetMs: number | null;
            try {
                const { analysis } = await processor.process(filePath, info, chunk);
                voiced.push(...analysis.voicedPeriods);
                onsetMs = analysis.onsetMs;
            } catch (err) {
                if (err instanceof CancelledError) {
                    cancelled = true;
                    break;
                }
                if ((err instanceof AudioLoadError && !err.fatal) || err instanceof SeparationError) {
                    log.warn(`skipping chunk [${chunk.startMs}, ${chunk.endMs}]: ${err.message}`);
                    continue;
                }
                throw err;
            }

            if (onsetMs === null) continue;
            const onset = onsetMs;
            if (candidates.some((c) => Math.abs(c - onset) < DUPLICATE_CANDIDATE_MS)) {
                log.debug(`ignoring duplicate candidate ${onset}ms`);
                continue;
            }

            const distanceMs = Math.abs(onset - expectedGapMs);
            candidates.push(onset);
            log.info(`candidate ${onset}ms (distance ${distanceMs}ms)`);
            if (!best || distanceMs < best.distanceMs) best = { onsetMs: onset, distanceMs };

            if (distanceMs <= config.earlyStopToleranceMs) {
                log.info(`early stop: ${onset}ms within ${config.earlyStopToleranceMs}ms of expected`);
                earlyStop = true;
                break;
            }
        }

        if (cancelled || earlyStop) break;
        if (!strategy.shouldContinue(index, best !== null)) break;
    }

    const onsetMs = best ? best.onsetMs : null;
    const outcome: DetectionOutcome = {
        status: cancelled ? "cancelled" : onsetMs !== null ? "found" : "not-found",
        onsetMs,
        voicedPeriods: mergePeriods(voiced),
        silencePeriods: onsetMs !== null && onsetMs > 0 ? [[0, onsetMs]] : [],
        chunksProcessed: iterator.chunksProcessedCount,
        expansionReached,
        candidates,
    };

    log.info(
        `${outcome.status}: onset=${onsetMs ?? "none"} chunks=${outcome.chunksProcessed} expansion=${expansionReached}`
    );
    return outcome;
}
