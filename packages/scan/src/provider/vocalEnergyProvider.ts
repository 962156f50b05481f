import type { AudioChunkLoader } from "../audio/types";
import { VocalsCache, type CachedVocals } from "../cache/vocalsCache";
import { computeConfidence } from "../confidence/confidenceScorer";
import { resolveScanConfig, type ScanConfig, type ScanConfigInput } from "../config";
import { ChunkProcessor } from "../scan/chunkProcessor";
import { assertExpectedGap, probeAudio, scanForOnset } from "../scan/scanForOnset";
import type { VocalSeparator } from "../separation/types";
import type { DetectionOutcome } from "../types";
import { createLogger, type Logger } from "../util/log";
import type { DetectionProvider, ProviderCallOptions } from "./types";

export type VocalEnergyProviderOptions = {
    loader: AudioChunkLoader;
    separator: VocalSeparator;
    config?: ScanConfigInput;
    /** Defaults to a fresh cache of default capacity. */
    cache?: VocalsCache;
    logger?: Logger;
};

/**
 * Vocal separation plus frame-energy onset detection.
 *
 * Owns one `VocalsCache` shared by detection and confidence scoring for the
 * song being processed; call `clearCache()` before moving to another song.
 */
export class VocalEnergyProvider implements DetectionProvider {
    readonly config: ScanConfig;
    readonly cache: VocalsCache;

    private readonly loader: AudioChunkLoader;
    private readonly separator: VocalSeparator;
    private readonly log: Logger;

    constructor(options: VocalEnergyProviderOptions) {
        this.config = resolveScanConfig(options.config);
        this.log = options.logger ?? createLogger("vocal-energy", this.config.logLevel);
        this.cache = options.cache ?? new VocalsCache({ logger: this.log.child("cache") });
        this.loader = options.loader;
        this.separator = options.separator;
    }

    methodName(): string {
        return "vocal-energy";
    }

    async getVocals(filePath: string, positionMs: number, options: ProviderCallOptions = {}): Promise<CachedVocals> {
        assertExpectedGap(positionMs);
        const cached = this.cache.get(filePath, positionMs);
        if (cached) return cached;

        const info = await probeAudio(this.loader, filePath);
        const startMs = Math.max(0, positionMs - this.config.previewPreMs);
        const endMs = Math.min(info.durationMs, positionMs + this.config.previewPostMs);
        const processor = new ChunkProcessor({
            loader: this.loader,
            separator: this.separator,
            cache: this.cache,
            config: this.config,
            isCancelled: options.isCancelled,
            logger: this.log,
        });
        const { vocals } = await processor.isolate(filePath, info, { startMs, endMs });
        return { vocals, startMs, endMs };
    }

    detectSilencePeriods(
        filePath: string,
        expectedGapMs: number,
        options: ProviderCallOptions = {}
    ): Promise<DetectionOutcome> {
        return scanForOnset(filePath, expectedGapMs, {
            loader: this.loader,
            separator: this.separator,
            cache: this.cache,
            config: this.config,
            isCancelled: options.isCancelled,
            logger: this.log,
        });
    }

    computeConfidence(filePath: string, gapMs: number, options: ProviderCallOptions = {}): Promise<number> {
        return computeConfidence(filePath, gapMs, {
            loader: this.loader,
            separator: this.separator,
            cache: this.cache,
            config: this.config,
            isCancelled: options.isCancelled,
            logger: this.log,
        });
    }

    clearCache(): void {
        this.cache.clear();
    }
}
