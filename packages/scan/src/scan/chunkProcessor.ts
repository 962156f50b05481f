import type { AudioChunkLoader } from "../audio/types";
import type { VocalsCache } from "../cache/vocalsCache";
import type { ScanConfig } from "../config";
import { analyseVocalChunk, type OnsetAnalysis } from "../dsp/onsetDetector";
import { resampleAudio } from "../dsp/resample";
import { AudioLoadError, CancelledError, SeparationError, errorMessage } from "../errors";
import type { VocalSeparator } from "../separation/types";
import { ensureStereo, type AudioBufferLike, type AudioInfo, type CancellationCheck, type ChunkBoundary } from "../types";
import { silentLogger, type Logger } from "../util/log";

export type ChunkProcessorDeps = {
    loader: AudioChunkLoader;
    separator: VocalSeparator;
    cache: VocalsCache;
    config: ScanConfig;
    isCancelled?: CancellationCheck;
    logger?: Logger;
};

export type IsolatedChunk = {
    vocals: AudioBufferLike;
    fromCache: boolean;
};

export type ProcessedChunk = IsolatedChunk & {
    analysis: OnsetAnalysis;
};

/** Sample-frame range of `range` in a file described by `info`. */
export function frameRange(info: AudioInfo, range: ChunkBoundary): { startFrame: number; frameCount: number } {
    const startFrame = Math.floor((range.startMs * info.sampleRate) / 1000);
    const wanted = Math.floor(((range.endMs - range.startMs) * info.sampleRate) / 1000);
    return { startFrame, frameCount: Math.min(wanted, info.numFrames - startFrame) };
}

/**
 * Loads, prepares and separates one time range, then analyses the vocals.
 *
 * Loader failures surface as `AudioLoadError` (non-fatal unless the loader
 * says otherwise) and separator failures as `SeparationError`, so the scan
 * can decide which of them cost only the chunk.
 */
export class ChunkProcessor {
    private readonly deps: ChunkProcessorDeps;
    private readonly log: Logger;

    constructor(deps: ChunkProcessorDeps) {
        this.deps = deps;
        this.log = deps.logger ?? silentLogger;
    }

    async process(filePath: string, info: AudioInfo, chunk: ChunkBoundary): Promise<ProcessedChunk> {
        const isolated = await this.isolate(filePath, info, chunk);
        const analysis = analyseVocalChunk(isolated.vocals, chunk.startMs, this.deps.config);
        this.log.debug(
            `chunk [${chunk.startMs}, ${chunk.endMs}] noise=${analysis.noiseFloorRms.toFixed(5)} ` +
                `peak=${analysis.peakRms.toFixed(5)} onset=${analysis.onsetMs ?? "none"}`
        );
        return { ...isolated, analysis };
    }

    /**
     * Isolated vocals for exactly `range`, reusing a cached separation of the
     * same range. Fresh separations are cached.
     */
    async isolate(filePath: string, info: AudioInfo, range: ChunkBoundary): Promise<IsolatedChunk> {
        const { cache, separator, config, isCancelled } = this.deps;

        const cached = cache.peek(filePath, range.startMs, range.endMs);
        if (cached) {
            this.log.debug(`cache hit [${range.startMs}, ${range.endMs}]`);
            return { vocals: cached.vocals, fromCache: true };
        }

        const audio = await this.load(filePath, info, range);
        let prepared = ensureStereo(audio);
        if (config.resampleHz > 0) prepared = resampleAudio(prepared, config.resampleHz);

        let vocals: AudioBufferLike;
        try {
            vocals = await separator.separate(prepared, { isCancelled });
        } catch (err) {
            if (err instanceof CancelledError || err instanceof SeparationError) throw err;
            throw new SeparationError(`${separator.name} failed: ${errorMessage(err)}`, { cause: err });
        }
        if (vocals.numberOfChannels < 1) {
            throw new SeparationError(`${separator.name} returned no channels`);
        }

        cache.put(filePath, range.startMs, range.endMs, vocals);
        this.log.debug(`cached [${range.startMs}, ${range.endMs}] (${cache.size}/${cache.capacity})`);
        return { vocals, fromCache: false };
    }

    private async load(filePath: string, info: AudioInfo, range: ChunkBoundary): Promise<AudioBufferLike> {
        const { startFrame, frameCount } = frameRange(info, range);
        if (frameCount <= 0) {
            throw new AudioLoadError(filePath, `empty chunk [${range.startMs}, ${range.endMs}]`, { fatal: false });
        }

        try {
            return await this.deps.loader.loadChunk(filePath, startFrame, frameCount);
        } catch (err) {
            if (err instanceof AudioLoadError || err instanceof CancelledError) throw err;
            throw new AudioLoadError(filePath, `chunk load failed: ${errorMessage(err)}`, {
                fatal: false,
                cause: err,
            });
        }
    }
}
