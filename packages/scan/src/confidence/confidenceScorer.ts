import type { AudioChunkLoader } from "../audio/types";
import type { VocalsCache } from "../cache/vocalsCache";
import { resolveScanConfig, type ScanConfigInput } from "../config";
import { msToSamples, rms, toMono } from "../dsp/energy";
import { CancelledError, errorMessage } from "../errors";
import { ChunkProcessor } from "../scan/chunkProcessor";
import { probeAudio } from "../scan/scanForOnset";
import type { VocalSeparator } from "../separation/types";
import type { AudioBufferLike, CancellationCheck } from "../types";
import { clamp } from "../util/stats";
import { createLogger, type Logger } from "../util/log";

/** Returned whenever scoring fails; confidence is advisory. */
export const CONFIDENCE_FALLBACK = 0.7;

export const NOISE_WINDOW_MS = 800;
export const SIGNAL_WINDOW_MS = 300;
/** Assumed SNR when the noise reference is effectively silent. */
export const SILENT_NOISE_SNR_DB = 20;

const EPS = 1e-8;

export type ConfidenceOptions = {
    loader: AudioChunkLoader;
    separator: VocalSeparator;
    cache: VocalsCache;
    config?: ScanConfigInput;
    isCancelled?: CancellationCheck;
    logger?: Logger;
};

export type VocalSnr = {
    snrDb: number;
    noiseRms: number;
    signalRms: number;
};

/** Logistic map centred on 10 dB. */
export function snrToConfidence(snrDb: number): number {
    return clamp(1 / (1 + Math.exp(-0.1 * (snrDb - 10))), 0, 1);
}

/**
 * SNR of the 300 ms after `onsetMs` against the first 800 ms of a vocal chunk
 * starting at `chunkStartMs`. An onset past the end of the chunk measures
 * the noise window against itself.
 */
export function measureVocalSnr(vocals: AudioBufferLike, chunkStartMs: number, onsetMs: number): VocalSnr {
    const sr = vocals.sampleRate;
    const mono = toMono(vocals);

    const noiseRms = rms(mono, 0, msToSamples(NOISE_WINDOW_MS, sr));
    const onsetSample = msToSamples(onsetMs - chunkStartMs, sr);
    const signalRms =
        onsetSample >= mono.length ? noiseRms : rms(mono, onsetSample, onsetSample + msToSamples(SIGNAL_WINDOW_MS, sr));

    const snrDb = noiseRms > EPS ? 20 * Math.log10((signalRms + EPS) / (noiseRms + EPS)) : SILENT_NOISE_SNR_DB;
    return { snrDb, noiseRms, signalRms };
}

/**
 * Confidence in [0, 1] that vocals really start at `onsetMs`.
 *
 * Reuses a cached separation covering the onset when the scan left one;
 * otherwise isolates `[onset - previewPreMs, onset + previewPostMs]` and
 * caches it. Never rejects: any failure, cancellation included, yields
 * `CONFIDENCE_FALLBACK`.
 */
export async function computeConfidence(
    filePath: string,
    onsetMs: number,
    options: ConfidenceOptions
): Promise<number> {
    let log = options.logger ?? createLogger("confidence");
    try {
        const config = resolveScanConfig(options.config);
        if (!options.logger) log = createLogger("confidence", config.logLevel);

        let vocals: AudioBufferLike;
        let startMs: number;
        const cached = options.cache.get(filePath, onsetMs);
        if (cached) {
            vocals = cached.vocals;
            startMs = cached.startMs;
        } else {
            if (options.isCancelled?.()) throw new CancelledError();

            const info = await probeAudio(options.loader, filePath);
            startMs = Math.max(0, onsetMs - config.previewPreMs);
            const endMs = Math.min(info.durationMs, onsetMs + config.previewPostMs);
            const processor = new ChunkProcessor({ ...options, config, logger: log });
            ({ vocals } = await processor.isolate(filePath, info, { startMs, endMs }));
        }

        const { snrDb, noiseRms, signalRms } = measureVocalSnr(vocals, startMs, onsetMs);
        const confidence = snrToConfidence(snrDb);
        log.debug(
            `onset ${onsetMs}ms: noise=${noiseRms.toFixed(5)} signal=${signalRms.toFixed(5)} ` +
                `snr=${snrDb.toFixed(1)}dB confidence=${confidence.toFixed(3)}`
        );
        return confidence;
    } catch (err) {
        log.warn(`confidence fallback ${CONFIDENCE_FALLBACK}: ${errorMessage(err)}`);
        return CONFIDENCE_FALLBACK;
    }
}
