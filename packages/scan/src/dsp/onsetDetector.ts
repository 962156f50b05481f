import type { ScanConfig } from "../config";
import type { AudioBufferLike, Period } from "../types";
import { mean, minMax } from "../util/stats";
import { frameRms, msToSamples, rms, toMono } from "./energy";
import { applyMinRunDuration, buildCandidateMask, findVoicedRuns } from "./voicing";

export type OnsetDetectorConfig = Pick<
    ScanConfig,
    | "frameDurationMs"
    | "hopDurationMs"
    | "noiseFloorDurationMs"
    | "onsetSnrThresholdDb"
    | "onsetAbsThreshold"
    | "minVoicedDurationMs"
    | "hysteresisMs"
>;

export type OnsetAnalysis = {
    /** Absolute onset time, or null when no run sustained long enough. */
    onsetMs: number | null;
    /** Accepted voiced runs as absolute periods, in time order. */
    voicedPeriods: Period[];
    noiseFloorRms: number;
    peakRms: number;
    meanRms: number;
    frameCount: number;
};

/**
 * Energy/SNR onset analysis of one isolated-vocal chunk.
 *
 * The noise floor is the RMS of the chunk's first `noiseFloorDurationMs`
 * (or of whatever shorter signal exists). A frame is a candidate when it is
 * `onsetSnrThresholdDb` above that floor and at least `onsetAbsThreshold`;
 * candidates joined across dips of up to `hysteresisMs` must span
 * `minVoicedDurationMs` to be accepted. The onset is the start of the first
 * accepted run: `chunkStartMs + frameIndex * hopDurationMs`.
 */
export function analyseVocalChunk(
    vocals: AudioBufferLike,
    chunkStartMs: number,
    config: OnsetDetectorConfig
): OnsetAnalysis {
    const sr = vocals.sampleRate;
    const mono = toMono(vocals);

    const frameSamples = Math.max(1, msToSamples(config.frameDurationMs, sr));
    const hopSamples = Math.max(1, msToSamples(config.hopDurationMs, sr));
    const envelope = frameRms(mono, frameSamples, hopSamples);

    const noiseFloorRms = rms(mono, 0, msToSamples(config.noiseFloorDurationMs, sr));
    const { max } = minMax(envelope);

    const base = {
        noiseFloorRms,
        peakRms: envelope.length > 0 ? max : 0,
        meanRms: mean(envelope),
        frameCount: envelope.length,
    };

    if (envelope.length === 0) {
        return { ...base, onsetMs: null, voicedPeriods: [] };
    }

    const mask = buildCandidateMask(envelope, noiseFloorRms, config.onsetSnrThresholdDb, config.onsetAbsThreshold);
    const hysteresisFrames = Math.floor(config.hysteresisMs / config.hopDurationMs);
    const minFrames = Math.ceil(config.minVoicedDurationMs / config.hopDurationMs);
    const runs = applyMinRunDuration(findVoicedRuns(mask, hysteresisFrames), minFrames);

    const chunkEndMs = chunkStartMs + (mono.length / sr) * 1000;
    const voicedPeriods = runs.map((run): Period => [
        chunkStartMs + run.startFrame * config.hopDurationMs,
        Math.min(chunkEndMs, chunkStartMs + (run.endFrame - 1) * config.hopDurationMs + config.frameDurationMs),
    ]);

    const first = runs[0];
    return {
        ...base,
        onsetMs: first ? chunkStartMs + first.startFrame * config.hopDurationMs : null,
        voicedPeriods,
    };
}

/** Absolute onset timestamp for one isolated-vocal chunk, or null. */
export function detectOnset(
    vocals: AudioBufferLike,
    chunkStartMs: number,
    config: OnsetDetectorConfig
): number | null {
    return analyseVocalChunk(vocals, chunkStartMs, config).onsetMs;
}
