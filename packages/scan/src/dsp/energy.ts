/**
 * Time-domain energy primitives shared by the onset detector and the
 * confidence scorer.
 */

import type { AudioBufferLike, Period } from "../types";

/** Whole samples covered by `ms` at `sampleRate` (floored). */
export function msToSamples(ms: number, sampleRate: number): number {
    return Math.max(0, Math.floor((ms * sampleRate) / 1000));
}

/**
 * Average all channels into one mono signal.
 *
 * A single-channel buffer is returned as-is (no copy).
 */
export function toMono(audio: AudioBufferLike): Float32Array {
    const nCh = audio.numberOfChannels;
    if (nCh === 0) return new Float32Array(0);
    if (nCh === 1) return audio.getChannelData(0);

    const length = audio.getChannelData(0).length;
    const mono = new Float32Array(length);
    for (let ch = 0; ch < nCh; ch++) {
        const data = audio.getChannelData(ch);
        const n = Math.min(length, data.length);
        for (let i = 0; i < n; i++) {
            mono[i] = (mono[i] ?? 0) + (data[i] ?? 0);
        }
    }
    for (let i = 0; i < length; i++) {
        mono[i] = (mono[i] ?? 0) / nCh;
    }
    return mono;
}

/**
 * RMS of `samples[start, end)`, with the range clamped to the signal.
 * An empty range has RMS 0.
 */
export function rms(samples: Float32Array, start = 0, end = samples.length): number {
    const lo = Math.max(0, start);
    const hi = Math.min(samples.length, end);
    if (hi <= lo) return 0;

    let sum = 0;
    for (let i = lo; i < hi; i++) {
        const v = samples[i] ?? 0;
        sum += v * v;
    }
    return Math.sqrt(sum / (hi - lo));
}

/**
 * Short-time RMS envelope.
 *
 * Frame `t` covers `[t * hopSamples, t * hopSamples + frameSamples)`; only
 * frames that fit entirely inside the signal are produced.
 */
export function frameRms(samples: Float32Array, frameSamples: number, hopSamples: number): Float32Array {
    if (frameSamples <= 0 || hopSamples <= 0 || samples.length < frameSamples) {
        return new Float32Array(0);
    }

    const nFrames = 1 + Math.floor((samples.length - frameSamples) / hopSamples);
    const out = new Float32Array(nFrames);
    for (let t = 0; t < nFrames; t++) {
        const start = t * hopSamples;
        out[t] = rms(samples, start, start + frameSamples);
    }
    return out;
}

/** Level of `signal` relative to `reference`, in dB. */
export function ratioDb(signal: number, reference: number, eps = 1e-10): number {
    return 20 * Math.log10((signal + eps) / (reference + eps));
}

/**
 * Sort periods by start and merge any that overlap or touch.
 * Returns a new array; the input is left untouched.
 */
export function mergePeriods(periods: readonly Period[]): Period[] {
    const sorted = periods
        .filter(([start, end]) => end > start)
        .map(([start, end]): Period => [start, end])
        .sort((a, b) => a[0] - b[0]);

    const merged: Period[] = [];
    for (const period of sorted) {
        const last = merged[merged.length - 1];
        if (last && period[0] <= last[1]) {
            last[1] = Math.max(last[1], period[1]);
        } else {
            merged.push(period);
        }
    }
    return merged;
}
