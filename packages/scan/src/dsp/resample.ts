import { audioChannels, createAudioBuffer, type AudioBufferLike } from "../types";

/**
 * Resample audio using linear interpolation.
 *
 * Good enough ahead of vocal separation and energy analysis, where perfect
 * reconstruction is not needed.
 *
 * @param samples - Input audio samples
 * @param fromRate - Original sample rate (Hz)
 * @param toRate - Target sample rate (Hz)
 * @returns Resampled audio samples
 */
export function resample(
    samples: Float32Array,
    fromRate: number,
    toRate: number
): Float32Array {
    if (fromRate === toRate) {
        return samples;
    }

    const ratio = fromRate / toRate;
    const newLength = Math.floor(samples.length / ratio);

    if (newLength <= 0) {
        return new Float32Array(0);
    }

    const result = new Float32Array(newLength);

    for (let i = 0; i < newLength; i++) {
        const srcIndex = i * ratio;
        const srcIndexFloor = Math.floor(srcIndex);
        const frac = srcIndex - srcIndexFloor;

        const a = samples[srcIndexFloor] ?? 0;
        const b = samples[srcIndexFloor + 1] ?? a;
        result[i] = a + frac * (b - a);
    }

    return result;
}

/** Resample every channel of `audio` to `toRate`. */
export function resampleAudio(audio: AudioBufferLike, toRate: number): AudioBufferLike {
    if (audio.sampleRate === toRate) return audio;
    return createAudioBuffer(
        audioChannels(audio).map((ch) => resample(ch, audio.sampleRate, toRate)),
        toRate
    );
}
