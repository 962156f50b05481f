/**
 * Minimal audio container shared by loaded chunks and isolated-vocal chunks.
 *
 * Mirrors the subset of the Web Audio `AudioBuffer` surface the scanner needs,
 * so callers holding real AudioBuffers can pass them straight through.
 */
export type AudioBufferLike = {
    sampleRate: number;
    numberOfChannels: number;
    getChannelData(channel: number): Float32Array;
};

export type AudioInfo = {
    sampleRate: number;
    /** Length of the file in sample frames (per channel). */
    numFrames: number;
    numChannels: number;
    durationMs: number;
};

/** `[startMs, endMs]` in absolute song time. */
export type Period = [startMs: number, endMs: number];

/** Polled before expensive work; returning true aborts the current operation. */
export type CancellationCheck = () => boolean;

export type ChunkBoundary = {
    readonly startMs: number;
    readonly endMs: number;
};

export type SearchWindow = {
    readonly startMs: number;
    readonly endMs: number;
    readonly radiusMs: number;
    readonly expansionIndex: number;
};

export type ScanStatus = "found" | "not-found" | "cancelled";

export type DetectionOutcome = {
    status: ScanStatus;
    /** Best onset across all expansions, or null when nothing was found. */
    onsetMs: number | null;
    /** Merged sustained-voicing periods seen in every processed chunk. */
    voicedPeriods: Period[];
    /** `[[0, onsetMs]]` when an onset above 0 was found. */
    silencePeriods: Period[];
    /** Distinct chunk boundaries reached by the scan (including a cancelled one). */
    chunksProcessed: number;
    /** Index of the last expansion window entered. */
    expansionReached: number;
    /** Every recorded candidate onset, in processing order. */
    candidates: number[];
};

export function createAudioBuffer(channels: Float32Array[], sampleRate: number): AudioBufferLike {
    return {
        sampleRate,
        numberOfChannels: channels.length,
        getChannelData(channel: number): Float32Array {
            const data = channels[channel];
            if (!data) {
                throw new RangeError(`channel ${channel} out of range (0..${channels.length - 1})`);
            }
            return data;
        },
    };
}

export function audioChannels(audio: AudioBufferLike): Float32Array[] {
    const channels: Float32Array[] = [];
    for (let ch = 0; ch < audio.numberOfChannels; ch++) {
        channels.push(audio.getChannelData(ch));
    }
    return channels;
}

export function audioLength(audio: AudioBufferLike): number {
    return audio.numberOfChannels > 0 ? audio.getChannelData(0).length : 0;
}

/** Separation models take stereo input; a mono chunk is duplicated. */
export function ensureStereo(audio: AudioBufferLike): AudioBufferLike {
    if (audio.numberOfChannels !== 1) return audio;
    const mono = audio.getChannelData(0);
    return createAudioBuffer([mono, Float32Array.from(mono)], audio.sampleRate);
}

/** Copy `[startSample, endSample)` of every channel. */
export function sliceAudioBuffer(audio: AudioBufferLike, startSample: number, endSample: number): AudioBufferLike {
    return createAudioBuffer(
        audioChannels(audio).map((ch) => ch.slice(startSample, endSample)),
        audio.sampleRate
    );
}
