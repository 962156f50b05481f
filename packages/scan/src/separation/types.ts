import type { AudioBufferLike, CancellationCheck } from "../types";

export type SeparateOptions = {
    /** Long-running separators poll this and throw `CancelledError` when it turns true. */
    isCancelled?: CancellationCheck;
};

/**
 * Maps a (stereo) waveform chunk to its isolated-vocal waveform, same length
 * and sample rate. Failures surface as `SeparationError`.
 */
export interface VocalSeparator {
    readonly name: string;
    separate(audio: AudioBufferLike, options?: SeparateOptions): Promise<AudioBufferLike>;
}
