import type { AudioBufferLike, AudioInfo } from "../types";

/**
 * Reads decoded PCM from a source file.
 *
 * Implementations raise `AudioLoadError` with `fatal: true` when the file
 * cannot be opened, probed or decoded at all.
 */
export interface AudioChunkLoader {
    probe(filePath: string): Promise<AudioInfo>;
    /** `frameCount` sample frames starting at `startFrame`, at the file's native rate. */
    loadChunk(filePath: string, startFrame: number, frameCount: number): Promise<AudioBufferLike>;
}
