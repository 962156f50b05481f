import { readFile } from "node:fs/promises";
import path from "node:path";

import wavefile from "wavefile";
import { z } from "zod";

import { AudioLoadError, errorMessage } from "../errors";
import { createAudioBuffer, sliceAudioBuffer, type AudioBufferLike, type AudioInfo } from "../types";
import { silentLogger, type Logger } from "../util/log";
import { ffmpegPath, transcodeToWav } from "./ffmpeg";
import type { AudioChunkLoader } from "./types";

const { WaveFile } = wavefile;

type DecodedAudio = {
    sampleRate: number;
    channels: Float32Array[];
};

const wavFormatSchema = z.object({
    sampleRate: z.number().int().positive(),
    numChannels: z.number().int().positive(),
});

/** Decode WAV bytes of any supported bit depth to float channels. */
export function decodeWav(bytes: Uint8Array): DecodedAudio {
    const wav = new WaveFile(bytes);
    const fmt = wavFormatSchema.safeParse(wav.fmt);
    if (!fmt.success) {
        throw new Error("WAV header has no usable sample rate or channel count");
    }

    wav.toBitDepth("32f");
    const samples = wav.getSamples(false);
    const planar: Float64Array[] = Array.isArray(samples) ? samples : [samples];
    const channels = planar.map((ch) => Float32Array.from(ch));
    if (channels.length !== fmt.data.numChannels) {
        throw new Error(`expected ${fmt.data.numChannels} channels, decoded ${channels.length}`);
    }

    return { sampleRate: fmt.data.sampleRate, channels };
}

export type WavFileLoaderOptions = {
    /** ffmpeg binary used for non-WAV containers. Defaults to `FFMPEG_PATH` or `ffmpeg`. */
    ffmpeg?: string;
    logger?: Logger;
};

/**
 * Loads chunks from WAV files, transcoding other containers through ffmpeg.
 *
 * The most recently decoded file stays in memory, so the many chunks of one
 * song decode (and transcode) once.
 */
export class WavFileLoader implements AudioChunkLoader {
    private readonly ffmpeg: string;
    private readonly log: Logger;
    private current: { filePath: string; decoded: Promise<DecodedAudio> } | null = null;

    constructor(options: WavFileLoaderOptions = {}) {
        this.ffmpeg = options.ffmpeg ?? ffmpegPath();
        this.log = options.logger ?? silentLogger;
    }

    async probe(filePath: string): Promise<AudioInfo> {
        const { sampleRate, channels } = await this.decode(filePath);
        const numFrames = channels[0]?.length ?? 0;
        return {
            sampleRate,
            numFrames,
            numChannels: channels.length,
            durationMs: (numFrames / sampleRate) * 1000,
        };
    }

    async loadChunk(filePath: string, startFrame: number, frameCount: number): Promise<AudioBufferLike> {
        const { sampleRate, channels } = await this.decode(filePath);
        const numFrames = channels[0]?.length ?? 0;

        if (startFrame < 0 || startFrame >= numFrames || frameCount <= 0) {
            throw new AudioLoadError(
                filePath,
                `frame range [${startFrame}, ${startFrame + frameCount}) outside 0..${numFrames}`,
                { fatal: false }
            );
        }

        const end = Math.min(numFrames, startFrame + frameCount);
        return sliceAudioBuffer(createAudioBuffer(channels, sampleRate), startFrame, end);
    }

    /** Drop the in-memory decoded file. */
    release(): void {
        this.current = null;
    }

    private decode(filePath: string): Promise<DecodedAudio> {
        if (this.current?.filePath === filePath) {
            return this.current.decoded;
        }

        const decoded = this.readAndDecode(filePath);
        const current = { filePath, decoded };
        this.current = current;
        void decoded.catch(() => {
            if (this.current === current) this.current = null;
        });
        return decoded;
    }

    private async readAndDecode(filePath: string): Promise<DecodedAudio> {
        const isWav = path.extname(filePath).toLowerCase() === ".wav";
        let bytes: Uint8Array;

        if (isWav) {
            bytes = await this.read(filePath, filePath);
        } else {
            this.log.debug(`transcoding ${path.basename(filePath)} with ${this.ffmpeg}`);
            const transcoded = await transcodeToWav(filePath, this.ffmpeg).catch((err: unknown) => {
                throw new AudioLoadError(filePath, `cannot transcode audio: ${errorMessage(err)}`, { cause: err });
            });
            try {
                bytes = await this.read(filePath, transcoded.wavPath);
            } finally {
                await transcoded.cleanup();
            }
        }

        try {
            const decoded = decodeWav(bytes);
            this.log.debug(
                `decoded ${path.basename(filePath)}: ${decoded.channels.length}ch @ ${decoded.sampleRate}Hz`
            );
            return decoded;
        } catch (err) {
            throw new AudioLoadError(filePath, `cannot decode audio: ${errorMessage(err)}`, { cause: err });
        }
    }

    private async read(filePath: string, source: string): Promise<Uint8Array> {
        try {
            return await readFile(source);
        } catch (err) {
            throw new AudioLoadError(filePath, `cannot read audio file: ${errorMessage(err)}`, { cause: err });
        }
    }
}
