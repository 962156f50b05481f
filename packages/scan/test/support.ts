import {
    AudioLoadError,
    audioChannels,
    createAudioBuffer,
    sliceAudioBuffer,
    type AudioBufferLike,
    type AudioChunkLoader,
    type AudioInfo,
    type LogSink,
    type SeparateOptions,
    type VocalSeparator,
} from "../src/index";

export const SR = 8000;

export type Segment = {
    startMs: number;
    endMs: number;
    amplitude?: number;
    /** Sine frequency in Hz; omitted means a DC level. */
    frequency?: number;
};

/** Silence with `segments` of constant level (or sine) written in. */
export function buildSignal(durationMs: number, segments: Segment[] = [], sampleRate = SR): Float32Array {
    const out = new Float32Array(Math.round((durationMs * sampleRate) / 1000));
    for (const seg of segments) {
        const amplitude = seg.amplitude ?? 0.5;
        const start = Math.round((seg.startMs * sampleRate) / 1000);
        const end = Math.min(out.length, Math.round((seg.endMs * sampleRate) / 1000));
        for (let i = start; i < end; i++) {
            out[i] =
                seg.frequency === undefined
                    ? amplitude
                    : amplitude * Math.sin((2 * Math.PI * seg.frequency * i) / sampleRate);
        }
    }
    return out;
}

export function monoBuffer(samples: Float32Array, sampleRate = SR): AudioBufferLike {
    return createAudioBuffer([samples], sampleRate);
}

/** In-memory loader over named mono or multi-channel signals. */
export class MemoryLoader implements AudioChunkLoader {
    readonly loads: Array<{ startFrame: number; frameCount: number }> = [];
    failLoadsAt = new Set<number>();

    private readonly files = new Map<string, { sampleRate: number; channels: Float32Array[] }>();

    add(filePath: string, channels: Float32Array | Float32Array[], sampleRate = SR): this {
        this.files.set(filePath, {
            sampleRate,
            channels: Array.isArray(channels) ? channels : [channels],
        });
        return this;
    }

    async probe(filePath: string): Promise<AudioInfo> {
        const file = this.get(filePath);
        const numFrames = file.channels[0]?.length ?? 0;
        return {
            sampleRate: file.sampleRate,
            numFrames,
            numChannels: file.channels.length,
            durationMs: (numFrames / file.sampleRate) * 1000,
        };
    }

    async loadChunk(filePath: string, startFrame: number, frameCount: number): Promise<AudioBufferLike> {
        const file = this.get(filePath);
        const ordinal = this.loads.length;
        this.loads.push({ startFrame, frameCount });
        if (this.failLoadsAt.has(ordinal)) {
            throw new Error(`simulated read failure #${ordinal}`);
        }
        return sliceAudioBuffer(createAudioBuffer(file.channels, file.sampleRate), startFrame, startFrame + frameCount);
    }

    private get(filePath: string) {
        const file = this.files.get(filePath);
        if (!file) throw new AudioLoadError(filePath, "no such file");
        return file;
    }
}

/** Returns its input as the "vocals" and records every call. */
export class IdentitySeparator implements VocalSeparator {
    readonly name = "identity";
    readonly calls: AudioBufferLike[] = [];
    failCallsAt = new Set<number>();
    failWith: (() => Error) | null = null;

    async separate(audio: AudioBufferLike, _options?: SeparateOptions): Promise<AudioBufferLike> {
        const ordinal = this.calls.length;
        this.calls.push(audio);
        if (this.failCallsAt.has(ordinal)) {
            throw this.failWith ? this.failWith() : new Error(`model crashed on call #${ordinal}`);
        }
        return createAudioBuffer(
            audioChannels(audio).map((ch) => ch.slice()),
            audio.sampleRate
        );
    }
}

export type LogLine = { level: keyof LogSink; line: string };

export function recordingSink(): LogSink & { lines: LogLine[] } {
    const lines: LogLine[] = [];
    const record =
        (level: keyof LogSink) =>
        (message?: unknown): void => {
            lines.push({ level, line: String(message) });
        };
    return {
        lines,
        debug: record("debug"),
        info: record("info"),
        warn: record("warn"),
        error: record("error"),
    };
}
