import { fetch, type Dispatcher } from "undici";

import { CancelledError, SeparationError, errorMessage } from "../errors";
import { audioChannels, audioLength, createAudioBuffer, type AudioBufferLike } from "../types";
import type { SeparateOptions, VocalSeparator } from "./types";

export type HttpVocalSeparatorOptions = {
    /** Base URL of the separation service; `/separate` is appended. */
    endpoint: string;
    timeoutMs?: number;
    /** undici dispatcher, e.g. a pool or a `MockAgent` in tests. */
    dispatcher?: Dispatcher;
};

export function interleave(audio: AudioBufferLike): Float32Array {
    const channels = audioChannels(audio);
    const frames = audioLength(audio);
    const nCh = channels.length;
    const out = new Float32Array(frames * nCh);
    for (let ch = 0; ch < nCh; ch++) {
        const data = channels[ch];
        if (!data) continue;
        for (let i = 0; i < frames; i++) {
            out[i * nCh + ch] = data[i] ?? 0;
        }
    }
    return out;
}

export function deinterleave(samples: Float32Array, numChannels: number): Float32Array[] {
    const frames = Math.floor(samples.length / numChannels);
    const channels: Float32Array[] = [];
    for (let ch = 0; ch < numChannels; ch++) {
        const data = new Float32Array(frames);
        for (let i = 0; i < frames; i++) {
            data[i] = samples[i * numChannels + ch] ?? 0;
        }
        channels.push(data);
    }
    return channels;
}

/**
 * Separator backed by a remote service.
 *
 * Request and reply bodies are interleaved little-endian float32 PCM; the
 * request carries `x-sample-rate` and `x-channels` headers, and the reply may
 * override the channel count with its own `x-channels`.
 */
export class HttpVocalSeparator implements VocalSeparator {
    readonly name = "http";

    private readonly endpoint: string;
    private readonly timeoutMs: number;
    private readonly dispatcher: Dispatcher | undefined;

    constructor(options: HttpVocalSeparatorOptions) {
        this.endpoint = options.endpoint.replace(/\/+$/, "");
        this.timeoutMs = options.timeoutMs ?? 120_000;
        this.dispatcher = options.dispatcher;
    }

    async separate(audio: AudioBufferLike, options?: SeparateOptions): Promise<AudioBufferLike> {
        if (options?.isCancelled?.()) throw new CancelledError();

        const pcm = interleave(audio);
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
        try {
            const response = await fetch(`${this.endpoint}/separate`, {
                method: "POST",
                headers: {
                    "content-type": "application/octet-stream",
                    "x-sample-rate": String(audio.sampleRate),
                    "x-channels": String(audio.numberOfChannels),
                },
                body: new Uint8Array(pcm.buffer, pcm.byteOffset, pcm.byteLength),
                signal: controller.signal,
                dispatcher: this.dispatcher,
            });

            if (!response.ok) {
                throw new SeparationError(`separation service error ${response.status}`);
            }

            const numChannels = Number(response.headers.get("x-channels") ?? audio.numberOfChannels);
            if (!Number.isInteger(numChannels) || numChannels < 1) {
                throw new SeparationError(`separation service sent invalid channel count`);
            }

            const body = await response.arrayBuffer();
            if (body.byteLength % (4 * numChannels) !== 0) {
                throw new SeparationError(
                    `malformed separation reply: ${body.byteLength} bytes for ${numChannels} float32 channels`
                );
            }

            return createAudioBuffer(deinterleave(new Float32Array(body), numChannels), audio.sampleRate);
        } catch (err) {
            if (err instanceof SeparationError) throw err;
            if (controller.signal.aborted) {
                throw new SeparationError(`separation timed out after ${this.timeoutMs}ms`, { cause: err });
            }
            throw new SeparationError(`separation request failed: ${errorMessage(err)}`, { cause: err });
        } finally {
            clearTimeout(timeout);
        }
    }
}
