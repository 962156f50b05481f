import { SeparationError, errorMessage } from "../errors";
import { createAudioBuffer, type AudioBufferLike } from "../types";
import { silentLogger, type Logger } from "../util/log";
import type { SeparateOptions, VocalSeparator } from "./types";

export type LazySeparatorOptions = {
    /** Run one second of stereo silence through the model right after loading. */
    warmUp?: boolean;
    warmUpSampleRate?: number;
    logger?: Logger;
};

/**
 * Defers loading an expensive separator until the first chunk needs it.
 *
 * Concurrent first calls share one load. A failed load is forgotten so the
 * next call tries again. The host owns the instance and passes it to every
 * scan explicitly.
 */
export class LazySeparator implements VocalSeparator {
    readonly name: string;

    private readonly load: () => Promise<VocalSeparator>;
    private readonly warmUp: boolean;
    private readonly warmUpSampleRate: number;
    private readonly log: Logger;
    private loading: Promise<VocalSeparator> | null = null;
    private ready = false;

    constructor(name: string, load: () => Promise<VocalSeparator>, options: LazySeparatorOptions = {}) {
        this.name = name;
        this.load = load;
        this.warmUp = options.warmUp ?? false;
        this.warmUpSampleRate = options.warmUpSampleRate ?? 44100;
        this.log = options.logger ?? silentLogger;
    }

    /** True once the wrapped separator has loaded (and warmed up). */
    get loaded(): boolean {
        return this.ready;
    }

    async separate(audio: AudioBufferLike, options?: SeparateOptions): Promise<AudioBufferLike> {
        const separator = await this.instance();
        return separator.separate(audio, options);
    }

    instance(): Promise<VocalSeparator> {
        if (!this.loading) {
            const loading = this.initialise();
            this.loading = loading;
            void loading.catch(() => {
                if (this.loading === loading) this.loading = null;
            });
        }
        return this.loading;
    }

    private async initialise(): Promise<VocalSeparator> {
        const started = Date.now();
        let separator: VocalSeparator;
        try {
            separator = await this.load();
        } catch (err) {
            throw new SeparationError(`failed to load separator ${this.name}: ${errorMessage(err)}`, { cause: err });
        }
        this.log.info(`loaded ${separator.name} in ${Date.now() - started}ms`);

        if (this.warmUp) {
            const silence = new Float32Array(this.warmUpSampleRate);
            await separator.separate(createAudioBuffer([silence, silence.slice()], this.warmUpSampleRate));
            this.log.debug(`warmed up ${separator.name}`);
        }
        this.ready = true;
        return separator;
    }
}
