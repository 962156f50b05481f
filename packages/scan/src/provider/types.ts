import type { CachedVocals } from "../cache/vocalsCache";
import type { CancellationCheck, DetectionOutcome } from "../types";

export type ProviderCallOptions = {
    isCancelled?: CancellationCheck;
};

/** Interchangeable detection strategy behind the gap pipeline. */
export interface DetectionProvider {
    methodName(): string;
    /** Isolated vocals around `positionMs`. */
    getVocals(filePath: string, positionMs: number, options?: ProviderCallOptions): Promise<CachedVocals>;
    detectSilencePeriods(filePath: string, expectedGapMs: number, options?: ProviderCallOptions): Promise<DetectionOutcome>;
    /** Advisory score in [0, 1]; never rejects. */
    computeConfidence(filePath: string, gapMs: number, options?: ProviderCallOptions): Promise<number>;
}
