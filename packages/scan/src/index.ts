export const GAP_SCAN_VERSION = "0.1.0";

// ----------------------------
// Core types
// ----------------------------

export type {
    AudioBufferLike,
    AudioInfo,
    Period,
    CancellationCheck,
    ChunkBoundary,
    SearchWindow,
    ScanStatus,
    DetectionOutcome,
} from "./types";
export { createAudioBuffer, audioChannels, audioLength, ensureStereo, sliceAudioBuffer } from "./types";

// ----------------------------
// Configuration / errors / logging
// ----------------------------

export type { ScanConfig, ScanConfigInput } from "./config";
export {
    DEFAULT_SCAN_CONFIG,
    scanConfigSchema,
    withScanConfigDefaults,
    resolveScanConfig,
    scanConfigFromEnv,
} from "./config";

export { ScanError, ConfigError, AudioLoadError, SeparationError, CancelledError, errorMessage } from "./errors";

export type { LogLevel, Logger, LogSink } from "./util/log";
export { LOG_LEVELS, createLogger, silentLogger } from "./util/log";

// ----------------------------
// DSP
// ----------------------------

export { msToSamples, toMono, rms, frameRms, ratioDb, mergePeriods } from "./dsp/energy";
export type { VoicedRun } from "./dsp/voicing";
export { buildCandidateMask, findVoicedRuns, applyMinRunDuration } from "./dsp/voicing";
export type { OnsetDetectorConfig, OnsetAnalysis } from "./dsp/onsetDetector";
export { analyseVocalChunk, detectOnset } from "./dsp/onsetDetector";
export { resample, resampleAudio } from "./dsp/resample";
export type { MinMax } from "./util/stats";
export { minMax, mean, clamp } from "./util/stats";

// ----------------------------
// Scan
// ----------------------------

export type { ChunkIteratorOptions } from "./scan/chunkIterator";
export { ChunkIterator, chunkKey, sameChunk } from "./scan/chunkIterator";
export type { ExpansionStrategyOptions } from "./scan/expansionStrategy";
export { ExpansionStrategy } from "./scan/expansionStrategy";
export type { ChunkProcessorDeps, IsolatedChunk, ProcessedChunk } from "./scan/chunkProcessor";
export { ChunkProcessor, frameRange } from "./scan/chunkProcessor";
export type { ScanOptions } from "./scan/scanForOnset";
export { scanForOnset, DUPLICATE_CANDIDATE_MS } from "./scan/scanForOnset";

// ----------------------------
// Cache
// ----------------------------

export type { CachedVocals, VocalsCacheOptions } from "./cache/vocalsCache";
export { VocalsCache, DEFAULT_CACHE_CAPACITY } from "./cache/vocalsCache";

// ----------------------------
// Audio loading
// ----------------------------

export type { AudioChunkLoader } from "./audio/types";
export type { WavFileLoaderOptions } from "./audio/wavFileLoader";
export { WavFileLoader, decodeWav } from "./audio/wavFileLoader";
export type { TranscodedFile } from "./audio/ffmpeg";
export {
    transcodeToWav,
    ffmpegPath,
    appendTail,
    TRANSCODE_SAMPLE_RATE,
    TRANSCODE_CHANNELS,
    STDERR_TAIL_CHARS,
} from "./audio/ffmpeg";

// ----------------------------
// Vocal separation
// ----------------------------

export type { VocalSeparator, SeparateOptions } from "./separation/types";
export type { LazySeparatorOptions } from "./separation/lazySeparator";
export { LazySeparator } from "./separation/lazySeparator";
export type { HttpVocalSeparatorOptions } from "./separation/httpSeparator";
export { HttpVocalSeparator, interleave, deinterleave } from "./separation/httpSeparator";

// ----------------------------
// Confidence / providers / gap pipeline
// ----------------------------

export type { ConfidenceOptions, VocalSnr } from "./confidence/confidenceScorer";
export {
    computeConfidence,
    measureVocalSnr,
    snrToConfidence,
    CONFIDENCE_FALLBACK,
    NOISE_WINDOW_MS,
    SIGNAL_WINDOW_MS,
    SILENT_NOISE_SNR_DB,
} from "./confidence/confidenceScorer";

export type { DetectionProvider, ProviderCallOptions } from "./provider/types";
export type { VocalEnergyProviderOptions } from "./provider/vocalEnergyProvider";
export { VocalEnergyProvider } from "./provider/vocalEnergyProvider";

export type { GapRequest, GapResult, DetectGapOptions } from "./gap/detectGap";
export { detectGap, detectGapFromSilence, validateGapRequest } from "./gap/detectGap";
