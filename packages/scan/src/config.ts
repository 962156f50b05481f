import { z } from "zod";

import { ConfigError } from "./errors";
import { LOG_LEVELS, type LogLevel } from "./util/log";

/**
 * Tunables for one scan. Read-only while a scan runs.
 */
export type ScanConfig = {
    /** Length of each audio chunk handed to the separation model. */
    chunkDurationMs: number;
    /** Overlap between consecutive chunks; must be below `chunkDurationMs`. */
    chunkOverlapMs: number;

    /** RMS frame length. */
    frameDurationMs: number;
    /** RMS frame stride; onset timestamps are quantised to this. */
    hopDurationMs: number;
    /** Leading span of each chunk used as the noise-floor reference. */
    noiseFloorDurationMs: number;

    /** Minimum frame level above the noise floor, in dB. */
    onsetSnrThresholdDb: number;
    /** Minimum frame RMS regardless of the noise floor. */
    onsetAbsThreshold: number;
    /** A candidate run must span at least this long to count as voicing. */
    minVoicedDurationMs: number;
    /** Longest dip below threshold tolerated inside one voiced run. */
    hysteresisMs: number;

    initialRadiusMs: number;
    radiusIncrementMs: number;
    maxExpansions: number;
    /** A candidate this close to the expected gap ends the scan at once. */
    earlyStopToleranceMs: number;

    /** Below this confidence a detected gap is flagged for review. */
    confidenceThreshold: number;

    /** Resample chunks to this rate before separation (0 = keep source rate). */
    resampleHz: number;
    /** Span isolated before a position by `getVocals` and cache-miss confidence. */
    previewPreMs: number;
    /** Span isolated after a position by `getVocals` and cache-miss confidence. */
    previewPostMs: number;

    logLevel: LogLevel;
};

export type ScanConfigInput = Partial<ScanConfig>;

export const DEFAULT_SCAN_CONFIG: Readonly<ScanConfig> = Object.freeze({
    chunkDurationMs: 12000,
    chunkOverlapMs: 6000,
    frameDurationMs: 25,
    hopDurationMs: 20,
    noiseFloorDurationMs: 1200,
    onsetSnrThresholdDb: 12,
    onsetAbsThreshold: 0.025,
    minVoicedDurationMs: 100,
    hysteresisMs: 350,
    initialRadiusMs: 7500,
    radiusIncrementMs: 7500,
    maxExpansions: 3,
    earlyStopToleranceMs: 500,
    confidenceThreshold: 0.55,
    resampleHz: 0,
    previewPreMs: 3000,
    previewPostMs: 9000,
    logLevel: "info",
});

const positive = z.number().finite().positive();
const nonNegative = z.number().finite().nonnegative();

export const scanConfigSchema = z
    .object({
        chunkDurationMs: positive,
        chunkOverlapMs: nonNegative,
        frameDurationMs: positive,
        hopDurationMs: positive,
        noiseFloorDurationMs: nonNegative,
        onsetSnrThresholdDb: z.number().finite(),
        onsetAbsThreshold: nonNegative,
        minVoicedDurationMs: nonNegative,
        hysteresisMs: nonNegative,
        initialRadiusMs: nonNegative,
        radiusIncrementMs: nonNegative,
        maxExpansions: z.number().int().nonnegative(),
        earlyStopToleranceMs: nonNegative,
        confidenceThreshold: z.number().min(0).max(1),
        resampleHz: z.number().int().nonnegative(),
        previewPreMs: nonNegative,
        previewPostMs: positive,
        logLevel: z.enum(LOG_LEVELS),
    })
    .refine((c) => c.chunkOverlapMs < c.chunkDurationMs, {
        message: "chunkOverlapMs must be less than chunkDurationMs",
        path: ["chunkOverlapMs"],
    });

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}

/**
 * Merge user config with defaults. Fields left undefined take the default.
 */
export function withScanConfigDefaults(config?: ScanConfigInput): ScanConfig {
    const d = DEFAULT_SCAN_CONFIG;
    return {
        chunkDurationMs: config?.chunkDurationMs ?? d.chunkDurationMs,
        chunkOverlapMs: config?.chunkOverlapMs ?? d.chunkOverlapMs,
        frameDurationMs: config?.frameDurationMs ?? d.frameDurationMs,
        hopDurationMs: config?.hopDurationMs ?? d.hopDurationMs,
        noiseFloorDurationMs: config?.noiseFloorDurationMs ?? d.noiseFloorDurationMs,
        onsetSnrThresholdDb: config?.onsetSnrThresholdDb ?? d.onsetSnrThresholdDb,
        onsetAbsThreshold: config?.onsetAbsThreshold ?? d.onsetAbsThreshold,
        minVoicedDurationMs: config?.minVoicedDurationMs ?? d.minVoicedDurationMs,
        hysteresisMs: config?.hysteresisMs ?? d.hysteresisMs,
        initialRadiusMs: config?.initialRadiusMs ?? d.initialRadiusMs,
        radiusIncrementMs: config?.radiusIncrementMs ?? d.radiusIncrementMs,
        maxExpansions: config?.maxExpansions ?? d.maxExpansions,
        earlyStopToleranceMs: config?.earlyStopToleranceMs ?? d.earlyStopToleranceMs,
        confidenceThreshold: config?.confidenceThreshold ?? d.confidenceThreshold,
        resampleHz: config?.resampleHz ?? d.resampleHz,
        previewPreMs: config?.previewPreMs ?? d.previewPreMs,
        previewPostMs: config?.previewPostMs ?? d.previewPostMs,
        logLevel: config?.logLevel ?? d.logLevel,
    };
}

/**
 * Merge caller overrides onto the defaults and validate the result.
 *
 * @throws ConfigError listing every invalid field.
 */
export function resolveScanConfig(input?: ScanConfigInput): ScanConfig {
    const parsed = scanConfigSchema.safeParse(withScanConfigDefaults(input));
    if (!parsed.success) {
        throw new ConfigError("invalid scan config", formatIssues(parsed.error));
    }
    return parsed.data;
}

const ENV_KEYS = {
    chunkDurationMs: "GAP_SCAN_CHUNK_DURATION_MS",
    chunkOverlapMs: "GAP_SCAN_CHUNK_OVERLAP_MS",
    frameDurationMs: "GAP_SCAN_FRAME_DURATION_MS",
    hopDurationMs: "GAP_SCAN_HOP_DURATION_MS",
    noiseFloorDurationMs: "GAP_SCAN_NOISE_FLOOR_DURATION_MS",
    onsetSnrThresholdDb: "GAP_SCAN_ONSET_SNR_THRESHOLD_DB",
    onsetAbsThreshold: "GAP_SCAN_ONSET_ABS_THRESHOLD",
    minVoicedDurationMs: "GAP_SCAN_MIN_VOICED_DURATION_MS",
    hysteresisMs: "GAP_SCAN_HYSTERESIS_MS",
    initialRadiusMs: "GAP_SCAN_INITIAL_RADIUS_MS",
    radiusIncrementMs: "GAP_SCAN_RADIUS_INCREMENT_MS",
    maxExpansions: "GAP_SCAN_MAX_EXPANSIONS",
    earlyStopToleranceMs: "GAP_SCAN_EARLY_STOP_TOLERANCE_MS",
    confidenceThreshold: "GAP_SCAN_CONFIDENCE_THRESHOLD",
    resampleHz: "GAP_SCAN_RESAMPLE_HZ",
    previewPreMs: "GAP_SCAN_PREVIEW_PRE_MS",
    previewPostMs: "GAP_SCAN_PREVIEW_POST_MS",
    logLevel: "GAP_SCAN_LOG_LEVEL",
} as const satisfies Record<keyof ScanConfig, string>;

const envNumber = z.coerce.number({ invalid_type_error: "must be a number" }).finite();

/**
 * Build a config from `GAP_SCAN_*` environment variables.
 *
 * Unset or empty variables fall back to the defaults.
 */
export function scanConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ScanConfig {
    const input: ScanConfigInput = {};
    const issues: string[] = [];

    for (const [field, envKey] of Object.entries(ENV_KEYS)) {
        const raw = env[envKey]?.trim();
        if (!raw) continue;

        if (field === "logLevel") {
            const level = z.enum(LOG_LEVELS).safeParse(raw);
            if (level.success) input.logLevel = level.data;
            else issues.push(`${envKey}: expected one of ${LOG_LEVELS.join(", ")}`);
            continue;
        }

        const value = envNumber.safeParse(raw);
        if (!value.success) {
            issues.push(`${envKey}: must be a number`);
            continue;
        }
        if (isNumericField(field)) input[field] = value.data;
    }

    if (issues.length > 0) {
        throw new ConfigError("invalid scan environment", issues);
    }
    return resolveScanConfig(input);
}

type NumericField = Exclude<keyof ScanConfig, "logLevel">;

function isNumericField(field: string): field is NumericField {
    return field !== "logLevel" && field in DEFAULT_SCAN_CONFIG;
}
