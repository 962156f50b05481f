import { DEFAULT_SCAN_CONFIG } from "../config";
import { ConfigError } from "../errors";
import type { DetectionProvider } from "../provider/types";
import type { CancellationCheck, DetectionOutcome, Period, ScanStatus } from "../types";
import { silentLogger, type Logger } from "../util/log";

export type GapRequest = {
    filePath: string;
    expectedGapMs: number;
    isCancelled?: CancellationCheck;
};

export type GapResult = {
    method: string;
    status: ScanStatus;
    /** Whole milliseconds. */
    gapMs: number;
    /** Null when the scan was cancelled. */
    confidence: number | null;
    needsReview: boolean;
    outcome: DetectionOutcome;
};

export type DetectGapOptions = {
    confidenceThreshold?: number;
    logger?: Logger;
};

/**
 * Gap implied by `periods`: the silence end (vocals resuming) closest to
 * `expectedGapMs`, the first one on ties. No silence means vocals start at 0.
 */
export function detectGapFromSilence(periods: readonly Period[], expectedGapMs: number): number {
    let gapMs = 0;
    let bestDistance = Infinity;
    for (const [, endMs] of periods) {
        const distance = Math.abs(endMs - expectedGapMs);
        if (distance < bestDistance) {
            bestDistance = distance;
            gapMs = endMs;
        }
    }
    return gapMs;
}

export function validateGapRequest(request: GapRequest): void {
    const issues: string[] = [];
    if (request.filePath.trim() === "") issues.push("filePath must not be empty");
    if (!Number.isFinite(request.expectedGapMs) || request.expectedGapMs < 0) {
        issues.push(`expectedGapMs must be a non-negative number, got ${request.expectedGapMs}`);
    }
    if (issues.length > 0) throw new ConfigError("invalid gap request", issues);
}

/**
 * Detect the vocal gap of one song: scan, pick the gap, score it.
 *
 * Results that were not found or fall under the confidence threshold are
 * flagged for review.
 */
export async function detectGap(
    request: GapRequest,
    provider: DetectionProvider,
    options: DetectGapOptions = {}
): Promise<GapResult> {
    validateGapRequest(request);
    const threshold = options.confidenceThreshold ?? DEFAULT_SCAN_CONFIG.confidenceThreshold;
    const log = options.logger ?? silentLogger;
    const callOptions = { isCancelled: request.isCancelled };

    const outcome = await provider.detectSilencePeriods(request.filePath, request.expectedGapMs, callOptions);
    const gapMs = Math.round(detectGapFromSilence(outcome.silencePeriods, request.expectedGapMs));

    const confidence =
        outcome.status === "cancelled"
            ? null
            : await provider.computeConfidence(request.filePath, gapMs, callOptions);
    const needsReview = outcome.status !== "found" || (confidence !== null && confidence < threshold);

    log.info(
        `${request.filePath}: gap=${gapMs}ms (expected ${request.expectedGapMs}ms) ` +
            `confidence=${confidence?.toFixed(3) ?? "n/a"}${needsReview ? " review" : ""}`
    );

    return {
        method: provider.methodName(),
        status: outcome.status,
        gapMs,
        confidence,
        needsReview,
        outcome,
    };
}
