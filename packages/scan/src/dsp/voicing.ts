/**
 * Frame-level voicing decisions on an RMS envelope.
 *
 * Pipeline stages:
 * 1. Candidate mask: frames loud enough relative to the noise floor AND in absolute terms
 * 2. Voiced runs: candidate frames joined across dips no longer than the hysteresis span
 * 3. Minimum duration: runs shorter than the sustain requirement are dropped
 */

import { ratioDb } from "./energy";

/** `[startFrame, endFrame)`; `endFrame - 1` is the last candidate frame of the run. */
export type VoicedRun = {
    startFrame: number;
    endFrame: number;
};

/**
 * Mark frames whose level clears both thresholds.
 *
 * @param frameRms - Per-frame RMS values
 * @param noiseFloorRms - RMS of the noise reference span
 * @param snrThresholdDb - Minimum level above the noise floor, in dB
 * @param absThreshold - Minimum RMS regardless of the noise floor
 * @returns Candidate mask (1 = candidate, 0 = not)
 */
export function buildCandidateMask(
    frameRms: Float32Array,
    noiseFloorRms: number,
    snrThresholdDb: number,
    absThreshold: number
): Uint8Array {
    const nFrames = frameRms.length;
    const mask = new Uint8Array(nFrames);

    for (let t = 0; t < nFrames; t++) {
        const level = frameRms[t] ?? 0;
        mask[t] = level >= absThreshold && ratioDb(level, noiseFloorRms) >= snrThresholdDb ? 1 : 0;
    }

    return mask;
}

/**
 * Group candidate frames into runs with hysteresis.
 *
 * State machine:
 * - IDLE: candidate frame -> open a run
 * - IN RUN: candidate frame -> extend run, reset dip counter
 * - IN RUN: non-candidate frame -> count dip
 * - IN RUN: dip longer than hysteresisFrames -> close run at its last candidate frame
 *
 * @param mask - Candidate mask from buildCandidateMask
 * @param hysteresisFrames - Longest tolerated run of non-candidate frames inside a run
 */
export function findVoicedRuns(mask: Uint8Array, hysteresisFrames: number): VoicedRun[] {
    const runs: VoicedRun[] = [];
    let runStart = -1;
    let lastCandidate = -1;
    let dip = 0;

    for (let t = 0; t < mask.length; t++) {
        const isCandidate = (mask[t] ?? 0) === 1;

        if (runStart < 0) {
            if (isCandidate) {
                runStart = t;
                lastCandidate = t;
                dip = 0;
            }
            continue;
        }

        if (isCandidate) {
            lastCandidate = t;
            dip = 0;
        } else if (++dip > hysteresisFrames) {
            runs.push({ startFrame: runStart, endFrame: lastCandidate + 1 });
            runStart = -1;
        }
    }

    if (runStart >= 0) {
        runs.push({ startFrame: runStart, endFrame: lastCandidate + 1 });
    }

    return runs;
}

/** Keep runs spanning at least `minFrames` frames. */
export function applyMinRunDuration(runs: readonly VoicedRun[], minFrames: number): VoicedRun[] {
    if (minFrames <= 1) return runs.slice();
    return runs.filter((run) => run.endFrame - run.startFrame >= minFrames);
}
