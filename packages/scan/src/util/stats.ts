export type MinMax = {
    min: number;
    max: number;
};

/**
 * Compute min/max in a single pass without using spread / Math.min(...arr).
 *
 * Safe for very large arrays (millions of samples).
 */
export function minMax(values: ArrayLike<number>): MinMax {
    const n = values.length >>> 0;
    if (n === 0) return { min: Infinity, max: -Infinity };

    let min = Infinity;
    let max = -Infinity;

    for (let i = 0; i < n; i++) {
        const v = values[i] ?? 0;
        if (v < min) min = v;
        if (v > max) max = v;
    }

    return { min, max };
}

export function mean(values: ArrayLike<number>): number {
    const n = values.length >>> 0;
    if (n === 0) return 0;

    let sum = 0;
    for (let i = 0; i < n; i++) sum += values[i] ?? 0;
    return sum / n;
}

export function clamp(value: number, lo: number, hi: number): number {
    return Math.max(lo, Math.min(hi, value));
}
