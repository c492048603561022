// src/utils/percentile.ts
import type { PercentileRank } from "../regression/types.js";

/**
 * N-percentile by mass: the first sorted value at which the running sum
 * strictly exceeds `percentile`% of the total. N50 by default, so
 * `nPercentile(lengths, 90)` gives N90.
 *
 * Returns undefined when no value crosses the threshold (empty input, or a
 * threshold at or above the total).
 */
export function nPercentile(
    values: readonly number[],
    percentile = 50
): PercentileRank | undefined {
    const sorted = [...values].sort((a, b) => a - b);
    const total = sorted.reduce((acc, v) => acc + v, 0);
    const threshold = (total * percentile) / 100;

    let running = 0;
    for (let i = 0; i < sorted.length; i++) {
        const value = sorted[i];
        running += value;
        if (running > threshold) {
            return { value, rank: i + 1 };
        }
    }
    return undefined;
}
