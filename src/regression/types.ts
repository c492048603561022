// src/regression/types.ts

/**
 * Weighted sums over the current observations.
 */
export interface WeightedSums {
    x: number; // Σwx
    y: number; // Σwy
    xx: number; // Σwx²
    yy: number; // Σwy²
    xy: number; // Σwxy
}

// Intercept first, matching fit() and coefficients()
export type Coefficients = readonly [intercept: number, slope: number];

export interface PercentileRank {
    value: number;
    rank: number; // 1-based count of sorted values consumed
}

export interface InfluentialPoint {
    index: number;
    x: number;
    y: number;
    distance: number;
}

export interface RegressionSummary {
    n: number;
    intercept: number;
    slope: number;
    fitted: number[];
    residuals: number[];
    residualSumOfSquares: number;
}
