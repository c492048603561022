// src/regression/regressionModel.ts
import type { ILogger } from "../infrastructure/loggerInterface.js";
import { Logger } from "../infrastructure/logger.js";
import type {
    RegressionConfig,
    RegressionConfigInput,
} from "../core/config.js";
import { parseConfig } from "../core/config.js";
import {
    DegenerateFitError,
    DimensionMismatchError,
    DivisionByZeroError,
    InvalidInputError,
    RegressionError,
} from "../core/errors.js";
import { nPercentile } from "../utils/percentile.js";
import { validateVector, withoutIndex } from "../utils/vectorValidation.js";
import type {
    Coefficients,
    InfluentialPoint,
    PercentileRank,
    RegressionSummary,
    WeightedSums,
} from "./types.js";

export interface RegressionModelOptions {
    x?: readonly number[];
    y?: readonly number[];
    weight?: readonly number[];
    logger?: ILogger;
    config?: RegressionConfigInput;
}

/**
 * Least squares line fit (y = a + b * x) with Cook's distance diagnostics.
 *
 * The model is state-oriented: the fit is computed lazily and cached until
 * `x` or `y` is replaced. In-place mutation is never observed because the
 * setters keep a validated copy of the vector they are given. Replacing
 * `weight` does not invalidate the cached fit; call `fit()` to refit.
 */
export class RegressionModel {
    private xValues: number[];
    private yValues: number[];
    private weightValues: number[] | undefined;

    private fittedSlope = 0;
    private fittedIntercept = 0;
    private fitDone = false;

    private readonly logger: ILogger;
    private readonly cfg: RegressionConfig;

    constructor(options: RegressionModelOptions = {}) {
        this.cfg = parseConfig(options.config ?? {});
        this.logger = options.logger ?? new Logger(this.cfg.logging);

        this.xValues = validateVector("x", options.x ?? []);
        this.yValues = validateVector("y", options.y ?? []);
        this.weightValues =
            options.weight === undefined
                ? undefined
                : validateVector("weight", options.weight);

        const n = this.xValues.length;
        if (n > 0 && this.yValues.length > 0 && n !== this.yValues.length) {
            this.fail(
                "constructor",
                new InvalidInputError("x and y length is not same", {
                    xLength: n,
                    yLength: this.yValues.length,
                })
            );
        }
        if (this.weightValues && n > 0 && this.weightValues.length !== n) {
            this.fail(
                "constructor",
                new DimensionMismatchError(n, this.weightValues.length)
            );
        }
    }

    public get x(): readonly number[] {
        return this.xValues;
    }

    public set x(values: readonly number[]) {
        this.xValues = validateVector("x", values);
        this.fitDone = false;
    }

    public get y(): readonly number[] {
        return this.yValues;
    }

    public set y(values: readonly number[]) {
        this.yValues = validateVector("y", values);
        this.fitDone = false;
    }

    public get weight(): readonly number[] | undefined {
        return this.weightValues;
    }

    public set weight(values: readonly number[] | undefined) {
        this.weightValues =
            values === undefined ? undefined : validateVector("weight", values);
    }

    public get slope(): number | undefined {
        return this.fitDone ? this.fittedSlope : undefined;
    }

    public get intercept(): number | undefined {
        return this.fitDone ? this.fittedIntercept : undefined;
    }

    public get fitComputed(): boolean {
        return this.fitDone;
    }

    public get config(): Readonly<RegressionConfig> {
        return this.cfg;
    }

    /**
     * Weighted sums used by fit(). Recomputed on every call.
     */
    public computeSums(): WeightedSums {
        const x = this.xValues;
        const y = this.yValues;
        const weights = this.weightValues;
        if (weights && weights.length !== x.length) {
            this.fail(
                "computeSums",
                new DimensionMismatchError(x.length, weights.length)
            );
        }

        const sums: WeightedSums = { x: 0, y: 0, xx: 0, yy: 0, xy: 0 };
        for (let i = 0; i < x.length; i++) {
            const w = weights ? weights[i] : 1;
            sums.x += w * x[i];
            sums.y += w * y[i];
            sums.xx += w * x[i] ** 2;
            sums.yy += w * y[i] ** 2;
            sums.xy += w * x[i] * y[i];
        }
        return sums;
    }

    /**
     * Do the least squares line fit and cache the result.
     *
     * Other methods invoke this as needed; calling it directly refits the
     * current data.
     */
    public fit(): Coefficients {
        const n = this.xValues.length;
        if (
            n === 0 ||
            this.yValues.length === 0 ||
            n !== this.yValues.length
        ) {
            this.fail(
                "fit",
                new InvalidInputError("no data or length mismatch", {
                    xLength: n,
                    yLength: this.yValues.length,
                })
            );
        }

        const sums = this.computeSums();
        const sqdevX = sums.xx - sums.x ** 2 / n;
        if (Math.abs(sqdevX) <= this.cfg.degenerateTolerance) {
            this.fail("fit", new DegenerateFitError(sqdevX));
        }

        const sqdevXY = sums.xy - (sums.x * sums.y) / n;
        const slope = sqdevXY / sqdevX;
        const intercept = (sums.y - slope * sums.x) / n;

        this.fittedSlope = slope;
        this.fittedIntercept = intercept;
        this.fitDone = true;

        this.logger.debug("Least squares fit computed", {
            component: "RegressionModel",
            n,
            weighted: this.weightValues !== undefined,
            slope,
            intercept,
        });
        return [intercept, slope];
    }

    public coefficients(): Coefficients {
        if (this.fitDone) {
            return [this.fittedIntercept, this.fittedSlope];
        }
        return this.fit();
    }

    public fitted(): number[] {
        const [intercept, slope] = this.coefficients();
        return this.xValues.map((x) => intercept + slope * x);
    }

    public residuals(): number[] {
        const yf = this.fitted();
        return this.yValues.map((y, i) => y - yf[i]);
    }

    /**
     * Cook's distance of every observation, in index order.
     *
     * Each distance refits the data without that observation. Weights are only
     * carried into the leave-one-out fits when `leaveOneOutWeights` is set.
     */
    public cooksDistance(): number[] {
        const residuals = this.residuals();
        const yf = this.fitted();
        const x = this.xValues;
        const y = this.yValues;
        const n = y.length;

        const sumSquaredResiduals = residuals.reduce(
            (acc, r) => acc + r ** 2,
            0
        );
        if (
            sumSquaredResiduals === 0 &&
            this.cfg.zeroResidualPolicy === "throw"
        ) {
            this.fail(
                "cooksDistance",
                new DivisionByZeroError(
                    "sum of squared residuals is zero; Cook's distance undefined",
                    { n }
                )
            );
        }

        const cooks: number[] = [];
        for (let i = 0; i < n; i++) {
            const reduced = new RegressionModel({
                x: withoutIndex(x, i),
                y: withoutIndex(y, i),
                weight:
                    this.cfg.leaveOneOutWeights && this.weightValues
                        ? withoutIndex(this.weightValues, i)
                        : undefined,
                logger: this.logger,
                config: this.cfg,
            });
            const [a, b] = reduced.coefficients();

            let sumSquaredShift = 0;
            for (let j = 0; j < n; j++) {
                sumSquaredShift += (yf[j] - (a + b * x[j])) ** 2;
            }
            const cook = (sumSquaredShift * (n - 2)) / sumSquaredResiduals / 2;
            cooks.push(cook);

            if (this.logger.isDebugEnabled()) {
                this.logger.debug("Leave-one-out distance computed", {
                    component: "RegressionModel",
                    index: i,
                    intercept: a,
                    slope: b,
                    cook,
                });
            }
        }
        return cooks;
    }

    /**
     * Observations whose Cook's distance strictly exceeds `threshold`
     * (configured `influenceThreshold`, else 4/n).
     */
    public influentialPoints(threshold?: number): InfluentialPoint[] {
        const distances = this.cooksDistance();
        const limit =
            threshold ??
            this.cfg.influenceThreshold ??
            4 / distances.length;

        const points: InfluentialPoint[] = [];
        distances.forEach((distance, index) => {
            if (distance > limit) {
                points.push({
                    index,
                    x: this.xValues[index],
                    y: this.yValues[index],
                    distance,
                });
            }
        });
        return points;
    }

    public summary(): RegressionSummary {
        const [intercept, slope] = this.coefficients();
        const fitted = this.fitted();
        const residuals = this.residuals();
        return {
            n: this.xValues.length,
            intercept,
            slope,
            fitted,
            residuals,
            residualSumOfSquares: residuals.reduce(
                (acc, r) => acc + r ** 2,
                0
            ),
        };
    }

    /**
     * N-percentile rank of `values`: N50 by default, `N(values, 90)` for N90.
     * Independent of the regression state.
     */
    public N(
        values: readonly number[],
        percentile: number = this.cfg.defaultPercentile
    ): PercentileRank | undefined {
        return nPercentile(values, percentile);
    }

    private fail(operation: string, error: RegressionError): never {
        this.logger.warn(`[RegressionModel] ${operation} failed`, {
            component: "RegressionModel",
            operation,
            error: error.name,
            message: error.message,
            ...error.context,
        });
        throw error;
    }
}
