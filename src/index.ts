// src/index.ts

export {
    RegressionModel,
    type RegressionModelOptions,
} from "./regression/regressionModel.js";
export type {
    Coefficients,
    InfluentialPoint,
    PercentileRank,
    RegressionSummary,
    WeightedSums,
} from "./regression/types.js";

export { nPercentile } from "./utils/percentile.js";
export { validateVector, VectorSchema } from "./utils/vectorValidation.js";

export {
    DEFAULT_CONFIG,
    DEFAULT_CONFIG_FILE,
    RegressionConfigSchema,
    loadConfig,
    parseConfig,
    type LoggingConfig,
    type RegressionConfig,
    type RegressionConfigInput,
} from "./core/config.js";
export {
    ConfigurationError,
    DegenerateFitError,
    DimensionMismatchError,
    DivisionByZeroError,
    InvalidInputError,
    RegressionError,
} from "./core/errors.js";

export { Logger } from "./infrastructure/logger.js";
export type { ILogger } from "./infrastructure/loggerInterface.js";
