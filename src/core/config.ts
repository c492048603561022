// src/core/config.ts
import { readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { formatIssues } from "../utils/vectorValidation.js";

export const DEFAULT_CONFIG_FILE = "regression.config.json";

export const LoggingSchema = z.object({
    level: z
        .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
        .default("info"),
    pretty: z.boolean().default(false),
    name: z.string().min(1).default("regression-influence"),
});

export const RegressionConfigSchema = z.object({
    // N() threshold when the caller passes none
    defaultPercentile: z.number().min(0).max(100).default(50),
    // 0 keeps the exact sqdevX == 0 test
    degenerateTolerance: z.number().min(0).default(0),
    zeroResidualPolicy: z.enum(["throw", "propagate"]).default("throw"),
    leaveOneOutWeights: z.boolean().default(false),
    influenceThreshold: z.number().positive().optional(),
    logging: LoggingSchema.default({}),
});

export type LoggingConfig = z.infer<typeof LoggingSchema>;
export type RegressionConfig = z.infer<typeof RegressionConfigSchema>;
export type RegressionConfigInput = z.input<typeof RegressionConfigSchema>;

export function parseConfig(raw: unknown): RegressionConfig {
    const result = RegressionConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigurationError(
            "Invalid regression configuration",
            formatIssues(result.error)
        );
    }
    return result.data;
}

export const DEFAULT_CONFIG: RegressionConfig = parseConfig({});

/**
 * Load and validate a JSON configuration file.
 */
export function loadConfig(
    path: string = resolve(process.cwd(), DEFAULT_CONFIG_FILE)
): RegressionConfig {
    let rawConfig: unknown;
    try {
        rawConfig = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
        throw new ConfigurationError(
            `Failed to read configuration from ${path}`,
            [error instanceof Error ? error.message : String(error)]
        );
    }
    return parseConfig(rawConfig);
}
