// src/core/errors.ts

// --- Error Types ---
export class RegressionError extends Error {
    constructor(
        message: string,
        public readonly context: Record<string, unknown> = {}
    ) {
        super(message);
        this.name = "RegressionError";
    }
}

/**
 * Missing, empty, non-numeric or unequal-length x/y data.
 */
export class InvalidInputError extends RegressionError {
    constructor(message: string, context: Record<string, unknown> = {}) {
        super(message, context);
        this.name = "InvalidInputError";
    }
}

export class DimensionMismatchError extends RegressionError {
    constructor(
        public readonly expected: number,
        public readonly received: number
    ) {
        super(
            `weights does not have same length with x (expected ${expected}, received ${received})`,
            { expected, received }
        );
        this.name = "DimensionMismatchError";
    }
}

/**
 * The weighted squared deviation of x is zero, so no unique slope exists.
 */
export class DegenerateFitError extends RegressionError {
    constructor(public readonly sqdevX: number) {
        super("x values all equal; slope undefined", { sqdevX });
        this.name = "DegenerateFitError";
    }
}

export class DivisionByZeroError extends RegressionError {
    constructor(message: string, context: Record<string, unknown> = {}) {
        super(message, context);
        this.name = "DivisionByZeroError";
    }
}

export class ConfigurationError extends Error {
    constructor(
        message: string,
        public readonly issues: string[] = []
    ) {
        super(
            issues.length > 0 ? `${message}: ${issues.join("; ")}` : message
        );
        this.name = "ConfigurationError";
    }
}
