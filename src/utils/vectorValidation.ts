// src/utils/vectorValidation.ts
import { z } from "zod";
import { InvalidInputError } from "../core/errors.js";

export const VectorSchema = z.array(z.number().finite());

export type Vector = z.infer<typeof VectorSchema>;

export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) =>
        issue.path.length > 0
            ? `${issue.path.join(".")}: ${issue.message}`
            : issue.message
    );
}

/**
 * Validate a numeric vector at the API boundary and return a copy of it.
 */
export function validateVector(
    name: string,
    value: readonly number[]
): Vector {
    const result = VectorSchema.safeParse(value);
    if (!result.success) {
        const issues = formatIssues(result.error);
        throw new InvalidInputError(
            `${name} must be an array of finite numbers: ${issues.join("; ")}`,
            { vector: name, issues }
        );
    }
    return result.data;
}

export function withoutIndex(values: readonly number[], index: number): number[] {
    return values.filter((_, i) => i !== index);
}
