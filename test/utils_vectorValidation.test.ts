import { describe, it, expect } from "vitest";
import {
    formatIssues,
    validateVector,
    VectorSchema,
    withoutIndex,
} from "../src/utils/vectorValidation.js";
import { InvalidInputError } from "../src/core/errors.js";

describe("utils/vectorValidation", () => {
    it("returns a copy of a valid vector", () => {
        const input = [1, 2.5, -3];
        const result = validateVector("x", input);
        expect(result).toEqual([1, 2.5, -3]);
        expect(result).not.toBe(input);
    });

    it("accepts an empty vector", () => {
        expect(validateVector("y", [])).toEqual([]);
    });

    it("reports the offending index", () => {
        expect(() => validateVector("weight", [1, Infinity])).toThrow(
            InvalidInputError
        );
        try {
            validateVector("weight", [1, Infinity]);
        } catch (error) {
            expect(error).toBeInstanceOf(InvalidInputError);
            if (error instanceof InvalidInputError) {
                expect(error.context["vector"]).toBe("weight");
                expect(error.context["issues"]).toEqual([
                    "1: Number must be finite",
                ]);
            }
        }
    });

    it("formats schema issues with their path", () => {
        const result = VectorSchema.safeParse([1, Infinity, 2]);
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(formatIssues(result.error)).toEqual([
                "1: Number must be finite",
            ]);
        }
    });

    it("removes a single index", () => {
        expect(withoutIndex([1, 2, 3, 4], 0)).toEqual([2, 3, 4]);
        expect(withoutIndex([1, 2, 3, 4], 3)).toEqual([1, 2, 3]);
        expect(withoutIndex([7, 7, 7], 1)).toEqual([7, 7]);
    });
});
