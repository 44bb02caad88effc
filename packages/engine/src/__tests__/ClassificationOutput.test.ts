/**
 * @fileoverview Unit tests for ClassificationOutput
 *
 * Tests cover:
 * - createClassificationOutput factory function
 * - Confidence range checks
 * - Immutability of created objects
 *
 * @module engine/__tests__/ClassificationOutput
 */

import { describe, it, expect } from "vitest";
import { createClassificationOutput } from "../contracts/ClassificationOutput.js";

describe("ClassificationOutput", () => {
    describe("createClassificationOutput", () => {
        // Scenario: Label and confidence only
        it("should default tags to an empty list", () => {
            const output = createClassificationOutput("<50K", 0.6);

            expect(output).toEqual({ type: "<50K", confidence: 0.6, tags: [] });
        });

        // Scenario: Label, confidence and evidence attributes
        it("should create output with all fields", () => {
            const output = createClassificationOutput(">=50K", 0.72, ["Work", "Education"]);

            expect(output.type).toBe(">=50K");
            expect(output.confidence).toBe(0.72);
            expect(output.tags).toEqual(["Work", "Education"]);
        });

        // Scenario: Bounds are inclusive
        it("should accept confidences of 0 and 1", () => {
            expect(createClassificationOutput("<50K", 0).confidence).toBe(0);
            expect(createClassificationOutput("<50K", 1).confidence).toBe(1);
        });

        // Scenario: Out-of-range confidence
        it("should reject confidences outside [0, 1]", () => {
            expect(() => createClassificationOutput("<50K", 1.5)).toThrow(
                "Confidence must be between 0 and 1, got 1.5"
            );
            expect(() => createClassificationOutput("<50K", -0.1)).toThrow(RangeError);
            expect(() => createClassificationOutput("<50K", Number.NaN)).toThrow(RangeError);
        });

        // Scenario: Output is frozen and tags are copied
        it("should freeze the output and copy the tags", () => {
            const tags = ["Work"];
            const output = createClassificationOutput("<50K", 0.5, tags);
            tags.push("Gender");

            expect(Object.isFrozen(output)).toBe(true);
            expect(Object.isFrozen(output.tags)).toBe(true);
            expect(output.tags).toEqual(["Work"]);
        });
    });
});
