/**
 * @fileoverview Unit tests for CheckResult
 *
 * Tests cover:
 * - Threshold comparison in both directions
 * - Oriented margins
 * - Verdict aggregation, including the all-inapplicable case
 * - Immutability of created results and samples
 *
 * @module @limitcheck/engine/__tests__/CheckResult
 */

import { describe, it, expect } from "vitest";
import {
    aggregateVerdict,
    createCheckResult,
    createInapplicableResult,
    createSample,
    createSkippedSample,
    isPassing,
    marginOf,
    meetsThreshold,
} from "../contracts/CheckResult.js";

describe("CheckResult", () => {
    describe("meetsThreshold", () => {
        // Scenario: "below" is strict
        it("should pass below the threshold and fail at it", () => {
            expect(meetsThreshold(1.5, 2, "below")).toBe(true);
            expect(meetsThreshold(2, 2, "below")).toBe(false);
            expect(meetsThreshold(2.5, 2, "below")).toBe(false);
        });

        // Scenario: "atLeast" includes equality
        it("should pass at or above the threshold", () => {
            expect(meetsThreshold(1, 1, "atLeast")).toBe(true);
            expect(meetsThreshold(1.2, 1, "atLeast")).toBe(true);
            expect(meetsThreshold(0.9, 1, "atLeast")).toBe(false);
        });
    });

    describe("marginOf", () => {
        // Scenario: Positive margin means the passing side
        it("should orient the margin towards the passing side", () => {
            expect(marginOf(0.5, 2, "below")).toBe(1.5);
            expect(marginOf(3, 2, "below")).toBe(-1);
            expect(marginOf(1.5, 1, "atLeast")).toBe(0.5);
            expect(marginOf(0.5, 1, "atLeast")).toBe(-0.5);
        });
    });

    describe("aggregateVerdict", () => {
        // Scenario: Any failure dominates
        it("should fail when any verdict fails", () => {
            expect(aggregateVerdict(["pass", "inapplicable", "fail", "pass"])).toBe("fail");
        });

        // Scenario: Inapplicable entries do not block a pass
        it("should pass when every applicable verdict passes", () => {
            expect(aggregateVerdict(["inapplicable", "pass"])).toBe("pass");
        });

        // Scenario: Nothing applicable is not a pass
        it("should be inapplicable for an empty or all-inapplicable list", () => {
            expect(aggregateVerdict([])).toBe("inapplicable");
            expect(aggregateVerdict(["inapplicable", "inapplicable"])).toBe("inapplicable");
        });
    });

    describe("createCheckResult", () => {
        // Scenario: Verdict and margin derived from the measurement
        it("should compute verdict and margin", () => {
            const result = createCheckResult("ntm", {
                value     : 0.0163,
                threshold : 0.02,
                comparison: "below",
            });

            expect(result.id).toBe("ntm");
            expect(result.verdict).toBe("pass");
            expect(result.margin).toBeCloseTo(0.0037, 10);
            expect(result.informational).toBe(false);
            expect(result.samples).toEqual([]);
        });

        // Scenario: Explicit verdict wins over the comparison
        it("should keep an explicit verdict", () => {
            const result = createCheckResult("scan", {
                value     : 0.1,
                threshold : 1,
                comparison: "below",
                verdict   : "fail",
            });

            expect(result.verdict).toBe("fail");
            expect(result.margin).toBeCloseTo(0.9, 10);
        });

        // Scenario: Informational results always pass
        it("should pass informational results regardless of value", () => {
            const result = createCheckResult("elm", {
                value        : 5,
                threshold    : 1,
                comparison   : "below",
                informational: true,
            });

            expect(result.verdict).toBe("pass");
            expect(result.margin).toBe(-4);
        });

        // Scenario: Result and sample list are frozen copies
        it("should freeze the result and copy its samples", () => {
            const samples = [createSample("r=0.10", 0.2, 1, "below")];
            const result = createCheckResult("scan", {
                value     : 0.2,
                threshold : 1,
                comparison: "below",
                samples,
            });

            expect(Object.isFrozen(result)).toBe(true);
            expect(Object.isFrozen(result.samples)).toBe(true);
            expect(result.samples).not.toBe(samples);
            expect(result.samples).toEqual(samples);
        });
    });

    describe("samples", () => {
        // Scenario: Evaluated sample
        it("should create a frozen evaluated sample", () => {
            const sample = createSample("m/n=2/1", -0.8, 0, "below");

            expect(sample).toEqual({
                label    : "m/n=2/1",
                value    : -0.8,
                threshold: 0,
                verdict  : "pass",
                margin   : 0.8,
            });
            expect(Object.isFrozen(sample)).toBe(true);
        });

        // Scenario: Skipped sample carries no value
        it("should create a skipped sample with null value and margin", () => {
            expect(createSkippedSample("m/n=10/1", 0)).toEqual({
                label    : "m/n=10/1",
                value    : null,
                threshold: 0,
                verdict  : "inapplicable",
                margin   : null,
            });
        });
    });

    describe("createInapplicableResult", () => {
        // Scenario: Inapplicable results do not fail
        it("should create a non-failing result without a value", () => {
            const result = createInapplicableResult("tearing", 0, "below", [
                createSkippedSample("m/n=10/1", 0),
            ]);

            expect(result.verdict).toBe("inapplicable");
            expect(result.value).toBeNull();
            expect(result.margin).toBeNull();
            expect(result.samples).toHaveLength(1);
            expect(isPassing(result)).toBe(true);
            expect(Object.isFrozen(result)).toBe(true);
        });
    });

    describe("isPassing", () => {
        // Scenario: Only "fail" fails
        it("should report failing results", () => {
            const failing = createCheckResult("kink", { value: 3, threshold: 2.8, comparison: "below" });

            expect(isPassing(failing)).toBe(false);
        });
    });
});
