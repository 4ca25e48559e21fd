/**
 * @fileoverview Unit tests for BallooningEvaluator
 *
 * Tests cover:
 * - Local α and α_crit at a sample radius
 * - Weakest-sample reporting across the radial scan
 * - Aggregate verdict follows the samples
 *
 * @module __tests__/BallooningEvaluator
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { CheckLogger } from "@limitcheck/engine";
import { createEquilibrium, deriveReferenceEquilibrium } from "../domain/equilibrium/index.js";
import { BallooningEvaluator, evaluateBallooningAt } from "../domain/evaluators/index.js";
import { getDefaultLimits, shapingFactor } from "../domain/limits/index.js";

const limits = getDefaultLimits();
const reference = deriveReferenceEquilibrium(limits.goldenRatio);

function createMockLogger(): CheckLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

describe("BallooningEvaluator", () => {
    let logger: CheckLogger;
    let evaluator: BallooningEvaluator;

    beforeEach(() => {
        logger = createMockLogger();
        evaluator = new BallooningEvaluator();
    });

    it("should compute the shaping factor 1 + 0.5κ + 0.3δ", () => {
        expect(shapingFactor(limits.ballooning, 1.7, 0.4)).toBeCloseTo(1.97, 12);
    });

    describe("evaluateBallooningAt", () => {
        // Scenario: Edge sample
        it("should evaluate q, α and α_crit at r = 0.95", () => {
            const sample = evaluateBallooningAt(reference, limits.ballooning, 0.95);

            expect(sample.q).toBeCloseTo(2.805, 10);
            expect(sample.alpha).toBeCloseTo(0.243673, 6);
            expect(sample.alphaCritical).toBeCloseTo(0.542324, 6);
            expect(sample.stable).toBe(true);
        });
    });

    describe("evaluate", () => {
        // Scenario: Reference design is ballooning-stable
        it("should pass the reference design and report the weakest sample", () => {
            const result = evaluator.evaluate(reference, { config: limits, logger, traceId: "tr_test" });

            expect(result.id).toBe("ballooning");
            expect(result.verdict).toBe("pass");
            expect(result.value).toBeCloseTo(0.0033917, 6);
            expect(result.threshold).toBeCloseTo(0.0454441, 6);
            expect(result.margin).toBeCloseTo(0.0420524, 6);
            expect(result.samples).toHaveLength(10);
            expect(result.samples[0].label).toBe("r=0.10");
            expect(result.samples[9].label).toBe("r=0.95");
            expect(result.samples.every(s => s.verdict === "pass")).toBe(true);
        });

        it("should log a scan summary at debug level", () => {
            evaluator.evaluate(reference, { config: limits, logger, traceId: "tr_test" });

            expect(logger.debug).toHaveBeenCalledWith("Radial scan complete", {
                samples : 10,
                unstable: 0,
                weakestR: 0.1,
            });
        });

        // Scenario: One failing sample flips the aggregate
        it("should fail when only the edge sample is unstable", () => {
            const highBeta = createEquilibrium({ ...reference, beta: 0.04 });

            const result = evaluator.evaluate(highBeta, { config: limits, logger, traceId: "tr_test" });

            expect(result.verdict).toBe("fail");
            expect(result.samples.filter(s => s.verdict === "fail").map(s => s.label)).toEqual(["r=0.95"]);
            expect(result.value).toBeCloseTo(0.59797, 5);
            expect(result.margin).toBeCloseTo(-0.055646, 6);
        });
    });
});
