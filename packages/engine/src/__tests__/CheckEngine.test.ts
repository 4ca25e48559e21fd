/**
 * @fileoverview Unit tests for CheckEngine
 *
 * Tests cover:
 * - Suite registration and validation
 * - Evaluators run in order with the suite config
 * - Verdict aggregation (inapplicable and informational results)
 * - Event emission
 * - All-or-nothing error handling
 *
 * @module @limitcheck/engine/__tests__/CheckEngine
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { CheckEngine, type SuiteRegistration } from "../engine/CheckEngine.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import type { CheckLogger, Evaluator } from "../contracts/Evaluator.js";
import { isEvaluator } from "../contracts/Evaluator.js";
import {
    createCheckResult,
    createInapplicableResult,
} from "../contracts/CheckResult.js";
import type { EventPayload } from "../contracts/EventBus.js";

interface Beam {
    readonly load: number;
}

interface BeamLimits {
    readonly maxLoad: number;
    readonly minLoad: number;
}

type BeamCheck = "max" | "min" | "skip" | "note" | "broken";

const limits: BeamLimits = { maxLoad: 10, minLoad: 2 };

const maxLoad: Evaluator<Beam, BeamLimits, BeamCheck> = {
    id  : "max",
    name: "Maximum load",
    evaluate(beam, { config }) {
        return createCheckResult("max", {
            value     : beam.load,
            threshold : config.maxLoad,
            comparison: "below",
        });
    },
};

const minLoad: Evaluator<Beam, BeamLimits, BeamCheck> = {
    id: "min",
    evaluate(beam, { config }) {
        return createCheckResult("min", {
            value     : beam.load,
            threshold : config.minLoad,
            comparison: "atLeast",
        });
    },
};

const skip: Evaluator<Beam, BeamLimits, BeamCheck> = {
    id: "skip",
    evaluate(_beam, { logger }) {
        logger.warn("Nothing to check");
        return createInapplicableResult("skip", 0, "below");
    },
};

const note: Evaluator<Beam, BeamLimits, BeamCheck> = {
    id: "note",
    evaluate(beam) {
        return createCheckResult("note", {
            value        : beam.load * 100,
            threshold    : 1,
            comparison   : "below",
            informational: true,
        });
    },
};

const broken: Evaluator<Beam, BeamLimits, BeamCheck> = {
    id: "broken",
    evaluate() {
        throw new Error("sensor offline");
    },
};

function createMockLogger(): CheckLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

function suite(
    evaluators: Evaluator<Beam, BeamLimits, BeamCheck>[],
    id = "beam"
): SuiteRegistration<Beam, BeamLimits, BeamCheck> {
    return { id, name: "Beam limits", evaluators, config: limits };
}

describe("CheckEngine", () => {
    let engine: CheckEngine<Beam, BeamLimits, BeamCheck>;
    let eventBus: InMemoryEventBus;
    let logger: CheckLogger;

    beforeEach(() => {
        eventBus = new InMemoryEventBus();
        logger = createMockLogger();
        engine = new CheckEngine({ eventBus, logger });
    });

    describe("registerSuite", () => {
        // Scenario: Registered suites are listed
        it("should register and unregister suites", () => {
            engine.registerSuite(suite([maxLoad]));
            engine.registerSuite(suite([minLoad], "beam-min"));

            expect(engine.suiteIds).toEqual(["beam", "beam-min"]);

            engine.unregisterSuite("beam");
            expect(engine.suiteIds).toEqual(["beam-min"]);
        });

        // Scenario: Duplicate suite ids rejected
        it("should reject a duplicate suite id", () => {
            engine.registerSuite(suite([maxLoad]));

            expect(() => engine.registerSuite(suite([minLoad]))).toThrow("Suite already registered: beam");
        });

        // Scenario: Empty suites rejected
        it("should reject a suite without evaluators", () => {
            expect(() => engine.registerSuite(suite([]))).toThrow("Suite has no evaluators: beam");
        });

        // Scenario: Duplicate evaluator ids rejected
        it("should reject two evaluators with the same id", () => {
            expect(() => engine.registerSuite(suite([maxLoad, maxLoad])))
                .toThrow("Duplicate evaluator id in suite beam: max");
        });
    });

    describe("run", () => {
        // Scenario: Unknown suite
        it("should throw for an unknown suite", () => {
            expect(() => engine.run("missing", { load: 1 })).toThrow("Unknown suite: missing");
        });

        // Scenario: Results follow registration order and use the config
        it("should run every evaluator in order against the suite config", () => {
            engine.registerSuite(suite([minLoad, maxLoad]));

            const report = engine.run("beam", { load: 4 });

            expect(report.results.map(r => r.id)).toEqual(["min", "max"]);
            expect(report.results[0].threshold).toBe(2);
            expect(report.results[1].threshold).toBe(10);
            expect(report.verdict).toBe("pass");
            expect(report.passed).toBe(true);
            expect(report.traceId).toMatch(/^tr_/);
            expect(Object.isFrozen(report)).toBe(true);
            expect(Object.isFrozen(report.results)).toBe(true);
        });

        // Scenario: One failure fails the suite
        it("should fail when any evaluator fails", () => {
            engine.registerSuite(suite([minLoad, maxLoad]));

            const report = engine.run("beam", { load: 12 });

            expect(report.results.map(r => r.verdict)).toEqual(["pass", "fail"]);
            expect(report.verdict).toBe("fail");
            expect(report.passed).toBe(false);
        });

        // Scenario: Inapplicable results are listed but excluded from the aggregate
        it("should exclude inapplicable results from the aggregate", () => {
            engine.registerSuite(suite([skip, maxLoad]));

            const report = engine.run("beam", { load: 4 });

            expect(report.verdict).toBe("pass");
            expect(report.inapplicable).toEqual(["skip"]);
        });

        // Scenario: A suite with nothing applicable is not declared passed
        it("should not pass a suite whose only check is inapplicable", () => {
            engine.registerSuite(suite([skip]));

            const report = engine.run("beam", { load: 4 });

            expect(report.verdict).toBe("inapplicable");
            expect(report.passed).toBe(false);
        });

        // Scenario: Informational results never decide the verdict
        it("should ignore informational results when aggregating", () => {
            engine.registerSuite(suite([note, skip]));

            const report = engine.run("beam", { load: 4 });

            expect(report.results[0].verdict).toBe("pass");
            expect(report.verdict).toBe("inapplicable");
        });

        // Scenario: Evaluators log through a prefixed logger
        it("should give evaluators a logger prefixed with suite and check id", () => {
            engine.registerSuite(suite([skip]));

            const report = engine.run("beam", { load: 4 });

            expect(logger.warn).toHaveBeenCalledWith("[beam:skip] Nothing to check", { traceId: report.traceId });
        });

        // Scenario: Identical input gives identical results
        it("should produce identical results across runs", () => {
            engine.registerSuite(suite([minLoad, maxLoad, skip]));

            const first = engine.run("beam", { load: 7 });
            const second = engine.run("beam", { load: 7 });

            expect(second.results).toEqual(first.results);
        });
    });

    describe("events", () => {
        // Scenario: Event sequence of a run
        it("should emit starting, per-check and completed events", () => {
            const events: EventPayload[] = [];
            eventBus.subscribe("*", (event) => {
                events.push(event);
            });
            engine.registerSuite(suite([maxLoad, skip]));

            const report = engine.run("beam", { load: 4 });

            expect(events.map(e => e.type)).toEqual([
                "suite:starting",
                "check:evaluated",
                "check:inapplicable",
                "suite:completed",
            ]);
            expect(events.every(e => e.traceId === report.traceId)).toBe(true);
            expect(events[1].data).toMatchObject({ checkId: "max", verdict: "pass", value: 4, margin: 6 });
            expect(events[3].data).toMatchObject({ suiteId: "beam", verdict: "pass" });
        });
    });

    describe("error handling", () => {
        // Scenario: Evaluator error aborts the run
        it("should rethrow evaluator errors after emitting failure events", () => {
            const types: string[] = [];
            eventBus.subscribe("*", (event) => {
                types.push(event.type);
            });
            engine.registerSuite(suite([maxLoad, broken, minLoad]));

            expect(() => engine.run("beam", { load: 4 })).toThrow("sensor offline");
            expect(types).toEqual([
                "suite:starting",
                "check:evaluated",
                "check:error",
                "suite:failed",
            ]);
            expect(logger.error).toHaveBeenCalledWith("Evaluator error", expect.objectContaining({
                checkId: "broken",
                error  : "sensor offline",
            }));
        });
    });

    describe("isEvaluator", () => {
        // Scenario: Structural check
        it("should recognise objects with an id and evaluate function", () => {
            expect(isEvaluator(maxLoad)).toBe(true);
            expect(isEvaluator({ id: "x" })).toBe(false);
            expect(isEvaluator({ id: 1, evaluate: () => null })).toBe(false);
            expect(isEvaluator(null)).toBe(false);
            expect(isEvaluator("kink")).toBe(false);
        });
    });
});
