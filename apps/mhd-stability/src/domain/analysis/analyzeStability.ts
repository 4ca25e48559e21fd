/**
 * @fileoverview MHD stability analysis
 *
 * Wires the mode evaluators into a CheckEngine suite, runs it against one
 * equilibrium and builds the StabilityReport.
 *
 * @module domain/analysis/analyzeStability
 */

import {
    CheckEngine,
    type CheckLogger,
    type EventBus,
    type SuiteRegistration,
} from "@limitcheck/engine";
import type { EquilibriumParameters } from "../equilibrium/index.js";
import { createMhdEvaluators, type ModeEvaluator } from "../evaluators/index.js";
import type { StabilityLimits } from "../limits/index.js";
import type { ModeName } from "../modes/index.js";
import { buildStabilityReport, type StabilityReport } from "../report/index.js";

export const kMHD_SUITE_ID = "mhd";

export interface AnalysisOptions {
    /** Bus to observe the run on (default: a private InMemoryEventBus) */
    readonly eventBus?: EventBus;

    readonly logger?: CheckLogger;

    /** Replaces the seven built-in evaluators */
    readonly evaluators?: readonly ModeEvaluator[];
}

export type MhdSuite = SuiteRegistration<EquilibriumParameters, StabilityLimits, ModeName>;

/**
 * Build the MHD suite registration.
 *
 * @param limits - Limits handed to every evaluator
 * @param evaluators - Evaluators in report order
 */
export function createMhdSuite(
    limits: StabilityLimits,
    evaluators: readonly ModeEvaluator[] = createMhdEvaluators()
): MhdSuite {
    return {
        id    : kMHD_SUITE_ID,
        name  : "MHD Stability",
        evaluators,
        config: limits,
    };
}

/**
 * Run every mode evaluator against the equilibrium.
 *
 * @param equilibrium - Validated equilibrium
 * @param limits - Thresholds and model constants
 * @param options - Optional event bus, logger and evaluator set
 * @returns Frozen stability report
 */
export function analyzeStability(
    equilibrium: EquilibriumParameters,
    limits: StabilityLimits,
    options: AnalysisOptions = {}
): StabilityReport {
    const engine = new CheckEngine<EquilibriumParameters, StabilityLimits, ModeName>({
        eventBus: options.eventBus,
        logger  : options.logger,
    });

    engine.registerSuite(createMhdSuite(limits, options.evaluators));

    return buildStabilityReport(engine.run(kMHD_SUITE_ID, equilibrium), limits);
}
