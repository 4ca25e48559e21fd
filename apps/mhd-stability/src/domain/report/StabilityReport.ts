/**
 * @fileoverview Stability report
 *
 * Aggregate of one suite run: the mode results in report order, the
 * design-feasibility flag and the descriptive disruption probability.
 *
 * @module domain/report/StabilityReport
 */

import type { SuiteReport } from "@limitcheck/engine";
import type { StabilityLimits } from "../limits/index.js";
import type { ModeName, ModeResult } from "../modes/index.js";

export interface StabilityReport {
    readonly traceId: string;

    /** One result per mode, in report order */
    readonly modeResults: readonly ModeResult[];

    /**
     * True iff every applicable, non-informational mode passed.
     * A run in which nothing was applicable is not stable.
     */
    readonly overallStable: boolean;

    /** Modes that had nothing to evaluate */
    readonly inapplicableModes: readonly ModeName[];

    /** Descriptive only; never feeds overallStable */
    readonly disruptionProbability: number;
}

/**
 * Disruption probability base·exp(-N/φ⁴).
 */
export function disruptionProbability(limits: StabilityLimits): number {
    const { baseProbability, trackedModeChannels } = limits.disruption;
    return baseProbability * Math.exp(-trackedModeChannels / limits.goldenRatio ** 4);
}

/**
 * Build the report from a suite run.
 *
 * @param suiteReport - Result of running the MHD suite
 * @param limits - Limits the suite ran with
 * @returns Frozen report
 */
export function buildStabilityReport(
    suiteReport: SuiteReport<ModeName>,
    limits: StabilityLimits
): StabilityReport {
    const report: StabilityReport = {
        traceId              : suiteReport.traceId,
        modeResults          : suiteReport.results,
        overallStable        : suiteReport.passed,
        inapplicableModes    : suiteReport.inapplicable,
        disruptionProbability: disruptionProbability(limits),
    };

    return Object.freeze(report);
}

/**
 * Look up one mode's result.
 */
export function findModeResult(report: StabilityReport, mode: ModeName): ModeResult | undefined {
    return report.modeResults.find(r => r.id === mode);
}
