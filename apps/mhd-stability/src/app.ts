/**
 * @fileoverview Stability check run
 *
 * Everything the CLI does between reading its settings and exiting: load
 * limits, derive the reference equilibrium, analyze, render.
 *
 * @module app
 */

import { InMemoryEventBus, type CheckLogger } from "@limitcheck/engine";
import { loadStabilityLimitsWithFallback } from "./config/index.js";
import {
    analyzeStability,
    deriveReferenceEquilibrium,
    isConfigurationError,
    renderReport,
    type ReportFormat,
} from "./domain/index.js";

export const kEXIT_STABLE = 0;
export const kEXIT_UNSTABLE = 1;
export const kEXIT_CONFIGURATION_ERROR = 2;

export interface CliArgs {
    readonly format: ReportFormat;
}

export interface RunOptions {
    readonly limitsFile: string;
    readonly format: ReportFormat;
    readonly logger: CheckLogger;

    /** Report sink (stdout in the CLI) */
    readonly write: (text: string) => void;
}

export function parseCliArgs(args: readonly string[]): CliArgs {
    return {
        format: args.includes("--json") ? "json" : "text",
    };
}

/**
 * Run the stability check once.
 *
 * @returns Process exit code
 * @throws Any error other than a ConfigurationError
 */
export function runStabilityCheck(options: RunOptions): number {
    const { logger } = options;

    try {
        const limits = loadStabilityLimitsWithFallback(options.limitsFile, logger);
        const equilibrium = deriveReferenceEquilibrium(limits.goldenRatio);

        const eventBus = new InMemoryEventBus();
        eventBus.subscribe("check:inapplicable", (event) => {
            logger.warn("Mode not applicable to this equilibrium", { mode: event.data?.checkId });
        });

        const report = analyzeStability(equilibrium, limits, { eventBus, logger });
        options.write(renderReport(report, equilibrium, options.format));

        return report.overallStable ? kEXIT_STABLE : kEXIT_UNSTABLE;
    }
    catch (error) {
        if (isConfigurationError(error)) {
            logger.error(error.message, { field: error.field });
            return kEXIT_CONFIGURATION_ERROR;
        }
        throw error;
    }
}
