/**
 * @fileoverview Resistive-wall-mode evaluator
 *
 * @module domain/evaluators/RwmEvaluator
 */

import { createCheckResult } from "@limitcheck/engine";
import type { ModeEvaluator } from "./ModeEvaluator.js";

/**
 * No-wall beta limit β_no_wall = c·4·(1 + κ²)/2.
 */
export function noWallBetaLimit(elongation: number, coefficient: number): number {
    return coefficient * 4 * (1 + elongation * elongation) / 2;
}

export const rwmEvaluator: ModeEvaluator = {
    id         : "rwm",
    name       : "Resistive wall modes",
    description: "β against the elongation-dependent no-wall limit",

    evaluate(equilibrium, { config }) {
        return createCheckResult("rwm", {
            value     : equilibrium.beta,
            threshold : noWallBetaLimit(equilibrium.elongation, config.rwm.noWallCoefficient),
            comparison: "below",
        });
    },
};
