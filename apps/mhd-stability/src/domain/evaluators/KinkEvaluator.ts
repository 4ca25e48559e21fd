/**
 * @fileoverview Kink-mode evaluator (Troyon limit)
 *
 * @module domain/evaluators/KinkEvaluator
 */

import { createCheckResult } from "@limitcheck/engine";
import type { EquilibriumParameters } from "../equilibrium/index.js";
import type { ModeEvaluator } from "./ModeEvaluator.js";

/**
 * Normalized beta β_N = β / (I_p[MA] / (a·B)).
 */
export function normalizedBeta(equilibrium: EquilibriumParameters): number {
    const currentMA = equilibrium.plasmaCurrent / 1e6;
    return equilibrium.beta / (currentMA / (equilibrium.minorRadius * equilibrium.toroidalField));
}

export const kinkEvaluator: ModeEvaluator = {
    id         : "kink",
    name       : "Kink modes",
    description: "Current-driven global modes, normalized beta against the Troyon limit",

    evaluate(equilibrium, { config }) {
        return createCheckResult("kink", {
            value     : normalizedBeta(equilibrium),
            threshold : config.kink.troyonLimit,
            comparison: "below",
        });
    },
};
