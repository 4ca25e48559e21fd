/**
 * @fileoverview Neoclassical tearing-mode evaluator
 *
 * @module domain/evaluators/NtmEvaluator
 */

import { createCheckResult } from "@limitcheck/engine";
import type { ModeEvaluator } from "./ModeEvaluator.js";

/**
 * Stable iff β stays under the seed-island trigger.
 */
export const ntmEvaluator: ModeEvaluator = {
    id  : "ntm",
    name: "Neoclassical tearing modes",

    evaluate(equilibrium, { config }) {
        return createCheckResult("ntm", {
            value     : equilibrium.beta,
            threshold : config.ntm.betaTrigger,
            comparison: "below",
        });
    },
};
