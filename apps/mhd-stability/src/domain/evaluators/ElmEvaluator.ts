/**
 * @fileoverview Edge-localized-mode evaluator
 *
 * Informational only: the result always passes and reports the mitigated
 * energy-loss fraction next to the unmitigated one.
 *
 * @module domain/evaluators/ElmEvaluator
 */

import { createCheckResult } from "@limitcheck/engine";
import type { StabilityLimits } from "../limits/index.js";
import type { ModeEvaluator } from "./ModeEvaluator.js";

/**
 * Mitigated ELM loss fraction: standard·exp(-φ²).
 */
export function mitigatedElmLossFraction(limits: StabilityLimits): number {
    return limits.elm.standardLossFraction * Math.exp(-(limits.goldenRatio ** 2));
}

export const elmEvaluator: ModeEvaluator = {
    id         : "elm",
    name       : "Edge localized modes",
    description: "Mitigated ELM energy-loss fraction (reported, never failing)",

    evaluate(_equilibrium, { config }) {
        return createCheckResult("elm", {
            value        : mitigatedElmLossFraction(config),
            threshold    : config.elm.standardLossFraction,
            comparison   : "below",
            informational: true,
        });
    },
};
