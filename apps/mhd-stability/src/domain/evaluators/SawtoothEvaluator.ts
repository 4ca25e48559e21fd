/**
 * @fileoverview Sawtooth evaluator
 *
 * Classical trigger condition: sawteeth appear when q0 drops below 1.
 * q0 exactly at the minimum counts as stable.
 *
 * @module domain/evaluators/SawtoothEvaluator
 */

import { createCheckResult } from "@limitcheck/engine";
import type { ModeEvaluator } from "./ModeEvaluator.js";

export const sawtoothEvaluator: ModeEvaluator = {
    id  : "sawtooth",
    name: "Sawteeth",

    evaluate(equilibrium, { config }) {
        return createCheckResult("sawtooth", {
            value     : equilibrium.q0,
            threshold : config.sawtooth.minimumAxisSafetyFactor,
            comparison: "atLeast",
        });
    },
};
