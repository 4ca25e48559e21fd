/**
 * @fileoverview Mode evaluator barrel exports
 *
 * @module domain/evaluators
 */

import { BallooningEvaluator } from "./BallooningEvaluator.js";
import { elmEvaluator } from "./ElmEvaluator.js";
import { kinkEvaluator } from "./KinkEvaluator.js";
import type { ModeEvaluator } from "./ModeEvaluator.js";
import { ntmEvaluator } from "./NtmEvaluator.js";
import { rwmEvaluator } from "./RwmEvaluator.js";
import { sawtoothEvaluator } from "./SawtoothEvaluator.js";
import { TearingEvaluator } from "./TearingEvaluator.js";

export type { ModeContext, ModeEvaluator } from "./ModeEvaluator.js";
export { BallooningEvaluator, evaluateBallooningAt, type BallooningSample } from "./BallooningEvaluator.js";
export { kinkEvaluator, normalizedBeta } from "./KinkEvaluator.js";
export { TearingEvaluator, evaluateTearingAt, type TearingSample } from "./TearingEvaluator.js";
export { ntmEvaluator } from "./NtmEvaluator.js";
export { sawtoothEvaluator } from "./SawtoothEvaluator.js";
export { rwmEvaluator, noWallBetaLimit } from "./RwmEvaluator.js";
export { elmEvaluator, mitigatedElmLossFraction } from "./ElmEvaluator.js";

/**
 * The seven mode evaluators, in report order.
 */
export function createMhdEvaluators(): ModeEvaluator[] {
    return [
        new BallooningEvaluator(),
        kinkEvaluator,
        new TearingEvaluator(),
        ntmEvaluator,
        sawtoothEvaluator,
        rwmEvaluator,
        elmEvaluator,
    ];
}
