/**
 * @fileoverview Mode evaluator contract
 *
 * Every instability class implements the engine's Evaluator contract over
 * the equilibrium, reading its thresholds from StabilityLimits.
 *
 * @module domain/evaluators/ModeEvaluator
 */

import type { EvaluationContext, Evaluator } from "@limitcheck/engine";
import type { EquilibriumParameters } from "../equilibrium/index.js";
import type { StabilityLimits } from "../limits/index.js";
import type { ModeName } from "../modes/index.js";

export type ModeEvaluator = Evaluator<EquilibriumParameters, StabilityLimits, ModeName>;

export type ModeContext = EvaluationContext<StabilityLimits>;
