/**
 * @fileoverview Ballooning-mode evaluator
 *
 * Pressure-gradient check across the radial profile. At each sample r:
 *
 *     q(r)   = q0 + (q95 - q0)·r²
 *     α      = β·q²·2r
 *     s      = shearPerRadius·r
 *     α_crit = c·s²/q² · (1 + w_κ·κ + w_δ·δ)
 *
 * A sample is stable iff α < α_crit. The margin is thinnest near the axis
 * and near the edge, so the scan range must reach both.
 *
 * @module domain/evaluators/BallooningEvaluator
 */

import { createCheckResult, createSample } from "@limitcheck/engine";
import type { EquilibriumParameters } from "../equilibrium/index.js";
import { safetyFactorAt } from "../equilibrium/index.js";
import type { StabilityLimits } from "../limits/index.js";
import { shapingFactor } from "../limits/index.js";
import type { ModeResult } from "../modes/index.js";
import { radialScanPoints, scanRadialProfile } from "../scanners/index.js";
import type { ModeContext, ModeEvaluator } from "./ModeEvaluator.js";

/**
 * Local ballooning check at one radius.
 */
export interface BallooningSample {
    readonly r: number;
    readonly q: number;
    readonly alpha: number;
    readonly alphaCritical: number;
    readonly stable: boolean;
}

/**
 * Evaluate the ballooning criterion at normalized radius r.
 */
export function evaluateBallooningAt(
    equilibrium: EquilibriumParameters,
    limits: StabilityLimits["ballooning"],
    r: number
): BallooningSample {
    const q = safetyFactorAt(equilibrium, r);
    const alpha = equilibrium.beta * q * q * 2 * r;
    const shear = limits.shearPerRadius * r;
    const alphaCritical = limits.criticalCoefficient * shear * shear / (q * q)
        * shapingFactor(limits, equilibrium.elongation, equilibrium.triangularity);

    return { r, q, alpha, alphaCritical, stable: alpha < alphaCritical };
}

/**
 * Ballooning Evaluator
 *
 * Reports the sample with the smallest margin as the mode's value and
 * threshold, the AND of all samples as its verdict, and every sample.
 */
export class BallooningEvaluator implements ModeEvaluator {
    readonly id          = "ballooning";
    readonly name        = "Ballooning modes";
    readonly description = "Pressure-driven modes, scanned across the normalized radius";

    evaluate(equilibrium: EquilibriumParameters, context: ModeContext): ModeResult {
        const { config, logger } = context;

        const points = radialScanPoints(config.radialScan);
        const scan = scanRadialProfile(points, r => evaluateBallooningAt(equilibrium, config.ballooning, r));

        let weakest = scan.samples[0];
        for (const sample of scan.samples) {
            if (sample.alphaCritical - sample.alpha < weakest.alphaCritical - weakest.alpha) {
                weakest = sample;
            }
        }

        logger.debug("Radial scan complete", {
            samples : scan.samples.length,
            unstable: scan.samples.filter(s => !s.stable).length,
            weakestR: weakest.r,
        });

        return createCheckResult(this.id, {
            value     : weakest.alpha,
            threshold : weakest.alphaCritical,
            comparison: "below",
            verdict   : scan.stable ? "pass" : "fail",
            samples   : scan.samples.map(s => createSample(`r=${s.r.toFixed(2)}`, s.alpha, s.alphaCritical, "below")),
        });
    }
}
