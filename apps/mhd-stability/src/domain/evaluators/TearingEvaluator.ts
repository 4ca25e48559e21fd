/**
 * @fileoverview Tearing-mode evaluator
 *
 * For every rational surface inside the plasma:
 *
 *     Δ'      = (-2m + m² - 1) / r_s
 *     index   = Δ'·a / H - φ·stabilizingFactor
 *
 * A surface is stable iff index < 0. Surfaces outside [q0, q95] are skipped;
 * when all of them are, the mode is reported inapplicable.
 *
 * @module domain/evaluators/TearingEvaluator
 */

import {
    createCheckResult,
    createInapplicableResult,
    createSample,
    createSkippedSample,
    type CheckSample,
} from "@limitcheck/engine";
import type { EquilibriumParameters } from "../equilibrium/index.js";
import type { StabilityLimits } from "../limits/index.js";
import type { ModeResult } from "../modes/index.js";
import { scanRationalSurfaces, type LocatedSurface } from "../scanners/index.js";
import type { ModeContext, ModeEvaluator } from "./ModeEvaluator.js";

/**
 * Tearing stability at one rational surface.
 */
export interface TearingSample {
    /** Unstabilized Δ' [1/m] */
    readonly deltaPrime: number;

    /** Δ'·a */
    readonly normalizedIndex: number;

    /** Δ'·a / H - φ·stabilizingFactor */
    readonly stabilizedIndex: number;

    readonly stable: boolean;
}

/**
 * Evaluate the tearing index at a located surface.
 */
export function evaluateTearingAt(
    equilibrium: EquilibriumParameters,
    limits: StabilityLimits,
    location: LocatedSurface
): TearingSample {
    const { m } = location.surface;

    const deltaPrime = (-2 * m + (m * m - 1)) / location.radius;
    const normalizedIndex = deltaPrime * equilibrium.minorRadius;
    const stabilizedIndex = normalizedIndex / equilibrium.confinementEnhancement
        - limits.goldenRatio * limits.tearing.stabilizingFactor;

    return {
        deltaPrime,
        normalizedIndex,
        stabilizedIndex,
        stable: stabilizedIndex < 0,
    };
}

/**
 * Tearing Evaluator
 *
 * Reports the surface with the largest stabilized index as the mode's value.
 */
export class TearingEvaluator implements ModeEvaluator {
    readonly id          = "tearing";
    readonly name        = "Tearing modes";
    readonly description = "Resistive modes at the configured rational surfaces";

    evaluate(equilibrium: EquilibriumParameters, context: ModeContext): ModeResult {
        const { config, logger } = context;

        const scan = scanRationalSurfaces(
            equilibrium,
            config.tearing.rationalSurfaces,
            location => evaluateTearingAt(equilibrium, config, location)
        );

        const samples: CheckSample[] = [];
        let worst: TearingSample | null = null;

        for (const entry of scan.entries) {
            const label = `m/n=${entry.surface.m}/${entry.surface.n}`;

            if (entry.status === "skipped") {
                logger.debug("Rational surface skipped", {
                    m      : entry.surface.m,
                    n      : entry.surface.n,
                    qTarget: entry.qTarget,
                    reason : entry.reason,
                });
                samples.push(createSkippedSample(label, 0));
                continue;
            }

            samples.push(createSample(label, entry.result.stabilizedIndex, 0, "below"));
            if (!worst || entry.result.stabilizedIndex > worst.stabilizedIndex) {
                worst = entry.result;
            }
        }

        if (!worst) {
            logger.warn("No rational surface lies inside the plasma; tearing check is inapplicable", {
                q0      : equilibrium.q0,
                q95     : equilibrium.q95,
                surfaces: config.tearing.rationalSurfaces.length,
            });
            return createInapplicableResult(this.id, 0, "below", samples);
        }

        return createCheckResult(this.id, {
            value     : worst.stabilizedIndex,
            threshold : 0,
            comparison: "below",
            verdict   : scan.verdict,
            samples,
        });
    }
}
