/**
 * @fileoverview Rational-surface scanner
 *
 * Locates each configured (m, n) surface on the quadratic q profile and
 * drives a local check on the surfaces that exist inside the plasma.
 *
 * Skipped surfaces never count as stable. When every surface is skipped
 * the scan verdict is "inapplicable". A surface at q0 has zero radius and
 * is a configuration error.
 *
 * @module domain/scanners/RationalSurfaceScanner
 */

import { aggregateVerdict, type Verdict } from "@limitcheck/engine";
import { ConfigurationError } from "../errors/index.js";
import type { EquilibriumParameters } from "../equilibrium/index.js";
import type { RationalSurface } from "../limits/index.js";
import type { LocalVerdict } from "./RadialScanner.js";

/**
 * Why a surface was not evaluated.
 *
 * - `outside-profile`: q = m/n lies outside [q0, q95]
 */
export type SurfaceSkipReason = "outside-profile";

/**
 * A rational surface placed on the profile.
 */
export interface LocatedSurface {
    readonly surface: RationalSurface;
    readonly qTarget: number;

    /** r_s / a */
    readonly normalizedRadius: number;

    /** r_s [m] */
    readonly radius: number;
}

export type SurfaceEntry<T extends LocalVerdict> =
    | {
        readonly status: "evaluated";
        readonly surface: RationalSurface;
        readonly qTarget: number;
        readonly location: LocatedSurface;
        readonly result: T;
    }
    | {
        readonly status: "skipped";
        readonly surface: RationalSurface;
        readonly qTarget: number;
        readonly reason: SurfaceSkipReason;
    };

export interface SurfaceScan<T extends LocalVerdict> {
    /** One entry per configured surface, in configuration order */
    readonly entries: readonly SurfaceEntry<T>[];
    readonly verdict: Verdict;
}

/**
 * Place a surface on the profile q(r) = q0 + (q95 - q0)·r².
 *
 * @param field - Configuration path reported when the surface sits on the axis
 * @returns The located surface, or the reason it does not exist inside the plasma
 * @throws {ConfigurationError} When q = m/n equals q0
 */
export function locateRationalSurface(
    equilibrium: EquilibriumParameters,
    surface: RationalSurface,
    field = "tearing.rationalSurfaces"
): LocatedSurface | SurfaceSkipReason {
    const { q0, q95, minorRadius } = equilibrium;
    const qTarget = surface.m / surface.n;

    if (qTarget < q0 || qTarget > q95) {
        return "outside-profile";
    }
    if (qTarget === q0) {
        throw new ConfigurationError(field, "q = m/n coincides with q0; surface radius is zero");
    }

    const normalizedRadius = Math.sqrt((qTarget - q0) / (q95 - q0));

    return {
        surface,
        qTarget,
        normalizedRadius,
        radius: normalizedRadius * minorRadius,
    };
}

/**
 * Evaluate every configured surface that exists inside the plasma.
 *
 * @param equilibrium - Equilibrium defining the q profile
 * @param surfaces - Mode-number pairs, in scan order
 * @param evaluate - Local check, called once per located surface
 * @throws {ConfigurationError} When a surface sits on the magnetic axis
 */
export function scanRationalSurfaces<T extends LocalVerdict>(
    equilibrium: EquilibriumParameters,
    surfaces: readonly RationalSurface[],
    evaluate: (location: LocatedSurface) => T
): SurfaceScan<T> {
    const entries = surfaces.map((surface, index): SurfaceEntry<T> => {
        const qTarget = surface.m / surface.n;
        const location = locateRationalSurface(equilibrium, surface, `tearing.rationalSurfaces[${index}]`);

        if (typeof location === "string") {
            return { status: "skipped", surface, qTarget, reason: location };
        }

        return {
            status: "evaluated",
            surface,
            qTarget,
            location,
            result: evaluate(location),
        };
    });

    const verdict = aggregateVerdict(entries.map((entry): Verdict => {
        if (entry.status === "skipped") {
            return "inapplicable";
        }
        return entry.result.stable ? "pass" : "fail";
    }));

    return { entries, verdict };
}
