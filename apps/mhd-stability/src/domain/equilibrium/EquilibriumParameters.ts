/**
 * @fileoverview Plasma equilibrium
 *
 * The fixed set of geometry and plasma scalars every mode evaluator reads.
 * Values are validated once, at construction, so no NaN or division by zero
 * can reach the stability formulas.
 *
 * @module domain/equilibrium/EquilibriumParameters
 */

import { ConfigurationError } from "../errors/index.js";

/**
 * Immutable equilibrium.
 */
export interface EquilibriumParameters {
    /** Major radius R [m] */
    readonly majorRadius: number;

    /** Minor radius a [m] */
    readonly minorRadius: number;

    /** Toroidal field B [T] */
    readonly toroidalField: number;

    /** Density n [m^-3] */
    readonly density: number;

    /** Temperature T [keV] */
    readonly temperature: number;

    /** Plasma current I_p [A] */
    readonly plasmaCurrent: number;

    /** Normalized pressure, as a fraction (0.0163 = 1.63%) */
    readonly beta: number;

    /** Safety factor on the magnetic axis */
    readonly q0: number;

    /** Safety factor at the 95% flux surface */
    readonly q95: number;

    /** Elongation κ */
    readonly elongation: number;

    /** Triangularity δ */
    readonly triangularity: number;

    /** Confinement-enhancement factor H */
    readonly confinementEnhancement: number;
}

const kFIELDS: readonly (keyof EquilibriumParameters)[] = [
    "majorRadius",
    "minorRadius",
    "toroidalField",
    "density",
    "temperature",
    "plasmaCurrent",
    "beta",
    "q0",
    "q95",
    "elongation",
    "triangularity",
    "confinementEnhancement",
];

/** Fields that enter a denominator or a square root */
const kPOSITIVE_FIELDS: readonly (keyof EquilibriumParameters)[] = [
    "majorRadius",
    "minorRadius",
    "toroidalField",
    "density",
    "temperature",
    "plasmaCurrent",
    "beta",
    "q0",
    "elongation",
    "confinementEnhancement",
];

/**
 * Validate and freeze an equilibrium.
 *
 * @param input - Raw parameters
 * @returns Frozen copy of the parameters
 * @throws ConfigurationError naming the first invalid field
 *
 * @example
 * ```typescript
 * const eq = createEquilibrium({ ...reference, q95: reference.q0 });
 * // throws ConfigurationError: Invalid configuration for 'q95': ...
 * ```
 */
export function createEquilibrium(input: EquilibriumParameters): EquilibriumParameters {
    for (const field of kFIELDS) {
        if (!Number.isFinite(input[field])) {
            throw new ConfigurationError(field, `expected a finite number, got ${String(input[field])}`);
        }
    }

    for (const field of kPOSITIVE_FIELDS) {
        if (input[field] <= 0) {
            throw new ConfigurationError(field, `must be positive, got ${input[field]}`);
        }
    }

    if (input.q95 <= input.q0) {
        throw new ConfigurationError(
            "q95",
            `edge safety factor (${input.q95}) must exceed axis safety factor q0 (${input.q0})`
        );
    }

    if (input.minorRadius >= input.majorRadius) {
        throw new ConfigurationError(
            "minorRadius",
            `minor radius (${input.minorRadius} m) must be smaller than major radius (${input.majorRadius} m)`
        );
    }

    const equilibrium: EquilibriumParameters = {
        majorRadius           : input.majorRadius,
        minorRadius           : input.minorRadius,
        toroidalField         : input.toroidalField,
        density               : input.density,
        temperature           : input.temperature,
        plasmaCurrent         : input.plasmaCurrent,
        beta                  : input.beta,
        q0                    : input.q0,
        q95                   : input.q95,
        elongation            : input.elongation,
        triangularity         : input.triangularity,
        confinementEnhancement: input.confinementEnhancement,
    };

    return Object.freeze(equilibrium);
}

/**
 * Confinement enhancement from the golden-flow model: H = 1 / (1 - φ^(-1/4))².
 */
export function confinementEnhancement(goldenRatio: number): number {
    return 1 / (1 - goldenRatio ** -0.25) ** 2;
}

/**
 * Reference reactor design, derived from the golden ratio.
 *
 * R = φ⁵, a = R/φ³, B = φ¹⁰/5, n = 240e20/φ⁷, T = 7φ³; the remaining
 * values are the published design point.
 */
export function deriveReferenceEquilibrium(goldenRatio: number): EquilibriumParameters {
    const majorRadius = goldenRatio ** 5;

    return createEquilibrium({
        majorRadius,
        minorRadius           : majorRadius / goldenRatio ** 3,
        toroidalField         : goldenRatio ** 10 / 5,
        density               : 240e20 / goldenRatio ** 7,
        temperature           : 7 * goldenRatio ** 3,
        plasmaCurrent         : 25.3e6,
        beta                  : 0.0163,
        q0                    : 1.0,
        q95                   : 3.0,
        elongation            : 1.7,
        triangularity         : 0.4,
        confinementEnhancement: confinementEnhancement(goldenRatio),
    });
}

/**
 * Safety factor at normalized radius r, quadratic between axis and edge.
 */
export function safetyFactorAt(equilibrium: EquilibriumParameters, r: number): number {
    return equilibrium.q0 + (equilibrium.q95 - equilibrium.q0) * r * r;
}

/**
 * Inverse aspect ratio a/R.
 */
export function inverseAspectRatio(equilibrium: EquilibriumParameters): number {
    return equilibrium.minorRadius / equilibrium.majorRadius;
}
