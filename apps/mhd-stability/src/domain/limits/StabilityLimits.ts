/**
 * @fileoverview Stability limits
 *
 * Thresholds and model constants read by the mode evaluators. Several limits
 * (Troyon, NTM trigger) are empirical engineering heuristics; they live here
 * so alternate threshold sets can be swapped in without touching evaluators.
 *
 * @module domain/limits/StabilityLimits
 */

/**
 * A poloidal/toroidal mode-number pair (m, n) locating the surface q = m/n.
 */
export interface RationalSurface {
    readonly m: number;
    readonly n: number;
}

export interface RadialScanSpec {
    /** First normalized radius, included */
    readonly start: number;

    /** Last normalized radius, included */
    readonly end: number;

    /** Number of evenly spaced points */
    readonly samples: number;
}

export interface StabilityLimits {
    readonly goldenRatio: number;

    readonly ballooning: {
        /** Prefactor of α_crit = c·s²/q²·shaping */
        readonly criticalCoefficient: number;

        /** Local shear proxy s = shearPerRadius·r */
        readonly shearPerRadius: number;

        readonly elongationWeight: number;
        readonly triangularityWeight: number;
    };

    readonly radialScan: RadialScanSpec;

    readonly kink: {
        /** Troyon limit on β_N, in %·m·T/MA */
        readonly troyonLimit: number;
    };

    readonly tearing: {
        readonly rationalSurfaces: readonly RationalSurface[];

        /** Offset subtracted from the index, as a multiple of φ */
        readonly stabilizingFactor: number;
    };

    readonly ntm: {
        /** Seed-island trigger, as a β fraction */
        readonly betaTrigger: number;
    };

    readonly sawtooth: {
        readonly minimumAxisSafetyFactor: number;
    };

    readonly rwm: {
        readonly noWallCoefficient: number;
    };

    readonly elm: {
        /** Energy-loss fraction of an unmitigated ELM */
        readonly standardLossFraction: number;
    };

    readonly disruption: {
        readonly baseProbability: number;
        readonly trackedModeChannels: number;
    };
}

/**
 * Built-in limits.
 */
export function getDefaultLimits(): StabilityLimits {
    return freezeLimits({
        goldenRatio: (1 + Math.sqrt(5)) / 2,
        ballooning : {
            criticalCoefficient: 0.6,
            shearPerRadius     : 2,
            elongationWeight   : 0.5,
            triangularityWeight: 0.3,
        },
        radialScan: {
            start  : 0.1,
            end    : 0.95,
            samples: 10,
        },
        kink: {
            troyonLimit: 2.8,
        },
        tearing: {
            rationalSurfaces: [
                { m: 2, n: 1 },
                { m: 3, n: 2 },
                { m: 3, n: 1 },
                { m: 4, n: 3 },
                { m: 5, n: 4 },
            ],
            stabilizingFactor: 0.5,
        },
        ntm: {
            betaTrigger: 0.02,
        },
        sawtooth: {
            minimumAxisSafetyFactor: 1.0,
        },
        rwm: {
            noWallCoefficient: 0.028,
        },
        elm: {
            standardLossFraction: 0.07,
        },
        disruption: {
            baseProbability    : 0.15,
            trackedModeChannels: 46,
        },
    });
}

/**
 * Deep-freeze a limits object.
 */
export function freezeLimits(limits: StabilityLimits): StabilityLimits {
    const frozen: StabilityLimits = {
        goldenRatio: limits.goldenRatio,
        ballooning : Object.freeze({ ...limits.ballooning }),
        radialScan : Object.freeze({ ...limits.radialScan }),
        kink       : Object.freeze({ ...limits.kink }),
        tearing    : Object.freeze({
            rationalSurfaces : Object.freeze(limits.tearing.rationalSurfaces.map(s => Object.freeze({ ...s }))),
            stabilizingFactor: limits.tearing.stabilizingFactor,
        }),
        ntm       : Object.freeze({ ...limits.ntm }),
        sawtooth  : Object.freeze({ ...limits.sawtooth }),
        rwm       : Object.freeze({ ...limits.rwm }),
        elm       : Object.freeze({ ...limits.elm }),
        disruption: Object.freeze({ ...limits.disruption }),
    };

    return Object.freeze(frozen);
}

/**
 * Shape-stabilization factor 1 + w_κ·κ + w_δ·δ.
 */
export function shapingFactor(
    limits: StabilityLimits["ballooning"],
    elongation: number,
    triangularity: number
): number {
    return 1 + limits.elongationWeight * elongation + limits.triangularityWeight * triangularity;
}
