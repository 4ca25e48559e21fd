/**
 * @fileoverview Radial scanner
 *
 * Drives a local stability check across normalized-radius sample points.
 * Each point is evaluated independently; the profile is stable iff every
 * sample is.
 *
 * @module domain/scanners/RadialScanner
 */

import { ConfigurationError } from "../errors/index.js";
import type { RadialScanSpec } from "../limits/index.js";

/**
 * Anything a radial scan can aggregate.
 */
export interface LocalVerdict {
    readonly stable: boolean;
}

export interface RadialScan<T extends LocalVerdict> {
    readonly samples: readonly T[];
    readonly stable: boolean;
}

/**
 * Evenly spaced points over [start, end], both endpoints included exactly.
 *
 * @param range - Scan range and point count
 * @returns Sample radii in increasing order
 * @throws ConfigurationError if the range is not inside (0, 1) or has fewer than 2 points
 */
export function radialScanPoints(range: RadialScanSpec): number[] {
    const { start, end, samples } = range;

    if (!Number.isInteger(samples) || samples < 2) {
        throw new ConfigurationError("radialScan.samples", `expected an integer >= 2, got ${samples}`);
    }
    if (!(start > 0 && start < end && end < 1)) {
        throw new ConfigurationError("radialScan", `expected 0 < start < end < 1, got [${start}, ${end}]`);
    }

    const step = (end - start) / (samples - 1);
    const points: number[] = [];
    for (let i = 0; i < samples; i++) {
        points.push(i === samples - 1 ? end : start + i * step);
    }
    return points;
}

/**
 * Evaluate every point and aggregate.
 *
 * An empty point list is reported unstable: a scan that checked nothing
 * proves nothing.
 *
 * @param points - Normalized radii
 * @param evaluate - Local check, called once per point
 */
export function scanRadialProfile<T extends LocalVerdict>(
    points: readonly number[],
    evaluate: (r: number) => T
): RadialScan<T> {
    const samples = points.map(r => evaluate(r));

    return {
        samples,
        stable: samples.length > 0 && samples.every(s => s.stable),
    };
}
