/**
 * Check Result
 *
 * The result of an evaluator comparing one computed quantity against a limit.
 * This is the contract boundary between evaluation and reporting.
 *
 * Design principles:
 * - Immutable: results and their samples are frozen on creation
 * - Oriented margins: a positive margin is always on the passing side
 * - Explicit vacuity: "inapplicable" is a verdict, never folded into "pass"
 */

/**
 * Outcome of a single check.
 */
export type Verdict = "pass" | "fail" | "inapplicable";

/**
 * Direction of the threshold comparison.
 *
 * - `below`: passes iff value < threshold
 * - `atLeast`: passes iff value >= threshold
 */
export type Comparison = "below" | "atLeast";

/**
 * One point of a scanned check (a radial sample, a rational surface, ...).
 */
export interface CheckSample {
    /** Human-readable label, e.g. "r=0.10" or "m/n=2/1" */
    readonly label: string;

    /** Computed value, or null when the point was skipped */
    readonly value: number | null;

    readonly threshold: number;

    readonly verdict: Verdict;

    /** Signed distance to the threshold, null when skipped */
    readonly margin: number | null;
}

/**
 * Output of an Evaluator.
 *
 * @example
 * ```typescript
 * // Scalar limit
 * { id: "kink", comparison: "below", value: 0.0415, threshold: 2.8,
 *   margin: 2.7585, verdict: "pass", informational: false, samples: [] }
 *
 * // Nothing to evaluate
 * { id: "tearing", comparison: "below", value: null, threshold: 0,
 *   margin: null, verdict: "inapplicable", informational: false, samples: [...] }
 * ```
 */
export interface CheckResult<TId extends string = string> {
    /** Identifier of the evaluator that produced this result */
    readonly id: TId;

    readonly comparison: Comparison;

    /** Computed quantity, null only when the verdict is inapplicable */
    readonly value: number | null;

    readonly threshold: number;

    /**
     * Signed distance to the threshold.
     * Positive on the passing side, null when inapplicable.
     */
    readonly margin: number | null;

    readonly verdict: Verdict;

    /**
     * Informational results are reported but always pass.
     */
    readonly informational: boolean;

    /** Per-point evaluations for scanned checks, empty for scalar checks */
    readonly samples: readonly CheckSample[];
}

/**
 * Input to createCheckResult.
 */
export interface Measurement {
    readonly value: number;
    readonly threshold: number;
    readonly comparison: Comparison;

    /**
     * Overrides the verdict computed from value and threshold.
     * Scanned checks pass the aggregate of their samples here.
     */
    readonly verdict?: Verdict;

    readonly informational?: boolean;
    readonly samples?: readonly CheckSample[];
}

/**
 * Check whether a value satisfies a threshold.
 */
export function meetsThreshold(value: number, threshold: number, comparison: Comparison): boolean {
    return comparison === "below" ? value < threshold : value >= threshold;
}

/**
 * Signed distance from a value to its threshold, positive on the passing side.
 */
export function marginOf(value: number, threshold: number, comparison: Comparison): number {
    return comparison === "below" ? threshold - value : value - threshold;
}

/**
 * Combine verdicts.
 *
 * Any failure fails. Otherwise any pass passes. An empty list, or one made
 * only of inapplicable verdicts, is inapplicable.
 *
 * @param verdicts - Verdicts to combine
 * @returns The aggregate verdict
 */
export function aggregateVerdict(verdicts: Iterable<Verdict>): Verdict {
    let sawPass = false;

    for (const verdict of verdicts) {
        if (verdict === "fail") {
            return "fail";
        }
        if (verdict === "pass") {
            sawPass = true;
        }
    }

    return sawPass ? "pass" : "inapplicable";
}

/**
 * Create a frozen sample for a scanned check.
 */
export function createSample(
    label: string,
    value: number,
    threshold: number,
    comparison: Comparison
): CheckSample {
    const sample: CheckSample = {
        label,
        value,
        threshold,
        verdict: meetsThreshold(value, threshold, comparison) ? "pass" : "fail",
        margin : marginOf(value, threshold, comparison),
    };

    return Object.freeze(sample);
}

/**
 * Create a frozen sample for a point that was skipped.
 */
export function createSkippedSample(label: string, threshold: number): CheckSample {
    const sample: CheckSample = {
        label,
        value  : null,
        threshold,
        verdict: "inapplicable",
        margin : null,
    };

    return Object.freeze(sample);
}

/**
 * Factory function to create a CheckResult.
 * Ensures the result and its samples are frozen.
 *
 * @param id - Evaluator identifier
 * @param measurement - Value, threshold and comparison
 * @returns Frozen CheckResult
 */
export function createCheckResult<TId extends string>(
    id: TId,
    measurement: Measurement
): CheckResult<TId> {
    const { value, threshold, comparison } = measurement;
    const informational = measurement.informational ?? false;

    let verdict: Verdict;
    if (informational) {
        verdict = "pass";
    }
    else {
        verdict = measurement.verdict
            ?? (meetsThreshold(value, threshold, comparison) ? "pass" : "fail");
    }

    const result: CheckResult<TId> = {
        id,
        comparison,
        value,
        threshold,
        margin : marginOf(value, threshold, comparison),
        verdict,
        informational,
        samples: Object.freeze([...(measurement.samples ?? [])]),
    };

    return Object.freeze(result);
}

/**
 * Create a frozen result for a check that had nothing to evaluate.
 *
 * @param id - Evaluator identifier
 * @param threshold - The limit that would have applied
 * @param comparison - Direction of the comparison that would have applied
 * @param samples - Skipped samples, kept for reporting
 */
export function createInapplicableResult<TId extends string>(
    id: TId,
    threshold: number,
    comparison: Comparison,
    samples: readonly CheckSample[] = []
): CheckResult<TId> {
    const result: CheckResult<TId> = {
        id,
        comparison,
        value        : null,
        threshold,
        margin       : null,
        verdict      : "inapplicable",
        informational: false,
        samples      : Object.freeze([...samples]),
    };

    return Object.freeze(result);
}

/**
 * A result passes unless it failed. Inapplicable results do not fail.
 */
export function isPassing(result: CheckResult): boolean {
    return result.verdict !== "fail";
}
