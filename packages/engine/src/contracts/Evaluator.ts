/**
 * Evaluator Contract
 *
 * Evaluators compute one quantity from an input, compare it against a limit
 * taken from the suite configuration and return a CheckResult.
 * The engine runs ALL evaluators of a suite, in registration order.
 *
 * Design principles:
 * - Pure: No side effects, no input mutation
 * - Deterministic: Same input and config produce the same result
 * - Independent: No evaluator reads another evaluator's result
 */

import type { CheckResult } from "./CheckResult.js";

/**
 * Logger interface for evaluators and the engine.
 */
export interface CheckLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Context provided to evaluators.
 */
export interface EvaluationContext<TConfig extends object> {
    /**
     * Read-only limits and model constants for this suite.
     * Evaluators take every threshold from here, never from module state.
     */
    readonly config: Readonly<TConfig>;

    readonly logger: CheckLogger;

    /**
     * Unique trace ID for this run.
     * Use for correlation in logs and events.
     */
    readonly traceId: string;
}

/**
 * Evaluator interface.
 *
 * @example
 * ```typescript
 * const kink: Evaluator<Equilibrium, Limits, "kink"> = {
 *     id: "kink",
 *     evaluate(eq, { config }) {
 *         const betaN = eq.beta / (eq.plasmaCurrent / 1e6 / (eq.minorRadius * eq.toroidalField));
 *         return createCheckResult("kink", {
 *             value     : betaN,
 *             threshold : config.kink.troyonLimit,
 *             comparison: "below",
 *         });
 *     },
 * };
 * ```
 */
export interface Evaluator<TInput, TConfig extends object, TId extends string = string> {
    /**
     * Unique identifier within a suite.
     * Becomes the id of the CheckResult.
     */
    readonly id: TId;

    readonly name?: string;

    readonly description?: string;

    /**
     * Evaluate the input.
     *
     * @param input - The input to evaluate (read-only)
     * @param context - Evaluation context (config, logger, traceId)
     */
    evaluate(input: Readonly<TInput>, context: EvaluationContext<TConfig>): CheckResult<TId>;
}

/**
 * Type guard to check if an object is an Evaluator.
 *
 * @param obj - The object to check
 * @returns True if the object has a string id and an evaluate function
 */
export function isEvaluator(obj: unknown): obj is Evaluator<unknown, object> {
    if (typeof obj !== "object" || obj === null) {
        return false;
    }
    if (!("id" in obj) || typeof obj.id !== "string") {
        return false;
    }
    return "evaluate" in obj && typeof obj.evaluate === "function";
}
