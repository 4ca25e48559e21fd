/**
 * @fileoverview CheckEngine
 *
 * The core orchestration engine for limit checks.
 *
 * Pipeline flow:
 * 1. Input handed to a registered suite (read-only)
 * 2. All evaluators run, in registration order
 * 3. Verdicts aggregated (inapplicable results excluded)
 * 4. Frozen report returned
 *
 * Design principles:
 * - Domain-agnostic: knows nothing about plasmas or reactors
 * - Plugin-based: every check is an Evaluator
 * - Observable: emits events at each stage of a run
 * - All-or-nothing: an evaluator error aborts the run
 *
 * @module @limitcheck/engine/engine/CheckEngine
 */

import type { CheckResult, Verdict } from "../contracts/CheckResult.js";
import { aggregateVerdict } from "../contracts/CheckResult.js";
import type {
    CheckLogger,
    EvaluationContext,
    Evaluator,
} from "../contracts/Evaluator.js";
import { isEvaluator } from "../contracts/Evaluator.js";
import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";

/**
 * Suite registration - evaluators plus the configuration they read.
 */
export interface SuiteRegistration<TInput, TConfig extends object, TId extends string = string> {
    /** Unique identifier for this suite */
    readonly id: string;

    /** Human-readable name */
    readonly name: string;

    /** Evaluators, run in this order */
    readonly evaluators: readonly Evaluator<TInput, TConfig, TId>[];

    /** Limits and constants handed to every evaluator */
    readonly config: Readonly<TConfig>;
}

/**
 * Engine configuration options.
 */
export interface EngineConfig {
    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for engine operations */
    readonly logger?: CheckLogger;
}

/**
 * Result of running one suite.
 */
export interface SuiteReport<TId extends string = string> {
    readonly suiteId: string;
    readonly traceId: string;

    /** One result per evaluator, in registration order */
    readonly results: readonly CheckResult<TId>[];

    /** Aggregate over non-informational results */
    readonly verdict: Verdict;

    /** True only when the aggregate verdict is "pass" */
    readonly passed: boolean;

    /** Ids of evaluators that had nothing to evaluate */
    readonly inapplicable: readonly TId[];
}

/**
 * Default console logger.
 */
const defaultLogger: CheckLogger = {
    debug: (msg, data) => console.debug(`[DEBUG] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[INFO] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[WARN] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};

/**
 * Generate a unique trace ID for a run.
 */
function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `tr_${timestamp}_${random}`;
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * CheckEngine - runs suites of evaluators against an input.
 *
 * @example
 * ```typescript
 * const engine = new CheckEngine<Equilibrium, Limits, ModeName>();
 *
 * engine.registerSuite({
 *     id        : "mhd",
 *     name      : "MHD Stability",
 *     evaluators: [ballooning, kink, tearing],
 *     config    : limits,
 * });
 *
 * engine.eventBus.subscribe("check:inapplicable", (event) => {
 *     console.warn("Nothing to evaluate:", event.data);
 * });
 *
 * const report = engine.run("mhd", equilibrium);
 * ```
 */
export class CheckEngine<TInput, TConfig extends object, TId extends string = string> {
    private readonly logger: CheckLogger;
    private readonly suites: Map<string, SuiteRegistration<TInput, TConfig, TId>> = new Map();

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(config: EngineConfig = {}) {
        this.eventBus = config.eventBus ?? new InMemoryEventBus();
        this.logger = config.logger ?? defaultLogger;
    }

    /**
     * Register a suite with the engine.
     *
     * @param suite - Suite registration with evaluators and config
     * @throws Error if the suite id is taken, the suite is empty, an entry is
     *         not an Evaluator, or two evaluators share an id
     */
    registerSuite(suite: SuiteRegistration<TInput, TConfig, TId>): void {
        if (this.suites.has(suite.id)) {
            throw new Error(`Suite already registered: ${suite.id}`);
        }

        if (suite.evaluators.length === 0) {
            throw new Error(`Suite has no evaluators: ${suite.id}`);
        }

        const seen = new Set<string>();
        for (const [index, evaluator] of suite.evaluators.entries()) {
            if (!isEvaluator(evaluator)) {
                throw new Error(`Invalid evaluator at index ${index} in suite ${suite.id}`);
            }
            if (seen.has(evaluator.id)) {
                throw new Error(`Duplicate evaluator id in suite ${suite.id}: ${evaluator.id}`);
            }
            seen.add(evaluator.id);
        }

        this.suites.set(suite.id, suite);
        this.logger.info("Suite registered", {
            suiteId   : suite.id,
            name      : suite.name,
            evaluators: suite.evaluators.length,
        });
    }

    /**
     * Unregister a suite from the engine.
     *
     * @param suiteId - The suite ID to unregister
     */
    unregisterSuite(suiteId: string): void {
        if (this.suites.delete(suiteId)) {
            this.logger.info("Suite unregistered", { suiteId });
        }
    }

    /**
     * Ids of the registered suites, in registration order.
     */
    get suiteIds(): string[] {
        return Array.from(this.suites.keys());
    }

    /**
     * Run every evaluator of a suite against the input.
     *
     * @param suiteId - Registered suite to run
     * @param input - Input handed to each evaluator (read-only)
     * @returns Frozen suite report
     * @throws Error if the suite is unknown; rethrows any evaluator error
     */
    run(suiteId: string, input: Readonly<TInput>): SuiteReport<TId> {
        const suite = this.suites.get(suiteId);
        if (!suite) {
            throw new Error(`Unknown suite: ${suiteId}`);
        }

        const traceId = generateTraceId();
        const startTime = Date.now();

        this.emit(createEvent("suite:starting", {
            suiteId,
            evaluators: suite.evaluators.map(e => e.id),
        }, traceId));

        const results: CheckResult<TId>[] = [];

        for (const evaluator of suite.evaluators) {
            const context: EvaluationContext<TConfig> = {
                config: suite.config,
                logger: this.createEvaluatorLogger(suiteId, evaluator.id, traceId),
                traceId,
            };

            let result: CheckResult<TId>;
            try {
                result = evaluator.evaluate(input, context);
            }
            catch (error) {
                this.logger.error("Evaluator error", {
                    suiteId,
                    checkId: evaluator.id,
                    traceId,
                    error  : describeError(error),
                });
                this.emit(createEvent("check:error", {
                    suiteId,
                    checkId: evaluator.id,
                    error  : describeError(error),
                }, traceId));
                this.emit(createEvent("suite:failed", {
                    suiteId,
                    checkId: evaluator.id,
                }, traceId));
                throw error;
            }

            results.push(result);

            if (result.verdict === "inapplicable") {
                this.emit(createEvent("check:inapplicable", {
                    suiteId,
                    checkId: result.id,
                }, traceId));
            }
            else {
                this.emit(createEvent("check:evaluated", {
                    suiteId,
                    checkId      : result.id,
                    verdict      : result.verdict,
                    value        : result.value,
                    threshold    : result.threshold,
                    margin       : result.margin,
                    informational: result.informational,
                }, traceId));
            }
        }

        const verdict = aggregateVerdict(
            results.filter(r => !r.informational).map(r => r.verdict)
        );

        const report: SuiteReport<TId> = {
            suiteId,
            traceId,
            results     : Object.freeze(results),
            verdict,
            passed      : verdict === "pass",
            inapplicable: Object.freeze(
                results.filter(r => r.verdict === "inapplicable").map(r => r.id)
            ),
        };

        const duration = Date.now() - startTime;
        this.emit(createEvent("suite:completed", {
            suiteId,
            verdict,
            duration,
        }, traceId));

        this.logger.debug("Suite completed", {
            suiteId,
            traceId,
            verdict,
            results: results.length,
            duration,
        });

        return Object.freeze(report);
    }

    /**
     * Emit an event to the event bus.
     */
    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }

    /**
     * Create a logger for an evaluator.
     */
    private createEvaluatorLogger(suiteId: string, checkId: string, traceId: string): CheckLogger {
        return {
            debug: (msg, data) => this.logger.debug(`[${suiteId}:${checkId}] ${msg}`, { ...data, traceId }),
            info : (msg, data) => this.logger.info(`[${suiteId}:${checkId}] ${msg}`, { ...data, traceId }),
            warn : (msg, data) => this.logger.warn(`[${suiteId}:${checkId}] ${msg}`, { ...data, traceId }),
            error: (msg, data) => this.logger.error(`[${suiteId}:${checkId}] ${msg}`, { ...data, traceId }),
        };
    }
}
