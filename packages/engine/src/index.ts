/**
 * @fileoverview Limit-check engine
 *
 * Domain-agnostic evaluation engine: compute a quantity, compare it to a
 * limit, aggregate the verdicts.
 *
 * The engine provides:
 * - The Evaluator contract (one implementation per check)
 * - Frozen CheckResults with oriented margins
 * - Verdict aggregation that keeps "inapplicable" apart from "pass"
 * - An in-memory event bus for observing runs
 *
 * @module @limitcheck/engine
 * @example
 * ```typescript
 * import {
 *     type Evaluator,
 *     CheckEngine,
 *     createCheckResult,
 * } from "@limitcheck/engine";
 *
 * const engine = new CheckEngine<Input, Limits>();
 * engine.registerSuite({ id: "limits", name: "Limits", evaluators, config });
 * const report = engine.run("limits", input);
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

// Check results
export type {
    CheckResult,
    CheckSample,
    Comparison,
    Measurement,
    Verdict,
} from "./contracts/index.js";
export {
    aggregateVerdict,
    createCheckResult,
    createInapplicableResult,
    createSample,
    createSkippedSample,
    isPassing,
    marginOf,
    meetsThreshold,
} from "./contracts/index.js";

// Evaluator
export type {
    CheckLogger,
    EvaluationContext,
    Evaluator,
} from "./contracts/index.js";
export { isEvaluator } from "./contracts/index.js";

// EventBus
export type {
    EngineEventData,
    EngineEventType,
    EventBus,
    EventData,
    EventPayload,
    EventHandler,
    EventType,
    SuiteEventType,
    CheckEventType,
    Subscription,
} from "./contracts/index.js";
export { createEvent } from "./contracts/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export { InMemoryEventBus, type InMemoryEventBusOptions } from "./impl/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export {
    CheckEngine,
    type SuiteRegistration,
    type SuiteReport,
    type EngineConfig,
} from "./engine/index.js";
