/**
 * @fileoverview Contract barrel exports
 *
 * All domain-agnostic interfaces and types that define
 * the check engine contract.
 *
 * @module @limitcheck/engine/contracts
 */

// Check results
export type {
    CheckResult,
    CheckSample,
    Comparison,
    Measurement,
    Verdict,
} from "./CheckResult.js";
export {
    aggregateVerdict,
    createCheckResult,
    createInapplicableResult,
    createSample,
    createSkippedSample,
    isPassing,
    marginOf,
    meetsThreshold,
} from "./CheckResult.js";

// Evaluator contract
export type {
    CheckLogger,
    EvaluationContext,
    Evaluator,
} from "./Evaluator.js";
export { isEvaluator } from "./Evaluator.js";

// EventBus contract
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
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
