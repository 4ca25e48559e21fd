/**
 * @fileoverview EventBus Contract
 *
 * Pub/sub channel through which a CheckEngine run can be observed: logging,
 * progress output and tests subscribe here instead of wrapping evaluators.
 *
 * Dispatch is synchronous, like the runs that produce the events, and keeps
 * emission order for every subscriber.
 *
 * @module @limitcheck/engine/contracts/EventBus
 */

import type { Verdict } from "./CheckResult.js";

export type EventData = Record<string, unknown>;

export interface EventPayload {
    readonly type: string;

    /** ISO-8601 emission time */
    readonly timestamp: string;

    /** Run the event belongs to */
    readonly traceId?: string;

    readonly data?: EventData;
}

export type SuiteEventType =
    | "suite:starting"
    | "suite:completed"
    | "suite:failed";

export type CheckEventType =
    | "check:evaluated"
    | "check:inapplicable"
    | "check:error";

/**
 * Data carried by each event the engine emits.
 */
export type EngineEventData = {
    "suite:starting": {
        suiteId: string;
        evaluators: string[];
    };
    "suite:completed": {
        suiteId: string;
        verdict: Verdict;
        /** Wall time of the run [ms] */
        duration: number;
    };
    "suite:failed": {
        suiteId: string;
        checkId: string;
    };
    "check:evaluated": {
        suiteId: string;
        checkId: string;
        verdict: Verdict;
        value: number | null;
        threshold: number;
        margin: number | null;
        informational: boolean;
    };
    "check:inapplicable": {
        suiteId: string;
        checkId: string;
    };
    "check:error": {
        suiteId: string;
        checkId: string;
        error: string;
    };
};

export type EngineEventType = SuiteEventType | CheckEventType;

/**
 * Engine event types, plus any string for caller-defined events.
 */
export type EventType = EngineEventType | (string & {});

export type EventHandler = (event: EventPayload) => void;

export interface Subscription {
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("check:inapplicable", (event) => {
 *     console.warn("Nothing to evaluate:", event.data?.checkId);
 * });
 *
 * bus.emit(createEvent("check:inapplicable", { suiteId: "mhd", checkId: "tearing" }, "tr_abc"));
 *
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Deliver an event to the handlers of its type, then to "*" handlers.
     */
    emit(event: EventPayload): void;

    /**
     * @param eventType - Event type, or "*" for every event
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /**
     * Like subscribe, but the handler is removed after its first call.
     */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /**
     * Drop the handlers of one type, or every handler when called without a type or with "*".
     */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Build a timestamped event. Engine event types require their data shape.
 *
 * @example
 * ```typescript
 * createEvent("check:error", { suiteId: "mhd", checkId: "kink", error: "boom" }, traceId);
 * createEvent("report:written", { path: "report.json" });
 * ```
 */
export function createEvent<K extends EngineEventType>(
    type: K,
    data: EngineEventData[K],
    traceId?: string
): EventPayload;
export function createEvent<T extends string>(
    type: T extends EngineEventType ? never : T,
    data?: EventData,
    traceId?: string
): EventPayload;
export function createEvent(type: string, data?: EventData, traceId?: string): EventPayload {
    const event: EventPayload = {
        type,
        timestamp: new Date().toISOString(),
        traceId,
        data,
    };

    return event;
}
