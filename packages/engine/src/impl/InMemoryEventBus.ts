/**
 * @fileoverview In-memory EventBus
 *
 * Synchronous dispatch with "*" wildcard subscriptions and one-shot handlers.
 * A handler that throws never interrupts a run: its error goes to the
 * configured error sink and dispatch carries on.
 *
 * @module @limitcheck/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";

type SubscriptionKey = EventType | "*";

export interface InMemoryEventBusOptions {
    /**
     * Receives errors thrown by handlers.
     * Defaults to console.error.
     */
    onHandlerError?: (error: unknown, event: EventPayload, subscribedTo: SubscriptionKey) => void;
}

function reportToConsole(error: unknown, event: EventPayload, subscribedTo: SubscriptionKey): void {
    const label = subscribedTo === "*"
        ? "EventBus wildcard handler error:"
        : `EventBus handler error for ${event.type}:`;
    console.error(label, error);
}

/**
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("check:evaluated", (event) => {
 *     console.log(event.data?.checkId, event.data?.verdict);
 * });
 *
 * const engine = new CheckEngine({ eventBus: bus });
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers: Map<SubscriptionKey, Set<EventHandler>> = new Map();
    private readonly onHandlerError: NonNullable<InMemoryEventBusOptions["onHandlerError"]>;

    constructor(options: InMemoryEventBusOptions = {}) {
        this.onHandlerError = options.onHandlerError ?? reportToConsole;
    }

    /**
     * Handlers of the event's own type run first, then "*" handlers.
     */
    emit(event: EventPayload): void {
        this.dispatch(event.type, event);
        this.dispatch("*", event);
    }

    subscribe(eventType: SubscriptionKey, handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }
        handlers.add(handler);

        return {
            unsubscribe: () => this.remove(eventType, handler),
        };
    }

    once(eventType: EventType, handler: EventHandler): Subscription {
        const subscription = this.subscribe(eventType, (event) => {
            subscription.unsubscribe();
            handler(event);
        });
        return subscription;
    }

    /**
     * @param eventType - Type to clear; omitted or "*" clears every subscription
     */
    clear(eventType?: SubscriptionKey): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
            return;
        }
        this.handlers.delete(eventType);
    }

    /**
     * Number of handlers subscribed to a type (test helper).
     */
    handlerCount(eventType: SubscriptionKey): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private remove(eventType: SubscriptionKey, handler: EventHandler): void {
        const handlers = this.handlers.get(eventType);
        if (!handlers) {
            return;
        }

        handlers.delete(handler);
        if (handlers.size === 0) {
            this.handlers.delete(eventType);
        }
    }

    private dispatch(key: SubscriptionKey, event: EventPayload): void {
        const handlers = this.handlers.get(key);
        if (!handlers) {
            return;
        }

        // Copy first: once() handlers remove themselves mid-dispatch
        for (const handler of [...handlers]) {
            try {
                handler(event);
            }
            catch (error) {
                this.onHandlerError(error, event, key);
            }
        }
    }
}
