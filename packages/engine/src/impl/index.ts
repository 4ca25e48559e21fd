/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @limitcheck/engine/impl
 */

export { InMemoryEventBus, type InMemoryEventBusOptions } from "./InMemoryEventBus.js";
