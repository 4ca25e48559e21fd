/**
 * @fileoverview Domain barrel exports
 *
 * All domain-specific implementations for the MHD stability app.
 *
 * @module domain
 */

export * from "./errors/index.js";
export * from "./modes/index.js";
export * from "./equilibrium/index.js";
export * from "./limits/index.js";
export * from "./scanners/index.js";
export * from "./evaluators/index.js";
export * from "./report/index.js";
export * from "./analysis/index.js";
