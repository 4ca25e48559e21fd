/**
 * @fileoverview Engine barrel exports
 *
 * @module @limitcheck/engine/engine
 */

export {
    CheckEngine,
    type SuiteRegistration,
    type SuiteReport,
    type EngineConfig,
} from "./CheckEngine.js";
