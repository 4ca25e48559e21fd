export {
    loadStabilityLimits,
    loadStabilityLimitsWithFallback,
    parseStabilityLimits,
} from "./loadLimits.js";
export { readAppEnvironment, type AppEnvironment } from "./environment.js";
