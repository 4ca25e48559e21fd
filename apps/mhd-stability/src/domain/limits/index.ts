export {
    freezeLimits,
    getDefaultLimits,
    shapingFactor,
    type RadialScanSpec,
    type RationalSurface,
    type StabilityLimits,
} from "./StabilityLimits.js";
