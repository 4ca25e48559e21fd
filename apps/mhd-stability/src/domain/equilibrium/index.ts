export {
    confinementEnhancement,
    createEquilibrium,
    deriveReferenceEquilibrium,
    inverseAspectRatio,
    safetyFactorAt,
    type EquilibriumParameters,
} from "./EquilibriumParameters.js";
