export {
    analyzeStability,
    createMhdSuite,
    kMHD_SUITE_ID,
    type AnalysisOptions,
    type MhdSuite,
} from "./analyzeStability.js";
