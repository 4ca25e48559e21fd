/**
 * @fileoverview Report barrel exports
 *
 * @module domain/report
 */

export {
    buildStabilityReport,
    disruptionProbability,
    findModeResult,
    type StabilityReport,
} from "./StabilityReport.js";
export {
    formatNumber,
    renderEquilibrium,
    renderJsonReport,
    renderModeRow,
    renderReport,
    renderTextReport,
    type ReportFormat,
} from "./renderReport.js";
