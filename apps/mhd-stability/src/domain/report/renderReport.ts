/**
 * @fileoverview Report rendering
 *
 * Text and JSON renderings of a StabilityReport. Rendering reads only the
 * structured report; evaluators know nothing about output formats.
 *
 * @module domain/report/renderReport
 */

import type { CheckResult, Verdict } from "@limitcheck/engine";
import type { EquilibriumParameters } from "../equilibrium/index.js";
import { inverseAspectRatio } from "../equilibrium/index.js";
import { kMODE_LABELS, type ModeResult } from "../modes/index.js";
import type { StabilityReport } from "./StabilityReport.js";
import { findModeResult } from "./StabilityReport.js";

export type ReportFormat = "text" | "json";

const kRULE = "=".repeat(75);
const kBANNER_WIDTH = 63;

const kTABLE_HEADER = "  "
    + "Mode Type".padEnd(25)
    + "Status".padEnd(14)
    + "Value".padStart(12)
    + "Threshold".padStart(12)
    + "Margin".padStart(12);

const kSTATUS: Readonly<Record<Verdict, string>> = {
    pass        : "✓ STABLE",
    fail        : "✗ UNSTABLE",
    inapplicable: "- N/A",
};

/**
 * Format a number for the table: fixed notation in [1e-3, 1e4), scientific otherwise.
 */
export function formatNumber(value: number | null): string {
    if (value === null) {
        return "n/a";
    }
    if (value === 0) {
        return "0";
    }

    const magnitude = Math.abs(value);
    if (magnitude >= 1e-3 && magnitude < 1e4) {
        return value.toFixed(4);
    }
    return value.toExponential(2);
}

function statusOf(result: CheckResult): string {
    return result.informational ? "✓ MITIGATED" : kSTATUS[result.verdict];
}

function banner(text: string): string[] {
    const padding = kBANNER_WIDTH - text.length;
    const left = Math.floor(padding / 2);
    const inner = " ".repeat(left) + text + " ".repeat(padding - left);

    return [
        `  ╔${"═".repeat(kBANNER_WIDTH)}╗`,
        `  ║${inner}║`,
        `  ╚${"═".repeat(kBANNER_WIDTH)}╝`,
    ];
}

/**
 * Render the equilibrium header lines.
 */
export function renderEquilibrium(equilibrium: EquilibriumParameters): string[] {
    return [
        "PLASMA EQUILIBRIUM PARAMETERS:",
        "-".repeat(40),
        `  R₀ = ${equilibrium.majorRadius.toFixed(2)} m, a = ${equilibrium.minorRadius.toFixed(2)} m (a/R = ${inverseAspectRatio(equilibrium).toFixed(3)})`,
        `  B₀ = ${equilibrium.toroidalField.toFixed(2)} T`,
        `  n = ${equilibrium.density.toExponential(2)} m⁻³, T = ${equilibrium.temperature.toFixed(2)} keV`,
        `  β = ${(equilibrium.beta * 100).toFixed(2)}%`,
        `  I_p = ${(equilibrium.plasmaCurrent / 1e6).toFixed(1)} MA`,
        `  q₀ = ${equilibrium.q0.toFixed(1)}, q₉₅ = ${equilibrium.q95.toFixed(1)}`,
        `  κ = ${equilibrium.elongation.toFixed(1)}, δ = ${equilibrium.triangularity.toFixed(1)}`,
        `  H = ${equilibrium.confinementEnhancement.toFixed(1)}`,
    ];
}

/**
 * Render one table row: mode, status, value, threshold, margin.
 */
export function renderModeRow(result: ModeResult): string {
    const label = kMODE_LABELS[result.id];

    return "  "
        + label.padEnd(25)
        + statusOf(result).padEnd(14)
        + formatNumber(result.value).padStart(12)
        + formatNumber(result.threshold).padStart(12)
        + formatNumber(result.margin).padStart(12);
}

/**
 * Render the full fixed-format text report.
 */
export function renderTextReport(report: StabilityReport, equilibrium: EquilibriumParameters): string {
    const lines: string[] = [
        kRULE,
        "MHD STABILITY SUMMARY",
        kRULE,
        "",
        ...renderEquilibrium(equilibrium),
        "",
        kTABLE_HEADER,
        "  " + "-".repeat(kTABLE_HEADER.length - 2),
        ...report.modeResults.map(renderModeRow),
        "",
    ];

    const elm = findModeResult(report, "elm");
    if (elm && elm.value !== null) {
        lines.push(
            `  ELM energy loss: standard ${(elm.threshold * 100).toFixed(1)}%, mitigated ${(elm.value * 100).toFixed(2)}%`,
            ""
        );
    }

    if (report.inapplicableModes.length > 0) {
        const names = report.inapplicableModes.map(m => kMODE_LABELS[m]).join(", ");
        lines.push(`  Not applicable to this equilibrium: ${names}`, "");
    }

    lines.push(...banner(report.overallStable
        ? "ALL MHD MODES STABLE: DISRUPTION-FREE OPERATION"
        : "MHD STABILITY LIMITS VIOLATED: DESIGN NOT FEASIBLE"));

    lines.push(
        "",
        `  DISRUPTION PROBABILITY: ${report.disruptionProbability.toExponential(2)}`,
        "",
        kRULE
    );

    return lines.join("\n");
}

/**
 * Render the report and its equilibrium as pretty-printed JSON.
 */
export function renderJsonReport(report: StabilityReport, equilibrium: EquilibriumParameters): string {
    return JSON.stringify({ equilibrium, report }, null, 2);
}

/**
 * Render in the requested format.
 */
export function renderReport(
    report: StabilityReport,
    equilibrium: EquilibriumParameters,
    format: ReportFormat
): string {
    return format === "json"
        ? renderJsonReport(report, equilibrium)
        : renderTextReport(report, equilibrium);
}
