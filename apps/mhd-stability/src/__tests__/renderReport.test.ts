/**
 * @fileoverview Unit tests for report rendering
 *
 * @module __tests__/renderReport
 */

import { describe, it, expect, vi } from "vitest";
import type { CheckLogger } from "@limitcheck/engine";
import {
    analyzeStability,
    createEquilibrium,
    deriveReferenceEquilibrium,
    findModeResult,
    formatNumber,
    getDefaultLimits,
    renderJsonReport,
    renderModeRow,
    renderReport,
    renderTextReport,
    type StabilityLimits,
} from "../domain/index.js";

const limits = getDefaultLimits();
const reference = deriveReferenceEquilibrium(limits.goldenRatio);

const silentLogger: CheckLogger = {
    debug: vi.fn(),
    info : vi.fn(),
    warn : vi.fn(),
    error: vi.fn(),
};

describe("formatNumber", () => {
    it("should use fixed notation for moderate magnitudes", () => {
        expect(formatNumber(0.0414905)).toBe("0.0415");
        expect(formatNumber(-0.3002693)).toBe("-0.3003");
        expect(formatNumber(2.8)).toBe("2.8000");
    });

    it("should use scientific notation for very small or large magnitudes", () => {
        expect(formatNumber(1.8256e-4)).toBe("1.83e-4");
        expect(formatNumber(12345)).toBe("1.23e+4");
    });

    it("should render zero and missing values", () => {
        expect(formatNumber(0)).toBe("0");
        expect(formatNumber(null)).toBe("n/a");
    });
});

describe("renderModeRow", () => {
    it("should align mode, status, value, threshold and margin", () => {
        const report = analyzeStability(reference, limits, { logger: silentLogger });
        const kink = findModeResult(report, "kink");
        if (!kink) {
            throw new Error("kink result missing");
        }

        expect(renderModeRow(kink)).toBe(
            "  Kink Modes               ✓ STABLE            0.0415      2.8000      2.7585"
        );
    });
});

describe("renderTextReport", () => {
    const report = analyzeStability(reference, limits, { logger: silentLogger });
    const lines = renderTextReport(report, reference).split("\n");

    // Scenario: Equilibrium header
    it("should print the equilibrium parameters", () => {
        expect(lines).toContain("  R₀ = 11.09 m, a = 2.62 m (a/R = 0.236)");
        expect(lines).toContain("  B₀ = 24.60 T");
        expect(lines).toContain("  n = 8.27e+20 m⁻³, T = 29.65 keV");
        expect(lines).toContain("  β = 1.63%");
        expect(lines).toContain("  I_p = 25.3 MA");
        expect(lines).toContain("  q₀ = 1.0, q₉₅ = 3.0");
        expect(lines).toContain("  κ = 1.7, δ = 0.4");
        expect(lines).toContain("  H = 77.8");
    });

    it("should print the ELM mitigation line and mark ELMs as mitigated", () => {
        expect(lines).toContain("  ELM energy loss: standard 7.0%, mitigated 0.51%");
        expect(lines.some(l => l.startsWith("  Edge Localized Modes     ✓ MITIGATED"))).toBe(true);
    });

    it("should print the stable banner and the disruption probability", () => {
        expect(lines).toContain("  ║        ALL MHD MODES STABLE: DISRUPTION-FREE OPERATION        ║");
        expect(lines).toContain("  DISRUPTION PROBABILITY: 1.83e-4");
        expect(lines.some(l => l.includes("Not applicable"))).toBe(false);
    });

    it("should print the infeasible banner for an unstable design", () => {
        const unstable = analyzeStability(createEquilibrium({ ...reference, beta: 0.025 }), limits, {
            logger: silentLogger,
        });

        const text = renderTextReport(unstable, reference);

        expect(text.split("\n")).toContain("  ║      MHD STABILITY LIMITS VIOLATED: DESIGN NOT FEASIBLE       ║");
    });

    // Scenario: Inapplicable modes are shown as such
    it("should list inapplicable modes", () => {
        const noSurfaces: StabilityLimits = {
            ...limits,
            tearing: { ...limits.tearing, rationalSurfaces: [{ m: 10, n: 1 }] },
        };
        const partial = analyzeStability(reference, noSurfaces, { logger: silentLogger });

        const partialLines = renderTextReport(partial, reference).split("\n");

        expect(partialLines).toContain("  Not applicable to this equilibrium: Tearing Modes");
        expect(partialLines).toContain(
            "  Tearing Modes            - N/A                  n/a           0         n/a"
        );
    });
});

describe("renderJsonReport", () => {
    it("should serialize the equilibrium and the structured report", () => {
        const report = analyzeStability(reference, limits, { logger: silentLogger });

        const parsed: unknown = JSON.parse(renderJsonReport(report, reference));

        expect(parsed).toMatchObject({
            equilibrium: { q0: 1, q95: 3, beta: 0.0163 },
            report     : { overallStable: true, inapplicableModes: [] },
        });
        expect(renderReport(report, reference, "json")).toBe(renderJsonReport(report, reference));
        expect(renderReport(report, reference, "text")).toBe(renderTextReport(report, reference));
    });
});
