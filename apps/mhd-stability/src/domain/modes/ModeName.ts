/**
 * @fileoverview MHD mode identifiers
 *
 * @module domain/modes/ModeName
 */

import type { CheckResult } from "@limitcheck/engine";

/**
 * Instability classes, in report order.
 */
export const kMODE_ORDER = [
    "ballooning",
    "kink",
    "tearing",
    "ntm",
    "sawtooth",
    "rwm",
    "elm",
] as const;

export type ModeName = (typeof kMODE_ORDER)[number];

/**
 * Display names used by the report table.
 */
export const kMODE_LABELS: Readonly<Record<ModeName, string>> = {
    ballooning: "Ballooning Modes",
    kink      : "Kink Modes",
    tearing   : "Tearing Modes",
    ntm       : "NTM Modes",
    sawtooth  : "Sawteeth",
    rwm       : "Resistive Wall Modes",
    elm       : "Edge Localized Modes",
};

/**
 * Result of one mode evaluator.
 */
export type ModeResult = CheckResult<ModeName>;
