/**
 * @fileoverview Stability limits loader
 *
 * Loads StabilityLimits from a YAML file. Every section and key is optional;
 * whatever the file leaves out keeps its built-in default. Unknown keys are
 * rejected so a misspelt threshold cannot silently fall back.
 *
 * @module config/loadLimits
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import type { CheckLogger } from "@limitcheck/engine";
import {
    ConfigurationError,
    freezeLimits,
    getDefaultLimits,
    isConfigurationError,
    radialScanPoints,
    type RationalSurface,
    type StabilityLimits,
} from "../domain/index.js";

type RawMapping = Record<string, unknown>;

type NumberRule = "positive" | "nonNegative" | "positiveInteger" | "aboveOne";

const kRULE_DESCRIPTIONS: Record<NumberRule, string> = {
    positive       : "a positive number",
    nonNegative    : "a non-negative number",
    positiveInteger: "a positive integer",
    aboveOne       : "a number greater than 1",
};

const kSECTION_KEYS: Record<string, readonly string[]> = {
    ballooning : ["criticalCoefficient", "shearPerRadius", "elongationWeight", "triangularityWeight"],
    radialScan : ["start", "end", "samples"],
    kink       : ["troyonLimit"],
    tearing    : ["rationalSurfaces", "stabilizingFactor"],
    ntm        : ["betaTrigger"],
    sawtooth   : ["minimumAxisSafetyFactor"],
    rwm        : ["noWallCoefficient"],
    elm        : ["standardLossFraction"],
    disruption : ["baseProbability", "trackedModeChannels"],
};

const kTOP_LEVEL_KEYS: readonly string[] = [...Object.keys(kSECTION_KEYS), "goldenRatio"];

function isMapping(value: unknown): value is RawMapping {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function rejectUnknownKeys(raw: RawMapping, allowed: readonly string[], path: string): void {
    for (const key of Object.keys(raw)) {
        if (!allowed.includes(key)) {
            throw new ConfigurationError(path ? `${path}.${key}` : key, "unknown key");
        }
    }
}

function readSection(raw: RawMapping, key: string): RawMapping {
    const value = raw[key];
    if (value === undefined || value === null) {
        return {};
    }
    if (!isMapping(value)) {
        throw new ConfigurationError(key, "expected a mapping");
    }

    rejectUnknownKeys(value, kSECTION_KEYS[key] ?? [], key);
    return value;
}

function meetsRule(value: number, rule: NumberRule): boolean {
    switch (rule) {
        case "positive":
            return value > 0;
        case "nonNegative":
            return value >= 0;
        case "positiveInteger":
            return Number.isInteger(value) && value > 0;
        case "aboveOne":
            return value > 1;
    }
}

function readNumber(
    raw: RawMapping,
    key: string,
    path: string,
    fallback: number,
    rule: NumberRule = "positive"
): number {
    const value = raw[key];
    if (value === undefined) {
        return fallback;
    }

    const field = path ? `${path}.${key}` : key;
    if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new ConfigurationError(field, `expected a finite number, got ${JSON.stringify(value)}`);
    }
    if (!meetsRule(value, rule)) {
        throw new ConfigurationError(field, `expected ${kRULE_DESCRIPTIONS[rule]}, got ${value}`);
    }
    return value;
}

function readRationalSurfaces(
    raw: RawMapping,
    fallback: readonly RationalSurface[]
): readonly RationalSurface[] {
    const value = raw.rationalSurfaces;
    if (value === undefined) {
        return fallback;
    }
    if (!Array.isArray(value) || value.length === 0) {
        throw new ConfigurationError("tearing.rationalSurfaces", "expected a non-empty list of { m, n } pairs");
    }

    return value.map((entry: unknown, index): RationalSurface => {
        const path = `tearing.rationalSurfaces[${index}]`;
        if (!isMapping(entry)) {
            throw new ConfigurationError(path, "expected a mapping with 'm' and 'n'");
        }
        rejectUnknownKeys(entry, ["m", "n"], path);
        if (entry.m === undefined || entry.n === undefined) {
            throw new ConfigurationError(path, "expected both 'm' and 'n'");
        }

        return {
            m: readNumber(entry, "m", path, Number.NaN, "positiveInteger"),
            n: readNumber(entry, "n", path, Number.NaN, "positiveInteger"),
        };
    });
}

/**
 * Validate a parsed YAML document and merge it over the defaults.
 *
 * @param raw - Parsed document (null for an empty file)
 * @throws ConfigurationError naming the first invalid field
 */
export function parseStabilityLimits(raw: unknown): StabilityLimits {
    const defaults = getDefaultLimits();

    if (raw === null || raw === undefined) {
        return defaults;
    }
    if (!isMapping(raw)) {
        throw new ConfigurationError("limits", "expected a mapping at the top level");
    }
    rejectUnknownKeys(raw, kTOP_LEVEL_KEYS, "");

    const ballooning = readSection(raw, "ballooning");
    const radialScan = readSection(raw, "radialScan");
    const kink = readSection(raw, "kink");
    const tearing = readSection(raw, "tearing");
    const ntm = readSection(raw, "ntm");
    const sawtooth = readSection(raw, "sawtooth");
    const rwm = readSection(raw, "rwm");
    const elm = readSection(raw, "elm");
    const disruption = readSection(raw, "disruption");

    const limits: StabilityLimits = {
        goldenRatio: readNumber(raw, "goldenRatio", "", defaults.goldenRatio, "aboveOne"),
        ballooning : {
            criticalCoefficient: readNumber(ballooning, "criticalCoefficient", "ballooning", defaults.ballooning.criticalCoefficient),
            shearPerRadius     : readNumber(ballooning, "shearPerRadius", "ballooning", defaults.ballooning.shearPerRadius),
            elongationWeight   : readNumber(ballooning, "elongationWeight", "ballooning", defaults.ballooning.elongationWeight, "nonNegative"),
            triangularityWeight: readNumber(ballooning, "triangularityWeight", "ballooning", defaults.ballooning.triangularityWeight, "nonNegative"),
        },
        radialScan: {
            start  : readNumber(radialScan, "start", "radialScan", defaults.radialScan.start),
            end    : readNumber(radialScan, "end", "radialScan", defaults.radialScan.end),
            samples: readNumber(radialScan, "samples", "radialScan", defaults.radialScan.samples, "positiveInteger"),
        },
        kink: {
            troyonLimit: readNumber(kink, "troyonLimit", "kink", defaults.kink.troyonLimit),
        },
        tearing: {
            rationalSurfaces : readRationalSurfaces(tearing, defaults.tearing.rationalSurfaces),
            stabilizingFactor: readNumber(tearing, "stabilizingFactor", "tearing", defaults.tearing.stabilizingFactor, "nonNegative"),
        },
        ntm: {
            betaTrigger: readNumber(ntm, "betaTrigger", "ntm", defaults.ntm.betaTrigger),
        },
        sawtooth: {
            minimumAxisSafetyFactor: readNumber(sawtooth, "minimumAxisSafetyFactor", "sawtooth", defaults.sawtooth.minimumAxisSafetyFactor),
        },
        rwm: {
            noWallCoefficient: readNumber(rwm, "noWallCoefficient", "rwm", defaults.rwm.noWallCoefficient),
        },
        elm: {
            standardLossFraction: readNumber(elm, "standardLossFraction", "elm", defaults.elm.standardLossFraction),
        },
        disruption: {
            baseProbability    : readNumber(disruption, "baseProbability", "disruption", defaults.disruption.baseProbability),
            trackedModeChannels: readNumber(disruption, "trackedModeChannels", "disruption", defaults.disruption.trackedModeChannels, "nonNegative"),
        },
    };

    // Range checks shared with the scanner
    radialScanPoints(limits.radialScan);

    return freezeLimits(limits);
}

/**
 * Load stability limits from a YAML file.
 *
 * @param filePath - Path to the limits.yml file
 * @returns Frozen limits, defaults filled in
 * @throws Error if the file doesn't exist or is not valid YAML
 * @throws ConfigurationError if a value is invalid
 *
 * @example
 * ```typescript
 * const limits = loadStabilityLimits("./config/limits.yml");
 * console.log(limits.kink.troyonLimit); // 2.8
 * ```
 */
export function loadStabilityLimits(filePath: string): StabilityLimits {
    if (!existsSync(filePath)) {
        throw new Error(`Stability limits file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    return parseStabilityLimits(parseYaml(content));
}

/**
 * Load stability limits, falling back to the defaults when the file cannot
 * be read or parsed. Invalid values are still fatal.
 *
 * @param filePath - Path to the limits.yml file
 * @param logger - Receives the fallback warning
 */
export function loadStabilityLimitsWithFallback(filePath: string, logger: CheckLogger): StabilityLimits {
    try {
        return loadStabilityLimits(filePath);
    }
    catch (error) {
        if (isConfigurationError(error)) {
            throw error;
        }

        logger.warn(`Failed to load limits from ${filePath}, using built-in defaults`, {
            error: error instanceof Error ? error.message : String(error),
        });
        return getDefaultLimits();
    }
}
