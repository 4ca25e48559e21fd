/**
 * @fileoverview Configuration errors
 *
 * Raised when an equilibrium or a limits file holds values the formulas
 * cannot use (non-finite numbers, q95 <= q0, a >= R, ...).
 *
 * @module domain/errors/ConfigurationError
 */

export class ConfigurationError extends Error {
    /** Dotted path of the offending field, e.g. "q95" or "radialScan.samples" */
    readonly field: string;

    constructor(field: string, message: string) {
        super(`Invalid configuration for '${field}': ${message}`);
        this.name = "ConfigurationError";
        this.field = field;
    }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
    return error instanceof ConfigurationError;
}
