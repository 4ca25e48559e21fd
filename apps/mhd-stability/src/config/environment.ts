/**
 * @fileoverview Environment settings
 *
 * @module config/environment
 */

export interface AppEnvironment {
    /** Overrides the bundled config/limits.yml */
    readonly limitsFile?: string;

    /** MHD_DEBUG=1 enables debug logging */
    readonly debug: boolean;
}

export function readAppEnvironment(env: NodeJS.ProcessEnv = process.env): AppEnvironment {
    const limitsFile = env.MHD_LIMITS_FILE?.trim();

    return {
        limitsFile: limitsFile ? limitsFile : undefined,
        debug     : env.MHD_DEBUG === "1" || env.MHD_DEBUG === "true",
    };
}
