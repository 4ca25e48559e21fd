/**
 * @fileoverview Application logger
 *
 * Level-prefixed logger writing through console.error (stderr), so stdout
 * carries only the report.
 *
 * @module logger
 */

import type { CheckLogger } from "@limitcheck/engine";

export interface AppLoggerOptions {
    /** Emit debug lines (MHD_DEBUG=1) */
    readonly debug?: boolean;

    /** Line sink (default: console.error) */
    readonly write?: (line: string) => void;
}

function formatLine(level: string, message: string, data?: Record<string, unknown>): string {
    const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : "";
    return `[${level}] ${message}${suffix}`;
}

export function createAppLogger(options: AppLoggerOptions = {}): CheckLogger {
    const write = options.write ?? ((line: string) => {
        console.error(line);
    });

    return {
        debug: (msg, data) => {
            if (options.debug) {
                write(formatLine("DEBUG", msg, data));
            }
        },
        info : (msg, data) => write(formatLine("INFO", msg, data)),
        warn : (msg, data) => write(formatLine("WARN", msg, data)),
        error: (msg, data) => write(formatLine("ERROR", msg, data)),
    };
}
