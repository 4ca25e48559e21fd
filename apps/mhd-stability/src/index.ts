/**
 * @fileoverview MHD stability check - main entry point
 *
 * Evaluates the golden-ratio reference design against every MHD mode and
 * prints the report. Exit code 0 when stable, 1 when not, 2 on a
 * configuration error.
 *
 * Usage: mhd-stability [--json]
 *
 * @module mhd-stability
 */

// Load .env before reading MHD_* variables
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { readAppEnvironment } from "./config/index.js";
import { createAppLogger } from "./logger.js";
import { parseCliArgs, runStabilityCheck } from "./app.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function main(): void {
    const env = readAppEnvironment();
    const logger = createAppLogger({ debug: env.debug });
    const { format } = parseCliArgs(process.argv.slice(2));

    try {
        process.exitCode = runStabilityCheck({
            limitsFile: env.limitsFile ?? join(__dirname, "..", "config", "limits.yml"),
            format,
            logger,
            write     : (text) => {
                process.stdout.write(`${text}\n`);
            },
        });
    }
    catch (error) {
        logger.error("Stability check failed", {
            error: error instanceof Error ? error.message : String(error),
        });
        process.exitCode = 1;
    }
}

main();
