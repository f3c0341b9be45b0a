#!/usr/bin/env node

import { loadConfig, type AppConfig } from "./config";
import { createProgram } from "./cli/program";
import { logger } from "./utils/logger";
import { AppError } from "./utils/errors";

async function main(): Promise<void> {
    let config: AppConfig;
    try {
        config = loadConfig();
    } catch (error) {
        if (error instanceof AppError) {
            logger.error(error.message);
        } else {
            logger.error("Failed to load configuration", { error });
        }
        process.exitCode = 1;
        return;
    }

    await createProgram(config).parseAsync(process.argv);
}

main().catch((error: unknown) => {
    logger.error("Fatal error", { error });
    process.exitCode = 1;
});
