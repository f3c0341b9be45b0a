import { Command } from "commander";
import type { AppConfig } from "../config";
import { BRAND_CLI_NAME, BRAND_VERSION } from "../config/brand";
import { setLogLevel } from "../utils/logger";
import { registerResolveCommand } from "./resolve";
import { registerImportCommand } from "./import";
import { registerExportCommand } from "./export";
import { registerBulkCommand } from "./bulk";

export function createProgram(config: AppConfig): Command {
    const program = new Command();

    program
        .name(BRAND_CLI_NAME)
        .description(
            "Resolve artist names to MusicBrainz IDs, add them to Lidarr and export Spotify libraries"
        )
        .version(BRAND_VERSION)
        .option("-v, --verbose", "Log debug output")
        .option("-q, --quiet", "Only log warnings and errors")
        .hook("preAction", (thisCommand) => {
            const opts = thisCommand.opts<{ verbose?: boolean; quiet?: boolean }>();
            if (opts.verbose) {
                setLogLevel("debug");
            } else if (opts.quiet) {
                setLogLevel("warn");
            }
        });

    registerResolveCommand(program, config);
    registerImportCommand(program, config);
    registerExportCommand(program, config);
    registerBulkCommand(program, config);

    return program;
}
