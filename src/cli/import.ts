import { Command, Option } from "commander";
import {
    MONITOR_OPTIONS,
    isMonitorOption,
    stripTrailingSlashes,
    type AppConfig,
} from "../config";
import { createLogger, withLogTiming } from "../utils/logger";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";
import { parseIdentifierFile } from "../utils/artistFiles";
import { ImportReport } from "../utils/importReport";
import { LidarrService } from "../services/lidarr";
import {
    importArtists,
    type ImportOptions,
    type LidarrCatalog,
} from "../services/catalogImporter";
import { RateLimiter } from "../services/rateLimiter";
import { applyLimit, parseIntegerOption, runCommand } from "./shared";

const log = createLogger("import");

export interface LidarrConnectionOptions {
    lidarrUrl: string;
    apiKey: string;
}

export interface LidarrImportFlags {
    root: string;
    qualityProfileId: number;
    metadataProfileId: number;
    monitor: string;
    searchMissing: boolean;
    dryRun: boolean;
    report: string;
}

export interface ImportCommandOptions
    extends LidarrConnectionOptions,
        LidarrImportFlags {
    input: string;
    limit: number;
}

export interface ImportDependencies {
    config: AppConfig;
    lidarr?: LidarrCatalog;
}

export function requireApiKey(apiKey: string): string {
    if (!apiKey) {
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            "Missing Lidarr API key. Set --api-key or LIDARR_API_KEY in .env"
        );
    }
    return apiKey;
}

export function toImportOptions(flags: LidarrImportFlags): ImportOptions {
    if (!isMonitorOption(flags.monitor)) {
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            `Invalid monitor option: ${flags.monitor}`
        );
    }
    return {
        rootFolder: flags.root,
        qualityProfileId: flags.qualityProfileId,
        metadataProfileId: flags.metadataProfileId,
        monitor: flags.monitor,
        searchForMissingAlbums: flags.searchMissing,
        dryRun: flags.dryRun,
    };
}

export function createLidarr(connection: LidarrConnectionOptions): LidarrCatalog {
    return new LidarrService({
        url: stripTrailingSlashes(connection.lidarrUrl),
        apiKey: requireApiKey(connection.apiKey),
        rateLimiter: new RateLimiter(),
    });
}

/**
 * Imports the MBIDs listed in `mbidsPath` and writes the run report.
 */
export async function importFromFile(
    mbidsPath: string,
    limit: number,
    flags: LidarrImportFlags,
    lidarr: LidarrCatalog
): Promise<number> {
    const mbids = applyLimit(parseIdentifierFile(mbidsPath), limit);
    if (mbids.length === 0) {
        log.info("No MBIDs found in input file.");
        return 0;
    }

    const options = toImportOptions(flags);
    await withLogTiming(
        log,
        "Lidarr import",
        () =>
            importArtists({
                mbids,
                lidarr,
                report: new ImportReport(flags.report),
                options,
            }),
        { count: mbids.length, report: flags.report }
    );
    return 0;
}

export async function runImport(
    options: ImportCommandOptions,
    deps: ImportDependencies
): Promise<number> {
    const lidarr = deps.lidarr ?? createLidarr(options);
    return importFromFile(options.input, options.limit, options, lidarr);
}

/** Lidarr flags shared by `import` and `bulk`. */
export function addLidarrOptions(command: Command, config: AppConfig): Command {
    return command
        .option("--quality-profile-id <id>", "Quality profile ID (0 = library default)", parseIntegerOption, config.lidarr.qualityProfileId)
        .option("--metadata-profile-id <id>", "Metadata profile ID (0 = library default)", parseIntegerOption, config.lidarr.metadataProfileId)
        .option("--dry-run", "Look artists up without adding them", false)
        .option("--report <path>", "Run report path", config.files.reportPath)
        .addOption(
            new Option("--monitor <choice>", "Monitor option for new artists")
                .choices(MONITOR_OPTIONS)
                .default(config.lidarr.monitor)
        )
        .option("--search-missing", "Search for missing albums after adding", false)
        .option("--lidarr-url <url>", "Base URL of the Lidarr server", config.lidarr.url)
        .option("--api-key <key>", "Lidarr API key", config.lidarr.apiKey);
}

export function registerImportCommand(program: Command, config: AppConfig): void {
    const command = program
        .command("import")
        .description("Add artists from an MBID list to Lidarr")
        .option("--input <path>", "Lines of lidarr:<mbid> or bare MBIDs", config.files.mbidsOutput)
        .option("--root <path>", "Lidarr root folder", config.lidarr.rootFolder)
        .option("--limit <n>", "Only process the first N MBIDs (0 = all)", parseIntegerOption, config.files.limit);

    addLidarrOptions(command, config).action(async (options: ImportCommandOptions) => {
        await runCommand("import", () => runImport(options, { config }));
    });
}
