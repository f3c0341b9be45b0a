import { Command } from "commander";
import type { AppConfig } from "../config";
import { createLogger } from "../utils/logger";
import { parseArtistsFile } from "../utils/artistFiles";
import {
    resolveArtistsToMbids,
    type ArtistSearch,
} from "../services/artistResolver";
import type { LidarrCatalog } from "../services/catalogImporter";
import {
    EXIT_INTERRUPTED,
    applyLimit,
    listenForInterrupt,
    parseIntegerOption,
    parseNumberOption,
    runCommand,
    type InterruptHandle,
} from "./shared";
import { createMusicBrainz, summarizeResolution } from "./resolve";
import {
    addLidarrOptions,
    createLidarr,
    importFromFile,
    type LidarrConnectionOptions,
    type LidarrImportFlags,
} from "./import";

const log = createLogger("bulk");

export interface BulkCommandOptions
    extends LidarrConnectionOptions,
        Omit<LidarrImportFlags, "root"> {
    mbidsOutput: string;
    lidarrRoot: string;
    limit: number;
    mbInterval: number;
    minScore: number;
}

export interface BulkDependencies {
    config: AppConfig;
    /** Released once resolving ends so Ctrl+C during the import quits. */
    interrupt?: InterruptHandle;
    musicbrainz?: ArtistSearch;
    lidarr?: LidarrCatalog;
}

/**
 * Resolves the names file into a fresh MBID list, then imports that list.
 * An interrupted resolve skips the import.
 */
export async function runBulk(
    artistsPath: string,
    options: BulkCommandOptions,
    deps: BulkDependencies
): Promise<number> {
    const lidarr = deps.lidarr ?? createLidarr(options);

    const names = applyLimit(parseArtistsFile(artistsPath), options.limit);
    if (names.length === 0) {
        log.info(`No artist names found in ${artistsPath}.`);
        return 0;
    }

    const resolution = await resolveArtistsToMbids({
        names,
        outputPath: options.mbidsOutput,
        append: false,
        musicbrainz:
            deps.musicbrainz ??
            createMusicBrainz(deps.config, options.mbInterval, options.minScore),
        signal: deps.interrupt?.signal,
    });
    deps.interrupt?.dispose();
    summarizeResolution(resolution, options.mbidsOutput);

    if (resolution.interrupted) {
        log.info("Skipping Lidarr import.");
        return EXIT_INTERRUPTED;
    }

    return importFromFile(
        options.mbidsOutput,
        0,
        { ...options, root: options.lidarrRoot },
        lidarr
    );
}

export function registerBulkCommand(program: Command, config: AppConfig): void {
    const command = program
        .command("bulk")
        .description("Resolve an artist list and add the matches to Lidarr")
        .argument("[artists]", "Artist names, one per line", config.files.artistsFile)
        .option("--mbids-output <path>", "Output path for MBIDs", config.files.mbidsOutput)
        .option("--lidarr-root <path>", "Lidarr root folder", config.lidarr.rootFolder)
        .option("--limit <n>", "Only process the first N artists (0 = all)", parseIntegerOption, config.files.limit)
        .option(
            "--mb-interval <seconds>",
            "Minimum seconds between MusicBrainz requests",
            parseNumberOption,
            config.musicbrainz.requestIntervalSeconds
        )
        .option("--min-score <score>", "Lowest accepted search score", parseNumberOption, config.musicbrainz.minScore);

    addLidarrOptions(command, config).action(
        async (artists: string, options: BulkCommandOptions) => {
            const interrupt = listenForInterrupt();
            try {
                await runCommand("bulk", () =>
                    runBulk(artists, options, { config, interrupt })
                );
            } finally {
                interrupt.dispose();
            }
        }
    );
}
