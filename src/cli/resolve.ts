import { Command } from "commander";
import type { AppConfig } from "../config";
import { createLogger } from "../utils/logger";
import { parseArtistsFile } from "../utils/artistFiles";
import { MusicBrainzService } from "../services/musicbrainz";
import {
    resolveArtistsToMbids,
    type ArtistSearch,
    type ResolveArtistsResult,
} from "../services/artistResolver";
import {
    EXIT_INTERRUPTED,
    applyLimit,
    createRateLimiter,
    listenForInterrupt,
    parseIntegerOption,
    parseNumberOption,
    runCommand,
} from "./shared";

const log = createLogger("resolve");

export interface ResolveCommandOptions {
    output: string;
    limit: number;
    append: boolean;
    interval: number;
    minScore: number;
}

export interface ResolveDependencies {
    config: AppConfig;
    signal?: AbortSignal;
    musicbrainz?: ArtistSearch;
}

export function createMusicBrainz(
    config: AppConfig,
    intervalSeconds: number,
    minScore: number
): ArtistSearch {
    return new MusicBrainzService({
        userAgent: config.musicbrainz.userAgent,
        minScore,
        rateLimiter: createRateLimiter(intervalSeconds),
    });
}

export function summarizeResolution(
    result: ResolveArtistsResult,
    outputPath: string
): void {
    const matched = result.results.filter((row) => row.mbid).length;
    log.info(
        `Matched ${matched}/${result.results.length} artists; ${result.newMbids.length} new MBIDs written to ${outputPath}`
    );
}

/**
 * Returns 0 when the names file holds no artists.
 */
export async function runResolve(
    input: string,
    options: ResolveCommandOptions,
    deps: ResolveDependencies
): Promise<number> {
    const names = applyLimit(parseArtistsFile(input), options.limit);
    if (names.length === 0) {
        log.info(`No artist names found in ${input}.`);
        return 0;
    }

    const result = await resolveArtistsToMbids({
        names,
        outputPath: options.output,
        append: options.append,
        musicbrainz:
            deps.musicbrainz ??
            createMusicBrainz(deps.config, options.interval, options.minScore),
        signal: deps.signal,
    });

    summarizeResolution(result, options.output);
    return result.interrupted ? EXIT_INTERRUPTED : 0;
}

export function registerResolveCommand(program: Command, config: AppConfig): void {
    program
        .command("resolve")
        .description("Resolve artist names to MusicBrainz IDs")
        .argument("[input]", "Artist names, one per line", config.files.artistsFile)
        .option("-o, --output <path>", "Output file of lidarr:<mbid> lines", config.files.mbidsOutput)
        .option("--limit <n>", "Only process the first N artists (0 = all)", parseIntegerOption, config.files.limit)
        .option("--append", "Append to the output file (resume mode)", false)
        .option(
            "--interval <seconds>",
            "Minimum seconds between MusicBrainz requests",
            parseNumberOption,
            config.musicbrainz.requestIntervalSeconds
        )
        .option("--min-score <score>", "Lowest accepted search score", parseNumberOption, config.musicbrainz.minScore)
        .action(async (input: string, options: ResolveCommandOptions) => {
            const interrupt = listenForInterrupt();
            try {
                await runCommand("resolve", () =>
                    runResolve(input, options, { config, signal: interrupt.signal })
                );
            } finally {
                interrupt.dispose();
            }
        });
}
