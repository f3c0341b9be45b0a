import { Command } from "commander";
import { requireSpotifyCredentials, type AppConfig } from "../config";
import { RateLimiter } from "../services/rateLimiter";
import { SpotifyTokenManager } from "../services/spotifyAuth";
import { SpotifyLibraryService } from "../services/spotify";
import {
    exportLibraryArtists,
    type ArtistLibrary,
} from "../services/libraryExporter";
import { runCommand } from "./shared";

export interface ExportCommandOptions {
    output: string;
    dryRun: boolean;
    skipAlbums: boolean;
}

export interface ExportDependencies {
    config: AppConfig;
    library?: ArtistLibrary;
}

export function createSpotifyLibrary(config: AppConfig): ArtistLibrary {
    const credentials = requireSpotifyCredentials(config);
    const rateLimiter = new RateLimiter();
    return new SpotifyLibraryService({
        rateLimiter,
        tokens: new SpotifyTokenManager({
            credentials,
            cachePath: config.spotify.tokenCachePath,
            rateLimiter,
        }),
    });
}

export async function runExport(
    options: ExportCommandOptions,
    deps: ExportDependencies
): Promise<number> {
    await exportLibraryArtists({
        library: deps.library ?? createSpotifyLibrary(deps.config),
        outputPath: options.output,
        includeAlbums: !options.skipAlbums,
        dryRun: options.dryRun,
    });
    return 0;
}

export function registerExportCommand(program: Command, config: AppConfig): void {
    program
        .command("export")
        .description("Write the artists of your Spotify library to a names file")
        .option("-o, --output <path>", "Artist list to write", config.files.artistsFile)
        .option("--dry-run", "Only count artists and albums", false)
        .option("--skip-albums", "Ignore saved albums", false)
        .action(async (options: ExportCommandOptions) => {
            await runCommand("export", () => runExport(options, { config }));
        });
}
