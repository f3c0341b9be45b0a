import ora from "ora";
import { createLogger } from "../utils/logger";
import { writeArtistList } from "../utils/artistFiles";

const log = createLogger("exporter");

export interface ArtistLibrary {
    /** Settles credentials up front; may prompt on the terminal. */
    authorize(): Promise<void>;
    getFollowedArtists(): Promise<Set<string>>;
    collectSavedAlbums(artists: Set<string>): Promise<Set<string>>;
}

export interface ExportLibraryOptions {
    library: ArtistLibrary;
    outputPath: string;
    includeAlbums?: boolean;
    dryRun?: boolean;
}

export interface ExportLibraryResult {
    artistCount: number;
    albumCount: number;
    written: boolean;
}

export async function exportLibraryArtists(
    options: ExportLibraryOptions
): Promise<ExportLibraryResult> {
    const { library, outputPath } = options;
    const includeAlbums = options.includeAlbums ?? true;

    // The consent prompt reads stdin, which a running spinner would swallow.
    await library.authorize();

    const spinner = ora({ text: "Fetching Spotify data" }).start();
    let artists: Set<string>;
    let albums: Set<string>;
    try {
        artists = await library.getFollowedArtists();
        albums = includeAlbums
            ? await library.collectSavedAlbums(artists)
            : new Set<string>();
    } finally {
        spinner.stop();
    }

    if (options.dryRun) {
        log.info(
            `[DRYRUN] Found ${artists.size} unique artists and ${albums.size} unique albums.`
        );
        return { artistCount: artists.size, albumCount: albums.size, written: false };
    }

    const count = writeArtistList(outputPath, artists);
    log.info(`Wrote ${count} artists and ${albums.size} albums to ${outputPath}`);
    return { artistCount: count, albumCount: albums.size, written: true };
}
