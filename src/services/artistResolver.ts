import { createLogger } from "../utils/logger";
import { describeHttpError } from "../utils/errors";
import { IdentifierFileWriter, dedupePreservingOrder } from "../utils/artistFiles";
import type { MusicBrainzArtist } from "./musicbrainz";

const log = createLogger("resolver");

export interface ResolvedArtist {
    inputName: string;
    mbid: string;
    matchedName: string;
    score: number | null;
    type: string;
    country: string;
    disambiguation: string;
}

/** The part of the MusicBrainz client the resolver needs. */
export interface ArtistSearch {
    searchArtist(name: string): Promise<MusicBrainzArtist | null>;
}

export interface ResolveArtistsOptions {
    names: string[];
    outputPath: string;
    append?: boolean;
    musicbrainz: ArtistSearch;
    signal?: AbortSignal;
}

export interface ResolveArtistsResult {
    results: ResolvedArtist[];
    /** MBIDs written to the output file during this run, in order */
    newMbids: string[];
    interrupted: boolean;
}

function toResolvedArtist(
    inputName: string,
    artist: MusicBrainzArtist | null
): ResolvedArtist {
    return {
        inputName,
        mbid: artist?.id ?? "",
        matchedName: artist?.name ?? "",
        score: artist?.score ?? null,
        type: artist?.type ?? "",
        country: artist?.country ?? "",
        disambiguation: artist?.disambiguation ?? "",
    };
}

export function formatResolution(row: ResolvedArtist): string {
    return `${row.inputName}: ${row.mbid} (${row.matchedName} • ${row.score ?? ""})`;
}

/**
 * Resolves each unique name to an MBID and appends `lidarr:<mbid>` lines to
 * `outputPath` as they are found.
 */
export async function resolveArtistsToMbids(
    options: ResolveArtistsOptions
): Promise<ResolveArtistsResult> {
    const { musicbrainz, signal } = options;
    const writer = new IdentifierFileWriter(options.outputPath, {
        append: options.append ?? false,
    });

    if (options.append && writer.size > 0) {
        log.debug(`Resuming with ${writer.size} MBIDs already in ${writer.path}`);
    }

    const results: ResolvedArtist[] = [];
    const newMbids: string[] = [];
    let interrupted = false;

    try {
        for (const name of dedupePreservingOrder(options.names)) {
            if (signal?.aborted) {
                interrupted = true;
                break;
            }

            let artist: MusicBrainzArtist | null = null;
            try {
                artist = await musicbrainz.searchArtist(name);
            } catch (error) {
                log.info(`${name}: ERROR ${describeHttpError(error)}`);
            }

            const row = toResolvedArtist(name, artist);
            log.info(formatResolution(row));
            results.push(row);

            if (row.mbid && writer.write(row.mbid)) {
                newMbids.push(row.mbid);
            }
        }
    } finally {
        writer.close();
    }

    if (interrupted) {
        log.info("Interrupted. Progress saved to output file.");
    }

    return { results, newMbids, interrupted };
}
