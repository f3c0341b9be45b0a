import axios from "axios";
import { z } from "zod";
import { createLogger } from "../utils/logger";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";
import type { HttpClient } from "../utils/http";
import type { RateLimiter } from "./rateLimiter";

const log = createLogger("musicbrainz");

export const MUSICBRAINZ_BASE_URL = "https://musicbrainz.org/ws/2";
export const DEFAULT_MIN_SCORE = 80;
const SEARCH_LIMIT = 5;

const aliasSchema = z.object({ name: z.string() }).passthrough();

const artistSchema = z
    .object({
        id: z.string(),
        name: z.string(),
        score: z.number().optional(),
        type: z.string().nullish(),
        country: z.string().nullish(),
        disambiguation: z.string().nullish(),
        aliases: z.array(aliasSchema).optional(),
    })
    .passthrough();

const searchResponseSchema = z.object({
    artists: z.array(artistSchema).default([]),
});

export type MusicBrainzArtist = z.infer<typeof artistSchema>;

/**
 * Escape special characters for Lucene query syntax
 * MusicBrainz uses Lucene, which requires escaping: + - && || ! ( ) { } [ ] ^ " ~ * ? : \ /
 */
export function escapeLucene(str: string): string {
    return str.replace(/([+\-&|!(){}[\]^"~*?:\\/])/g, "\\$1");
}

/**
 * Exact phrase in the artist field, or anywhere in the indexed text.
 */
export function buildArtistQuery(artistName: string): string {
    const escaped = escapeLucene(artistName);
    return `artist:"${escaped}" OR "${escaped}"`;
}

/**
 * Case folding for name comparison: upper-casing first expands letters such
 * as "ß" to "SS", which `toLowerCase` alone leaves apart.
 */
export function foldCase(value: string): string {
    return value.toUpperCase().toLowerCase();
}

function isExactMatch(artist: MusicBrainzArtist, folded: string): boolean {
    if (foldCase(artist.name) === folded) {
        return true;
    }
    return (artist.aliases ?? []).some(
        (alias) => foldCase(alias.name) === folded
    );
}

/**
 * Picks the candidate for `artistName`: exact (case-insensitive) name or alias
 * matches win over everything else, ties go to the higher search score, and a
 * winner scoring below `minScore` is rejected.
 */
export function selectBestArtist(
    candidates: MusicBrainzArtist[],
    artistName: string,
    minScore: number = DEFAULT_MIN_SCORE
): MusicBrainzArtist | null {
    if (candidates.length === 0) {
        return null;
    }

    const folded = foldCase(artistName);
    const exacts = candidates.filter((artist) => isExactMatch(artist, folded));
    const pool = exacts.length > 0 ? exacts : [...candidates];

    pool.sort((a, b) => (b.score ?? 0) - (a.score ?? 0));

    const top = pool[0];
    if ((top.score ?? 0) < minScore) {
        return null;
    }
    return top;
}

export function parseArtistSearch(data: unknown): MusicBrainzArtist[] {
    const parsed = searchResponseSchema.safeParse(data);
    if (!parsed.success) {
        throw new AppError(
            ErrorCode.UNEXPECTED_RESPONSE,
            ErrorCategory.RECOVERABLE,
            "Unexpected MusicBrainz artist search response",
            { issues: parsed.error.errors.map((issue) => issue.message) }
        );
    }
    return parsed.data.artists;
}

export interface MusicBrainzServiceOptions {
    userAgent: string;
    rateLimiter: RateLimiter;
    minScore?: number;
    client?: HttpClient;
}

export class MusicBrainzService {
    private client: HttpClient;
    private rateLimiter: RateLimiter;
    readonly minScore: number;

    constructor(options: MusicBrainzServiceOptions) {
        this.rateLimiter = options.rateLimiter;
        this.minScore = options.minScore ?? DEFAULT_MIN_SCORE;
        this.client =
            options.client ??
            axios.create({
                baseURL: MUSICBRAINZ_BASE_URL,
                timeout: 15000,
                headers: {
                    "User-Agent": options.userAgent,
                    Accept: "application/json",
                },
            });
    }

    /**
     * Search candidates for a name, with aliases so exact alias hits can win.
     */
    async searchArtistCandidates(artistName: string): Promise<MusicBrainzArtist[]> {
        const response = await this.rateLimiter.execute("musicbrainz", () =>
            this.client.get("/artist/", {
                params: {
                    query: buildArtistQuery(artistName),
                    fmt: "json",
                    limit: SEARCH_LIMIT,
                    inc: "aliases",
                },
            })
        );
        return parseArtistSearch(response.data);
    }

    /**
     * Best match for a name, or null when nothing scores high enough.
     */
    async searchArtist(artistName: string): Promise<MusicBrainzArtist | null> {
        const candidates = await this.searchArtistCandidates(artistName);
        const best = selectBestArtist(candidates, artistName, this.minScore);

        log.debug(
            `${candidates.length} candidate(s) for "${artistName}"${
                best ? ` - selected ${best.id}` : " - no match"
            }`
        );
        return best;
    }
}
