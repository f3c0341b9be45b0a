import axios from "axios";
import { z } from "zod";
import { createLogger } from "../utils/logger";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";
import type { HttpClient } from "../utils/http";
import type { AccessTokenProvider } from "./spotifyAuth";
import type { RateLimiter } from "./rateLimiter";

const log = createLogger("spotify");

export const SPOTIFY_API_URL = "https://api.spotify.com/v1";
const PAGE_SIZE = 50;

const namedSchema = z.object({ name: z.string() }).passthrough();

const followedArtistsPageSchema = z.object({
    artists: z.object({
        items: z.array(namedSchema),
        next: z.string().nullish(),
    }),
});

const savedAlbumsPageSchema = z.object({
    items: z.array(
        z.object({
            album: z.object({
                name: z.string(),
                artists: z.array(namedSchema).default([]),
            }),
        })
    ),
    next: z.string().nullish(),
});

export interface SpotifyLibraryServiceOptions {
    tokens: AccessTokenProvider;
    rateLimiter: RateLimiter;
    client?: HttpClient;
}

/**
 * Read-only access to the current user's followed artists and saved albums.
 */
export class SpotifyLibraryService {
    private client: HttpClient;
    private tokens: AccessTokenProvider;
    private rateLimiter: RateLimiter;

    constructor(options: SpotifyLibraryServiceOptions) {
        this.tokens = options.tokens;
        this.rateLimiter = options.rateLimiter;
        this.client =
            options.client ??
            axios.create({ baseURL: SPOTIFY_API_URL, timeout: 15000 });
    }

    async authorize(): Promise<void> {
        await this.tokens.getAccessToken();
    }

    /**
     * `url` is either a path below the API root or an absolute `next` link.
     */
    private async fetchPage<T extends z.ZodTypeAny>(
        url: string,
        schema: T,
        params?: Record<string, string | number>
    ): Promise<z.infer<T>> {
        const token = await this.tokens.getAccessToken();
        const response = await this.rateLimiter.execute("spotify", () =>
            this.client.get(url, {
                params,
                headers: { Authorization: `Bearer ${token}` },
            })
        );

        const parsed = schema.safeParse(response.data);
        if (!parsed.success) {
            throw new AppError(
                ErrorCode.UNEXPECTED_RESPONSE,
                ErrorCategory.RECOVERABLE,
                `Unexpected Spotify response from ${url}`,
                { issues: parsed.error.errors.map((issue) => issue.message) }
            );
        }
        return parsed.data;
    }

    async getFollowedArtists(): Promise<Set<string>> {
        const artists = new Set<string>();
        let page = await this.fetchPage("/me/following", followedArtistsPageSchema, {
            type: "artist",
            limit: PAGE_SIZE,
        });

        for (;;) {
            for (const artist of page.artists.items) {
                artists.add(artist.name);
            }
            const next = page.artists.next;
            if (!next) break;
            page = await this.fetchPage(next, followedArtistsPageSchema);
        }

        log.debug(`Followed artists: ${artists.size}`);
        return artists;
    }

    /**
     * Adds every credited artist of each saved album to `artists` and returns
     * the saved album names.
     */
    async collectSavedAlbums(artists: Set<string>): Promise<Set<string>> {
        const albums = new Set<string>();
        let page = await this.fetchPage("/me/albums", savedAlbumsPageSchema, {
            limit: PAGE_SIZE,
        });

        for (;;) {
            for (const { album } of page.items) {
                albums.add(album.name);
                for (const artist of album.artists) {
                    artists.add(artist.name);
                }
            }
            if (!page.next) break;
            page = await this.fetchPage(page.next, savedAlbumsPageSchema);
        }

        log.debug(`Saved albums: ${albums.size}`);
        return albums;
    }
}
