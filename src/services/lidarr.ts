import axios from "axios";
import { z } from "zod";
import { createLogger } from "../utils/logger";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";
import { toLidarrTag } from "../utils/artistFiles";
import type { HttpClient } from "../utils/http";
import type { MonitorOption } from "../config";
import type { RateLimiter } from "./rateLimiter";

const log = createLogger("lidarr");

const lookupArtistSchema = z
    .object({
        foreignArtistId: z.string().nullish(),
        artistName: z.string().nullish(),
        disambiguation: z.string().nullish(),
        qualityProfileId: z.number().nullish(),
        metadataProfileId: z.number().nullish(),
        images: z.array(z.unknown()).nullish(),
        tags: z.array(z.unknown()).nullish(),
    })
    .passthrough();

const libraryArtistSchema = z
    .object({
        foreignArtistId: z.string().nullish(),
    })
    .passthrough();

const rootFolderSchema = z.object({ path: z.string() }).passthrough();

const profileSchema = z
    .object({
        id: z.number(),
        name: z.string().default(""),
    })
    .passthrough();

/** A candidate returned by `/api/v1/artist/lookup`. */
export type LidarrLookupArtist = z.infer<typeof lookupArtistSchema>;
export type LidarrRootFolder = z.infer<typeof rootFolderSchema>;
export type LidarrProfile = z.infer<typeof profileSchema>;

export interface AddArtistOptions {
    qualityProfileId: number;
    metadataProfileId: number;
    rootFolderPath: string;
    monitor: MonitorOption;
    searchForMissingAlbums: boolean;
}

export interface LidarrServiceOptions {
    url: string;
    apiKey: string;
    rateLimiter: RateLimiter;
    client?: HttpClient;
}

function parseList<T extends z.ZodTypeAny>(
    schema: T,
    data: unknown,
    endpoint: string
): z.infer<T>[] {
    // An empty body is treated as an empty list
    if (data === null || data === undefined || data === "") {
        return [];
    }

    const parsed = z.array(schema).safeParse(data);
    if (!parsed.success) {
        throw new AppError(
            ErrorCode.UNEXPECTED_RESPONSE,
            ErrorCategory.RECOVERABLE,
            `Unexpected Lidarr response from ${endpoint}`,
            { issues: parsed.error.errors.map((issue) => issue.message) }
        );
    }
    return parsed.data;
}

/**
 * First profile whose name mentions "default", else the first profile, else 0.
 */
export function pickDefaultProfileId(profiles: LidarrProfile[]): number {
    const named = profiles.find((profile) =>
        profile.name.toLowerCase().includes("default")
    );
    return named?.id ?? profiles[0]?.id ?? 0;
}

export class LidarrService {
    private client: HttpClient;
    private rateLimiter: RateLimiter;

    constructor(options: LidarrServiceOptions) {
        this.rateLimiter = options.rateLimiter;
        this.client =
            options.client ??
            axios.create({
                baseURL: options.url,
                timeout: 30000,
                headers: {
                    "X-Api-Key": options.apiKey,
                    "Content-Type": "application/json",
                },
            });
    }

    private async get(endpoint: string, params?: Record<string, string>): Promise<unknown> {
        const response = await this.rateLimiter.execute("lidarr", () =>
            this.client.get(endpoint, params ? { params } : undefined)
        );
        return response.data;
    }

    /**
     * MusicBrainz ids of every artist already in the library.
     */
    async getExistingForeignIds(): Promise<Set<string>> {
        const artists = parseList(
            libraryArtistSchema,
            await this.get("/api/v1/artist"),
            "/api/v1/artist"
        );

        const ids = new Set<string>();
        for (const artist of artists) {
            if (artist.foreignArtistId) {
                ids.add(artist.foreignArtistId);
            }
        }
        log.debug(`Library holds ${ids.size} artists`);
        return ids;
    }

    async lookupArtist(term: string): Promise<LidarrLookupArtist[]> {
        return parseList(
            lookupArtistSchema,
            await this.get("/api/v1/artist/lookup", { term }),
            "/api/v1/artist/lookup"
        );
    }

    /**
     * Lookup by MusicBrainz id, using Lidarr's `lidarr:<mbid>` search term.
     */
    async lookupByMbid(mbid: string): Promise<LidarrLookupArtist[]> {
        return this.lookupArtist(toLidarrTag(mbid));
    }

    async addArtist(
        candidate: LidarrLookupArtist,
        options: AddArtistOptions
    ): Promise<LidarrLookupArtist> {
        const payload = {
            foreignArtistId: candidate.foreignArtistId ?? "",
            artistName: candidate.artistName ?? "",
            qualityProfileId: options.qualityProfileId,
            metadataProfileId: options.metadataProfileId,
            images: candidate.images ?? [],
            monitored: true,
            rootFolderPath: options.rootFolderPath,
            addOptions: {
                monitor: options.monitor,
                searchForMissingAlbums: options.searchForMissingAlbums,
            },
            tags: candidate.tags ?? [],
        };

        const response = await this.rateLimiter.execute("lidarr", () =>
            this.client.post("/api/v1/artist", payload)
        );

        const added = lookupArtistSchema.safeParse(response.data);
        return added.success ? added.data : candidate;
    }

    async getRootFolders(): Promise<LidarrRootFolder[]> {
        return parseList(
            rootFolderSchema,
            await this.get("/api/v1/rootFolder"),
            "/api/v1/rootFolder"
        );
    }

    async getQualityProfiles(): Promise<LidarrProfile[]> {
        return parseList(
            profileSchema,
            await this.get("/api/v1/qualityprofile"),
            "/api/v1/qualityprofile"
        );
    }

    async getMetadataProfiles(): Promise<LidarrProfile[]> {
        return parseList(
            profileSchema,
            await this.get("/api/v1/metadataprofile"),
            "/api/v1/metadataprofile"
        );
    }
}
