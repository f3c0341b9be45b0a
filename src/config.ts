import dotenv from "dotenv";
import { z } from "zod";
import { BRAND_USER_AGENT } from "./config/brand";
import { AppError, ErrorCategory, ErrorCode } from "./utils/errors";
import { logger } from "./utils/logger";
import { parseEnvString } from "./utils/envParsers";

dotenv.config();

export const MONITOR_OPTIONS = [
    "all",
    "missing",
    "existing",
    "none",
    "future",
    "latest",
    "first",
] as const;

export type MonitorOption = (typeof MONITOR_OPTIONS)[number];

export function isMonitorOption(value: string): value is MonitorOption {
    return MONITOR_OPTIONS.some((option) => option === value);
}

const optionalText = z
    .string()
    .optional()
    .transform((value) => {
        const trimmed = value?.trim();
        return trimmed ? trimmed : undefined;
    });

const numberFromEnv = (fallback: number) =>
    z
        .string()
        .optional()
        .transform((value) =>
            value === undefined || value.trim() === "" ? fallback : Number(value)
        );

const envSchema = z.object({
    MUSICBRAINZ_UA: optionalText,
    MB_REQUEST_INTERVAL_SECONDS: numberFromEnv(1).pipe(z.number().min(0)),
    MB_MIN_SCORE: numberFromEnv(80).pipe(z.number().min(0).max(100)),

    LIDARR_URL: optionalText,
    LIDARR_API_KEY: optionalText,
    ROOT_FOLDER: optionalText,
    QUALITY_PROFILE_ID: numberFromEnv(0).pipe(z.number().int().min(0)),
    METADATA_PROFILE_ID: numberFromEnv(0).pipe(z.number().int().min(0)),
    MONITOR_OPTION: z.enum(MONITOR_OPTIONS).optional(),

    SPOTIFY_CLIENT_ID: optionalText,
    SPOTIFY_CLIENT_SECRET: optionalText,
    SPOTIFY_REDIRECT_URI: optionalText.pipe(z.string().url().optional()),
    SPOTIFY_USERNAME: optionalText,
    SPOTIFY_TOKEN_CACHE: optionalText,

    ARTISTS_FILE: optionalText,
    MBIDS_OUTPUT: optionalText,
    LIDARR_REPORT: optionalText,
    LIMIT: numberFromEnv(0).pipe(z.number().int().min(0)),
});

export interface MusicBrainzConfig {
    userAgent: string;
    requestIntervalSeconds: number;
    minScore: number;
}

export interface LidarrConfig {
    url: string;
    apiKey: string;
    rootFolder: string;
    qualityProfileId: number;
    metadataProfileId: number;
    monitor: MonitorOption;
}

export interface SpotifyConfig {
    clientId?: string;
    clientSecret?: string;
    redirectUri?: string;
    username?: string;
    tokenCachePath: string;
}

export interface FilesConfig {
    artistsFile: string;
    mbidsOutput: string;
    reportPath: string;
    limit: number;
}

export interface AppConfig {
    musicbrainz: MusicBrainzConfig;
    lidarr: LidarrConfig;
    spotify: SpotifyConfig;
    files: FilesConfig;
}

export function stripTrailingSlashes(url: string): string {
    return url.replace(/\/+$/, "");
}

/** Validates the environment and builds the runtime configuration. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);

    if (!parsed.success) {
        const problems = parsed.error.errors.map(
            (err) => `${err.path.join(".")}: ${err.message}`
        );
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            `Environment validation failed: ${problems.join("; ")}`,
            { problems }
        );
    }

    const vars = parsed.data;
    logger.debug("Environment variables validated");

    return {
        musicbrainz: {
            userAgent: vars.MUSICBRAINZ_UA ?? BRAND_USER_AGENT,
            requestIntervalSeconds: vars.MB_REQUEST_INTERVAL_SECONDS,
            minScore: vars.MB_MIN_SCORE,
        },
        lidarr: {
            url: stripTrailingSlashes(
                parseEnvString(vars.LIDARR_URL, "http://localhost:8686")
            ),
            apiKey: vars.LIDARR_API_KEY ?? "",
            rootFolder: parseEnvString(vars.ROOT_FOLDER, "/mnt/media/Music"),
            qualityProfileId: vars.QUALITY_PROFILE_ID,
            metadataProfileId: vars.METADATA_PROFILE_ID,
            monitor: vars.MONITOR_OPTION ?? "all",
        },
        spotify: {
            clientId: vars.SPOTIFY_CLIENT_ID,
            clientSecret: vars.SPOTIFY_CLIENT_SECRET,
            redirectUri: vars.SPOTIFY_REDIRECT_URI,
            username: vars.SPOTIFY_USERNAME,
            tokenCachePath:
                vars.SPOTIFY_TOKEN_CACHE ??
                `.spotify-token-${vars.SPOTIFY_USERNAME ?? "default"}.json`,
        },
        files: {
            artistsFile: parseEnvString(vars.ARTISTS_FILE, "artists.txt"),
            mbidsOutput: parseEnvString(vars.MBIDS_OUTPUT, "output/mbids.txt"),
            reportPath: parseEnvString(
                vars.LIDARR_REPORT,
                "output/lidarr_output.txt"
            ),
            limit: vars.LIMIT,
        },
    };
}

export interface SpotifyCredentials {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
    username: string;
}

function requireValue(name: string, value: string | undefined): string {
    if (!value) {
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            `Missing ${name} in .env`,
            { variable: name }
        );
    }
    return value;
}

/** Returns the Spotify OAuth settings, failing on the first one missing. */
export function requireSpotifyCredentials(
    config: AppConfig
): SpotifyCredentials {
    const { spotify } = config;
    return {
        clientId: requireValue("SPOTIFY_CLIENT_ID", spotify.clientId),
        clientSecret: requireValue("SPOTIFY_CLIENT_SECRET", spotify.clientSecret),
        redirectUri: requireValue("SPOTIFY_REDIRECT_URI", spotify.redirectUri),
        username: requireValue("SPOTIFY_USERNAME", spotify.username),
    };
}
