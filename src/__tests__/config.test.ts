export {};

const mockDotenvConfig = jest.fn();
const mockLoggerDebug = jest.fn();
const mockLoggerError = jest.fn();

jest.mock("dotenv", () => ({
    __esModule: true,
    default: {
        config: (...args: unknown[]) => mockDotenvConfig(...args),
    },
}));

jest.mock("../utils/logger", () => ({
    logger: {
        debug: (...args: unknown[]) => mockLoggerDebug(...args),
        error: (...args: unknown[]) => mockLoggerError(...args),
    },
}));

import {
    isMonitorOption,
    loadConfig,
    requireSpotifyCredentials,
    stripTrailingSlashes,
} from "../config";
import { AppError, ErrorCode } from "../utils/errors";

describe("config module", () => {
    beforeEach(() => {
        mockLoggerDebug.mockClear();
        mockLoggerError.mockClear();
    });

    it("loads .env on import", () => {
        expect(mockDotenvConfig).toHaveBeenCalledTimes(1);
    });

    it("applies defaults for an empty environment", () => {
        const config = loadConfig({});

        expect(config.musicbrainz.requestIntervalSeconds).toBe(1);
        expect(config.musicbrainz.minScore).toBe(80);
        expect(config.musicbrainz.userAgent).toMatch(/^artist-catalog-sync\//);
        expect(config.lidarr).toEqual({
            url: "http://localhost:8686",
            apiKey: "",
            rootFolder: "/mnt/media/Music",
            qualityProfileId: 0,
            metadataProfileId: 0,
            monitor: "all",
        });
        expect(config.spotify.tokenCachePath).toBe(".spotify-token-default.json");
        expect(config.files).toEqual({
            artistsFile: "artists.txt",
            mbidsOutput: "output/mbids.txt",
            reportPath: "output/lidarr_output.txt",
            limit: 0,
        });
        expect(mockLoggerDebug).toHaveBeenCalledWith("Environment variables validated");
    });

    it("reads values from the environment", () => {
        const config = loadConfig({
            MUSICBRAINZ_UA: "my-sync/2.0 (someone@example.com)",
            MB_REQUEST_INTERVAL_SECONDS: "1.5",
            LIDARR_URL: "http://lidarr.local:8686///",
            LIDARR_API_KEY: "test-secret",
            QUALITY_PROFILE_ID: "4",
            MONITOR_OPTION: "future",
            SPOTIFY_USERNAME: "listener",
            LIMIT: "25",
        });

        expect(config.musicbrainz.userAgent).toBe("my-sync/2.0 (someone@example.com)");
        expect(config.musicbrainz.requestIntervalSeconds).toBe(1.5);
        expect(config.lidarr.url).toBe("http://lidarr.local:8686");
        expect(config.lidarr.apiKey).toBe("test-secret");
        expect(config.lidarr.qualityProfileId).toBe(4);
        expect(config.lidarr.monitor).toBe("future");
        expect(config.spotify.tokenCachePath).toBe(".spotify-token-listener.json");
        expect(config.files.limit).toBe(25);
    });

    it("treats blank values as unset", () => {
        const config = loadConfig({ ROOT_FOLDER: "   ", QUALITY_PROFILE_ID: "" });

        expect(config.lidarr.rootFolder).toBe("/mnt/media/Music");
        expect(config.lidarr.qualityProfileId).toBe(0);
    });

    it("rejects invalid values with INVALID_CONFIG", () => {
        let caught: unknown;
        try {
            loadConfig({ MONITOR_OPTION: "sometimes", LIMIT: "-1" });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(AppError);
        expect(caught).toMatchObject({ code: ErrorCode.INVALID_CONFIG });
        expect(caught).toHaveProperty(
            "message",
            expect.stringMatching(/^Environment validation failed: MONITOR_OPTION: .+; LIMIT: .+$/)
        );
        // The entry point logs the message once; nothing is logged here.
        expect(mockLoggerError).not.toHaveBeenCalled();
    });

    it("rejects a non-numeric profile id", () => {
        expect(() => loadConfig({ METADATA_PROFILE_ID: "abc" })).toThrow(
            /Environment validation failed: METADATA_PROFILE_ID/
        );
    });

    it("requires every Spotify credential", () => {
        const partial = loadConfig({
            SPOTIFY_CLIENT_ID: "client",
            SPOTIFY_CLIENT_SECRET: "test-secret",
        });
        expect(() => requireSpotifyCredentials(partial)).toThrow(
            "Missing SPOTIFY_REDIRECT_URI in .env"
        );

        const complete = loadConfig({
            SPOTIFY_CLIENT_ID: "client",
            SPOTIFY_CLIENT_SECRET: "test-secret",
            SPOTIFY_REDIRECT_URI: "http://127.0.0.1:8888/callback",
            SPOTIFY_USERNAME: "listener",
        });
        expect(requireSpotifyCredentials(complete)).toEqual({
            clientId: "client",
            clientSecret: "test-secret",
            redirectUri: "http://127.0.0.1:8888/callback",
            username: "listener",
        });
    });

    it("exposes small helpers", () => {
        expect(stripTrailingSlashes("/mnt/music//")).toBe("/mnt/music");
        expect(isMonitorOption("latest")).toBe(true);
        expect(isMonitorOption("everything")).toBe(false);
    });
});
