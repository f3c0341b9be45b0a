import { RateLimiter, SERVICE_CONFIGS } from "../rateLimiter";
import { httpError, networkError } from "../../__tests__/fixtures";
import { logger } from "../../utils/logger";

jest.mock("../../utils/logger", () => {
    const log = {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    };
    return { createLogger: () => log, logger: log };
});

const mockWarn = jest.mocked(logger.warn);

function createLimiter(now: () => number = () => 0) {
    const sleep = jest.fn<Promise<void>, [number]>(async () => undefined);
    return { limiter: new RateLimiter({ sleep, now }), sleep };
}

describe("RateLimiter", () => {
    beforeEach(() => {
        jest.clearAllMocks();
    });

    it("exposes per-service policies", () => {
        const { limiter } = createLimiter();

        expect(limiter.getConfig("musicbrainz")).toEqual(SERVICE_CONFIGS.musicbrainz);
        expect(limiter.getConfig("lidarr").maxRetries).toBe(3);
        expect(limiter.getConfig("spotify").exponential).toBe(true);
    });

    it("applies overrides on top of the defaults", () => {
        const limiter = new RateLimiter({
            overrides: { musicbrainz: { minInterval: 2500 } },
        });

        expect(limiter.getConfig("musicbrainz").minInterval).toBe(2500);
        expect(limiter.getConfig("musicbrainz").maxRetries).toBe(Infinity);
    });

    it("returns the request result without waiting on the first call", async () => {
        const { limiter, sleep } = createLimiter();

        await expect(limiter.execute("musicbrainz", async () => "ok")).resolves.toBe("ok");
        expect(sleep).not.toHaveBeenCalled();
    });

    it("waits exactly once for the Retry-After duration before retrying", async () => {
        const { limiter, sleep } = createLimiter();
        const requestFn = jest
            .fn<Promise<string>, []>()
            .mockRejectedValueOnce(httpError(429, "", { "retry-after": "3" }))
            .mockResolvedValueOnce("ok");

        await expect(limiter.execute("musicbrainz", requestFn)).resolves.toBe("ok");

        expect(requestFn).toHaveBeenCalledTimes(2);
        expect(sleep).toHaveBeenCalledTimes(1);
        expect(sleep).toHaveBeenCalledWith(3000);
        expect(mockWarn).toHaveBeenCalledWith(
            "Throttled by musicbrainz (retry 1) - waiting 3000ms"
        );
    });

    it("repeats the Retry-After wait for every throttled response", async () => {
        const { limiter, sleep } = createLimiter();
        const throttled = httpError(503, "", { "retry-after": "1.5" });
        const requestFn = jest
            .fn<Promise<string>, []>()
            .mockRejectedValueOnce(throttled)
            .mockRejectedValueOnce(throttled)
            .mockResolvedValueOnce("ok");

        await limiter.execute("musicbrainz", requestFn);

        expect(sleep.mock.calls).toEqual([[1500], [1500]]);
    });

    it("accepts Retry-After as an HTTP date", async () => {
        const now = Date.parse("2026-01-01T00:00:00Z");
        const { limiter, sleep } = createLimiter(() => now);
        const requestFn = jest
            .fn<Promise<string>, []>()
            .mockRejectedValueOnce(
                httpError(429, "", { "retry-after": "Thu, 01 Jan 2026 00:00:05 GMT" })
            )
            .mockResolvedValueOnce("ok");

        await limiter.execute("spotify", requestFn);

        expect(sleep).toHaveBeenCalledWith(5000);
    });

    it("keeps retrying MusicBrainz throttling with the fixed base delay", async () => {
        const { limiter, sleep } = createLimiter();
        const requestFn = jest.fn<Promise<string>, []>();
        for (let i = 0; i < 5; i++) {
            requestFn.mockRejectedValueOnce(httpError(503));
        }
        requestFn.mockResolvedValueOnce("ok");

        await expect(limiter.execute("musicbrainz", requestFn)).resolves.toBe("ok");

        expect(requestFn).toHaveBeenCalledTimes(6);
        expect(sleep.mock.calls).toEqual([[2000], [2000], [2000], [2000], [2000]]);
    });

    it("gives up on Lidarr after three retries with doubling delays", async () => {
        const { limiter, sleep } = createLimiter();
        const failure = httpError(503, "busy");
        const requestFn = jest.fn<Promise<string>, []>().mockRejectedValue(failure);

        await expect(limiter.execute("lidarr", requestFn)).rejects.toBe(failure);

        expect(requestFn).toHaveBeenCalledTimes(4);
        expect(sleep.mock.calls).toEqual([[2000], [4000], [8000]]);
    });

    it("does not retry other client errors", async () => {
        const { limiter, sleep } = createLimiter();
        const failure = httpError(404, "not found");
        const requestFn = jest.fn<Promise<string>, []>().mockRejectedValue(failure);

        await expect(limiter.execute("lidarr", requestFn)).rejects.toBe(failure);

        expect(requestFn).toHaveBeenCalledTimes(1);
        expect(sleep).not.toHaveBeenCalled();
    });

    it("retries transport failures for Lidarr but not for MusicBrainz", async () => {
        const { limiter, sleep } = createLimiter();
        const lidarrFn = jest
            .fn<Promise<string>, []>()
            .mockRejectedValueOnce(networkError())
            .mockResolvedValueOnce("ok");

        await expect(limiter.execute("lidarr", lidarrFn)).resolves.toBe("ok");
        expect(sleep).toHaveBeenCalledWith(2000);

        const mbFn = jest.fn<Promise<string>, []>().mockRejectedValue(networkError());
        await expect(limiter.execute("musicbrainz", mbFn)).rejects.toThrow("socket hang up");
        expect(mbFn).toHaveBeenCalledTimes(1);
    });

    it("keeps the minimum interval between MusicBrainz requests", async () => {
        let clock = 10000;
        const { limiter, sleep } = createLimiter(() => clock);

        await limiter.execute("musicbrainz", async () => "first");
        clock += 250;
        await limiter.execute("musicbrainz", async () => "second");

        expect(sleep.mock.calls).toEqual([[750]]);
    });

    it("does not space out Lidarr requests", async () => {
        const { limiter, sleep } = createLimiter();

        await limiter.execute("lidarr", async () => 1);
        await limiter.execute("lidarr", async () => 2);

        expect(sleep).not.toHaveBeenCalled();
    });
});
