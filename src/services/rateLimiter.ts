/**
 * Per-service request scheduling
 *
 * Every outbound API call goes through `RateLimiter.execute`, which serialises
 * calls per service, keeps a minimum gap between successive calls and retries
 * throttling responses (429/503) and transport failures with backoff.
 */

import PQueue from "p-queue";
import { createLogger } from "../utils/logger";
import {
    describeHttpError,
    getRetryAfterMs,
    isThrottleResponse,
    isTransientNetworkError,
} from "../utils/errors";

const log = createLogger("rate-limiter");

export interface RateLimitConfig {
    /** Maximum concurrent requests */
    concurrency: number;
    /** Minimum gap between the end of one request and the start of the next (ms) */
    minInterval: number;
    /** Maximum retries; Infinity retries throttling responses forever */
    maxRetries: number;
    /** Delay used when the server sends no Retry-After header (ms) */
    baseDelay: number;
    /** Double `baseDelay` on every attempt */
    exponential: boolean;
    /** Retry requests that never produced a response */
    retryNetworkErrors: boolean;
}

export type ServiceName = "musicbrainz" | "lidarr" | "spotify";

export const SERVICE_CONFIGS: Record<ServiceName, RateLimitConfig> = {
    musicbrainz: {
        concurrency: 1, // MusicBrainz allows one request per second per client
        minInterval: 1000,
        maxRetries: Infinity,
        baseDelay: 2000,
        exponential: false,
        retryNetworkErrors: false,
    },
    lidarr: {
        concurrency: 1,
        minInterval: 0,
        maxRetries: 3,
        baseDelay: 2000,
        exponential: true,
        retryNetworkErrors: true,
    },
    spotify: {
        concurrency: 1,
        minInterval: 0,
        maxRetries: 3,
        baseDelay: 2000,
        exponential: true,
        retryNetworkErrors: true,
    },
};

const MAX_COMPUTED_DELAY_MS = 60000;

export type RateLimitOverrides = Partial<
    Record<ServiceName, Partial<RateLimitConfig>>
>;

export interface RateLimiterOptions {
    overrides?: RateLimitOverrides;
    sleep?: (ms: number) => Promise<void>;
    now?: () => number;
}

function defaultSleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RateLimiter {
    private queues: Map<ServiceName, PQueue> = new Map();
    private configs: Record<ServiceName, RateLimitConfig>;
    private lastFinishedAt: Map<ServiceName, number> = new Map();
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly now: () => number;

    constructor(options: RateLimiterOptions = {}) {
        this.sleep = options.sleep ?? defaultSleep;
        this.now = options.now ?? Date.now;
        this.configs = {
            musicbrainz: {
                ...SERVICE_CONFIGS.musicbrainz,
                ...options.overrides?.musicbrainz,
            },
            lidarr: { ...SERVICE_CONFIGS.lidarr, ...options.overrides?.lidarr },
            spotify: {
                ...SERVICE_CONFIGS.spotify,
                ...options.overrides?.spotify,
            },
        };

        for (const service of Object.keys(this.configs)) {
            if (!isServiceName(service)) continue;
            this.queues.set(
                service,
                new PQueue({ concurrency: this.configs[service].concurrency })
            );
        }

        log.debug("Rate limiter initialized");
    }

    getConfig(service: ServiceName): RateLimitConfig {
        return this.configs[service];
    }

    /**
     * Execute a request with throttling and automatic retry
     */
    async execute<T>(
        service: ServiceName,
        requestFn: () => Promise<T>
    ): Promise<T> {
        const queue = this.queues.get(service);
        if (!queue) {
            throw new Error(`Unknown service: ${service}`);
        }

        return queue.add(() => this.runWithRetry(service, requestFn));
    }

    private async runWithRetry<T>(
        service: ServiceName,
        requestFn: () => Promise<T>
    ): Promise<T> {
        const config = this.configs[service];
        await this.waitForInterval(service, config);

        for (let attempt = 0; ; attempt++) {
            try {
                return await requestFn();
            } catch (error) {
                const throttled = isThrottleResponse(error);
                const retryable =
                    throttled ||
                    (config.retryNetworkErrors && isTransientNetworkError(error));

                if (!retryable || attempt >= config.maxRetries) {
                    throw error;
                }

                const delay = this.calculateBackoff(attempt, config, error);
                const budget = Number.isFinite(config.maxRetries)
                    ? `${attempt + 1}/${config.maxRetries}`
                    : `${attempt + 1}`;

                if (throttled) {
                    log.warn(
                        `Throttled by ${service} (retry ${budget}) - waiting ${delay}ms`
                    );
                } else {
                    log.warn(
                        `Transient ${service} error (retry ${budget}) - retrying in ${delay}ms: ${describeHttpError(error)}`
                    );
                }

                await this.sleep(delay);
            } finally {
                this.lastFinishedAt.set(service, this.now());
            }
        }
    }

    private async waitForInterval(
        service: ServiceName,
        config: RateLimitConfig
    ): Promise<void> {
        const last = this.lastFinishedAt.get(service);
        if (last === undefined || config.minInterval <= 0) {
            return;
        }

        const elapsed = this.now() - last;
        if (elapsed < config.minInterval) {
            await this.sleep(config.minInterval - elapsed);
        }
    }

    /**
     * Retry-After when the server sent one, else (exponential) base delay
     */
    private calculateBackoff(
        attempt: number,
        config: RateLimitConfig,
        error: unknown
    ): number {
        if (isThrottleResponse(error)) {
            const retryAfter = getRetryAfterMs(error, this.now());
            if (retryAfter !== undefined) {
                return retryAfter;
            }
        }

        const delay = config.exponential
            ? config.baseDelay * Math.pow(2, attempt)
            : config.baseDelay;
        return Math.min(delay, MAX_COMPUTED_DELAY_MS);
    }
}

function isServiceName(value: string): value is ServiceName {
    return value === "musicbrainz" || value === "lidarr" || value === "spotify";
}
