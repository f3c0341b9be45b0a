import axios from "axios";
import crypto from "crypto";
import fs from "fs";
import path from "path";
import * as readline from "node:readline/promises";
import { z } from "zod";
import { createLogger } from "../utils/logger";
import {
    AppError,
    ErrorCategory,
    ErrorCode,
    describeHttpError,
    errorMessage,
    wrapNodeError,
} from "../utils/errors";
import type { HttpClient } from "../utils/http";
import type { SpotifyCredentials } from "../config";
import type { RateLimiter } from "./rateLimiter";

const log = createLogger("spotify-auth");

export const SPOTIFY_ACCOUNTS_URL = "https://accounts.spotify.com";
export const SPOTIFY_SCOPES = "user-library-read user-follow-read";

// Tokens this close to expiry are refreshed instead of reused
const TOKEN_EXPIRY_MARGIN_MS = 60000;

const tokenResponseSchema = z.object({
    access_token: z.string().min(1),
    token_type: z.string().default("Bearer"),
    expires_in: z.number(),
    refresh_token: z.string().optional(),
    scope: z.string().optional(),
});

const tokenCacheSchema = z.object({
    access_token: z.string().min(1),
    token_type: z.string().default("Bearer"),
    /** Epoch milliseconds */
    expires_at: z.number(),
    refresh_token: z.string().optional(),
    scope: z.string().optional(),
});

export type SpotifyToken = z.infer<typeof tokenCacheSchema>;

export interface TokenRequestContext {
    rateLimiter: RateLimiter;
    client: HttpClient;
    now?: () => number;
}

/** Anything that can hand out a bearer token for the Web API. */
export interface AccessTokenProvider {
    getAccessToken(): Promise<string>;
}

function authFailed(message: string, details?: Record<string, unknown>): AppError {
    return new AppError(
        ErrorCode.SPOTIFY_AUTH_FAILED,
        ErrorCategory.FATAL,
        message,
        details
    );
}

export function createAccountsClient(): HttpClient {
    return axios.create({ baseURL: SPOTIFY_ACCOUNTS_URL, timeout: 15000 });
}

export function getAuthorizationUrl(
    credentials: Pick<SpotifyCredentials, "clientId" | "redirectUri">,
    state: string
): string {
    const params = new URLSearchParams({
        client_id: credentials.clientId,
        response_type: "code",
        redirect_uri: credentials.redirectUri,
        scope: SPOTIFY_SCOPES,
        state,
    });
    return `${SPOTIFY_ACCOUNTS_URL}/authorize?${params.toString()}`;
}

async function requestToken(
    credentials: Pick<SpotifyCredentials, "clientId" | "clientSecret">,
    form: Record<string, string>,
    context: TokenRequestContext
): Promise<SpotifyToken> {
    const now = context.now ?? Date.now;
    const basic = Buffer.from(
        `${credentials.clientId}:${credentials.clientSecret}`
    ).toString("base64");

    let data: unknown;
    try {
        const response = await context.rateLimiter.execute("spotify", () =>
            context.client.post(
                "/api/token",
                new URLSearchParams(form).toString(),
                {
                    headers: {
                        "Content-Type": "application/x-www-form-urlencoded",
                        Authorization: `Basic ${basic}`,
                    },
                }
            )
        );
        data = response.data;
    } catch (error) {
        throw authFailed(
            `Spotify token request failed: ${describeHttpError(error)}`,
            { grantType: form.grant_type }
        );
    }

    const parsed = tokenResponseSchema.safeParse(data);
    if (!parsed.success) {
        throw authFailed("Spotify token response was not understood", {
            grantType: form.grant_type,
        });
    }

    return {
        access_token: parsed.data.access_token,
        token_type: parsed.data.token_type,
        expires_at: now() + parsed.data.expires_in * 1000,
        refresh_token: parsed.data.refresh_token,
        scope: parsed.data.scope,
    };
}

export function exchangeCodeForTokens(
    credentials: SpotifyCredentials,
    code: string,
    context: TokenRequestContext
): Promise<SpotifyToken> {
    return requestToken(
        credentials,
        {
            grant_type: "authorization_code",
            code,
            redirect_uri: credentials.redirectUri,
        },
        context
    );
}

/**
 * Spotify may omit the refresh token on refresh; the old one stays valid then.
 */
export async function refreshAccessToken(
    credentials: Pick<SpotifyCredentials, "clientId" | "clientSecret">,
    refreshToken: string,
    context: TokenRequestContext
): Promise<SpotifyToken> {
    const token = await requestToken(
        credentials,
        { grant_type: "refresh_token", refresh_token: refreshToken },
        context
    );
    return { ...token, refresh_token: token.refresh_token ?? refreshToken };
}

async function promptOnTerminal(question: string): Promise<string> {
    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
    });
    try {
        return await rl.question(question);
    } finally {
        rl.close();
    }
}

export interface SpotifyTokenManagerOptions {
    credentials: SpotifyCredentials;
    cachePath: string;
    rateLimiter: RateLimiter;
    client?: HttpClient;
    now?: () => number;
    prompt?: (question: string) => Promise<string>;
    createState?: () => string;
}

/**
 * Authorization-code flow with a JSON token cache on disk. The first run asks
 * the user to authorize in a browser and paste back the redirect URL; later
 * runs reuse or refresh the cached token.
 */
export class SpotifyTokenManager implements AccessTokenProvider {
    private current: SpotifyToken | null = null;
    private readonly context: TokenRequestContext;
    private readonly now: () => number;
    private readonly prompt: (question: string) => Promise<string>;
    private readonly createState: () => string;

    constructor(private readonly options: SpotifyTokenManagerOptions) {
        this.now = options.now ?? Date.now;
        this.prompt = options.prompt ?? promptOnTerminal;
        this.createState =
            options.createState ?? (() => crypto.randomBytes(16).toString("hex"));
        this.context = {
            rateLimiter: options.rateLimiter,
            client: options.client ?? createAccountsClient(),
            now: this.now,
        };
    }

    async getAccessToken(): Promise<string> {
        const cached = this.current ?? this.readCache();

        if (cached && cached.expires_at - this.now() > TOKEN_EXPIRY_MARGIN_MS) {
            this.current = cached;
            return cached.access_token;
        }

        if (cached?.refresh_token) {
            try {
                const refreshed = await refreshAccessToken(
                    this.options.credentials,
                    cached.refresh_token,
                    this.context
                );
                log.debug("Refreshed Spotify access token");
                return this.store(refreshed);
            } catch (error) {
                log.warn(
                    `Could not refresh Spotify token, authorizing again: ${errorMessage(error)}`
                );
            }
        }

        return this.store(await this.authorizeInteractively());
    }

    private async authorizeInteractively(): Promise<SpotifyToken> {
        const { credentials } = this.options;
        const state = this.createState();

        log.info("Open this URL in a browser and authorize access:");
        log.info(getAuthorizationUrl(credentials, state));
        const answer = await this.prompt(
            "Paste the URL you were redirected to: "
        );

        let redirect: URL;
        try {
            redirect = new URL(answer.trim());
        } catch {
            throw authFailed("The pasted redirect URL could not be parsed");
        }

        const denied = redirect.searchParams.get("error");
        if (denied) {
            throw authFailed(`Spotify authorization was denied: ${denied}`);
        }
        if (redirect.searchParams.get("state") !== state) {
            throw authFailed("Spotify authorization state did not match");
        }
        const code = redirect.searchParams.get("code");
        if (!code) {
            throw authFailed("The redirect URL carries no authorization code");
        }

        return exchangeCodeForTokens(credentials, code, this.context);
    }

    private readCache(): SpotifyToken | null {
        const { cachePath } = this.options;
        if (!fs.existsSync(cachePath)) {
            return null;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(cachePath, "utf-8"));
        } catch (error) {
            log.warn(`Ignoring unreadable token cache ${cachePath}: ${errorMessage(error)}`);
            return null;
        }

        const parsed = tokenCacheSchema.safeParse(raw);
        if (!parsed.success) {
            log.warn(`Ignoring malformed token cache ${cachePath}`);
            return null;
        }
        return parsed.data;
    }

    private store(token: SpotifyToken): string {
        const { cachePath } = this.options;
        try {
            const dir = path.dirname(cachePath);
            if (dir && !fs.existsSync(dir)) {
                fs.mkdirSync(dir, { recursive: true });
            }
            fs.writeFileSync(cachePath, JSON.stringify(token, null, 2), {
                encoding: "utf-8",
                mode: 0o600,
            });
        } catch (err) {
            throw wrapNodeError(err, cachePath);
        }

        this.current = token;
        return token.access_token;
    }
}
