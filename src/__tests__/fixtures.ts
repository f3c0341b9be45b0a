import { AxiosError, AxiosHeaders } from "axios";
import fs from "fs";
import os from "os";
import path from "path";
import { RateLimiter } from "../services/rateLimiter";

export function httpError(
    status: number,
    data: unknown = "",
    headers: Record<string, string> = {}
): AxiosError {
    const config = { headers: new AxiosHeaders() };
    return new AxiosError(
        `Request failed with status code ${status}`,
        status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
        config,
        undefined,
        { status, statusText: "", headers, config, data }
    );
}

export function networkError(message = "socket hang up"): Error {
    return Object.assign(new Error(message), { code: "ECONNRESET" });
}

/** A real limiter whose waits resolve immediately. */
export function instantRateLimiter(): {
    rateLimiter: RateLimiter;
    sleep: jest.Mock<Promise<void>, [number]>;
} {
    const sleep = jest.fn<Promise<void>, [number]>(async () => undefined);
    return { rateLimiter: new RateLimiter({ sleep }), sleep };
}

export function makeTempDir(prefix = "artist-sync-"): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}
