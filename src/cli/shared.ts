import { InvalidArgumentError } from "commander";
import { createLogger, logErrorWithContext } from "../utils/logger";
import { AppError } from "../utils/errors";
import { RateLimiter } from "../services/rateLimiter";

const log = createLogger("cli");

/** Conventional exit status for a run stopped with Ctrl+C. */
export const EXIT_INTERRUPTED = 130;

export function parseIntegerOption(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError("Not an integer.");
    }
    return parsed;
}

export function parseNumberOption(value: string): number {
    const parsed = Number(value);
    if (value.trim() === "" || !Number.isFinite(parsed) || parsed < 0) {
        throw new InvalidArgumentError("Not a non-negative number.");
    }
    return parsed;
}

/** First `limit` entries; 0 or less keeps everything. */
export function applyLimit<T>(items: T[], limit: number): T[] {
    return limit > 0 ? items.slice(0, limit) : items;
}

export function createRateLimiter(mbIntervalSeconds: number): RateLimiter {
    return new RateLimiter({
        overrides: {
            musicbrainz: { minInterval: Math.round(mbIntervalSeconds * 1000) },
        },
    });
}

export interface InterruptHandle {
    signal: AbortSignal;
    dispose: () => void;
}

/**
 * Turns the first Ctrl+C into an abort so the current item can finish; a
 * second one falls through to Node's default handling.
 */
export function listenForInterrupt(): InterruptHandle {
    const controller = new AbortController();
    const onSigint = () => {
        log.warn("Stopping after the current artist (Ctrl+C again to quit)");
        controller.abort();
    };
    process.once("SIGINT", onSigint);
    return {
        signal: controller.signal,
        dispose: () => {
            process.removeListener("SIGINT", onSigint);
        },
    };
}

/**
 * Runs a command body and sets the process exit code from its result. Setup
 * failures are logged and exit with status 1.
 */
export async function runCommand(
    name: string,
    body: () => Promise<number>
): Promise<void> {
    try {
        process.exitCode = await body();
    } catch (error) {
        if (error instanceof AppError) {
            log.error(error.message);
        } else {
            logErrorWithContext(log, `${name} failed`, error, { command: name });
        }
        process.exitCode = 1;
    }
}
