import axios from "axios";

/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Retry might succeed
    TRANSIENT = "TRANSIENT", // Temporary issue, will resolve
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Configuration errors
    INVALID_CONFIG = "INVALID_CONFIG",
    ROOT_FOLDER_NOT_CONFIGURED = "ROOT_FOLDER_NOT_CONFIGURED",
    INVALID_PROFILE = "INVALID_PROFILE",

    // File system errors
    FILE_NOT_FOUND = "FILE_NOT_FOUND",
    FILE_READ_ERROR = "FILE_READ_ERROR",
    DISK_FULL = "DISK_FULL",
    PERMISSION_DENIED = "PERMISSION_DENIED",

    // Remote API errors
    SPOTIFY_AUTH_FAILED = "SPOTIFY_AUTH_FAILED",
    UNEXPECTED_RESPONSE = "UNEXPECTED_RESPONSE",
}

/**
 * Custom application error class
 */
export class AppError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "AppError";
        Object.setPrototypeOf(this, AppError.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

function errorCodeOf(err: unknown): string | undefined {
    if (typeof err === "object" && err !== null && "code" in err) {
        const code = err.code;
        return typeof code === "string" ? code : undefined;
    }
    return undefined;
}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) {
        return err.message;
    }
    return String(err);
}

/**
 * Wrap a Node.js file system error in an AppError
 */
export function wrapNodeError(err: unknown, context: string): AppError {
    const code = errorCodeOf(err);
    const details = { originalError: errorMessage(err) };

    if (code === "ENOENT") {
        return new AppError(
            ErrorCode.FILE_NOT_FOUND,
            ErrorCategory.RECOVERABLE,
            `File not found: ${context}`,
            details
        );
    }

    if (code === "EACCES" || code === "EPERM") {
        return new AppError(
            ErrorCode.PERMISSION_DENIED,
            ErrorCategory.FATAL,
            `Permission denied: ${context}`,
            details
        );
    }

    if (code === "ENOSPC") {
        return new AppError(
            ErrorCode.DISK_FULL,
            ErrorCategory.TRANSIENT,
            `Disk full: ${context}`,
            details
        );
    }

    return new AppError(
        ErrorCode.FILE_READ_ERROR,
        ErrorCategory.RECOVERABLE,
        `Failed to access file: ${context}`,
        details
    );
}

// HTTP error helpers

const THROTTLE_STATUSES = new Set([429, 503]);

const TRANSIENT_NETWORK_CODES = new Set([
    "ECONNRESET",
    "ECONNABORTED",
    "ECONNREFUSED",
    "ETIMEDOUT",
    "EAI_AGAIN",
    "ENOTFOUND",
    "EHOSTUNREACH",
    "ENETUNREACH",
    "EPIPE",
    "ERR_SOCKET_CLOSED",
]);

/**
 * HTTP status of a failed axios request, or undefined when no response arrived.
 */
export function getHttpStatus(error: unknown): number | undefined {
    if (axios.isAxiosError(error)) {
        return error.response?.status;
    }
    return undefined;
}

export function isThrottleResponse(error: unknown): boolean {
    const status = getHttpStatus(error);
    return status !== undefined && THROTTLE_STATUSES.has(status);
}

/**
 * True for transport failures where the request never produced a response.
 */
export function isTransientNetworkError(error: unknown): boolean {
    if (axios.isAxiosError(error) && error.response) {
        return false;
    }
    const code = errorCodeOf(error);
    if (code && TRANSIENT_NETWORK_CODES.has(code)) {
        return true;
    }
    const message = errorMessage(error).toLowerCase();
    return (
        message.includes("socket hang up") ||
        message.includes("network error") ||
        message.includes("timeout")
    );
}

/**
 * Parses a Retry-After header (delta-seconds or HTTP-date) into milliseconds.
 */
export function getRetryAfterMs(
    error: unknown,
    now: number = Date.now()
): number | undefined {
    if (!axios.isAxiosError(error) || !error.response) {
        return undefined;
    }

    const raw: unknown = error.response.headers?.["retry-after"];
    if (typeof raw !== "string" && typeof raw !== "number") {
        return undefined;
    }

    const text = String(raw).trim();
    if (text.length === 0) {
        return undefined;
    }

    const seconds = Number(text);
    if (Number.isFinite(seconds)) {
        return Math.max(0, seconds * 1000);
    }

    const date = Date.parse(text);
    if (!Number.isNaN(date)) {
        return Math.max(0, date - now);
    }

    return undefined;
}

function stringifyBody(data: unknown): string {
    if (data === undefined || data === null) {
        return "";
    }
    if (typeof data === "string") {
        return data;
    }
    try {
        return JSON.stringify(data);
    } catch {
        return String(data);
    }
}

/**
 * One-line description of a request failure: `HTTP <status>: <body>` when a
 * response arrived, the error message otherwise.
 */
export function describeHttpError(error: unknown): string {
    if (axios.isAxiosError(error) && error.response) {
        const body = stringifyBody(error.response.data);
        return body
            ? `HTTP ${error.response.status}: ${body}`
            : `HTTP ${error.response.status}`;
    }
    return errorMessage(error);
}
