export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogContext = Record<string, unknown>;

export interface Logger {
    debug: (message: string, context?: LogContext) => void;
    info: (message: string, context?: LogContext) => void;
    warn: (message: string, context?: LogContext) => void;
    error: (message: string, context?: LogContext) => void;
    child: (scope: string) => Logger;
}

type EmitLevel = Exclude<LogLevel, "silent">;

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

const DEFAULT_LOG_LEVEL: LogLevel = "info";

export function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function resolveLogLevel(): LogLevel {
    const configured = process.env.LOG_LEVEL?.trim().toLowerCase();
    if (!configured) {
        return DEFAULT_LOG_LEVEL;
    }
    return isLogLevel(configured) ? configured : "silent";
}

let currentLevel = resolveLogLevel();

/**
 * Overrides the level resolved from LOG_LEVEL, e.g. for `--verbose`/`--quiet`.
 */
export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

function shouldLog(level: EmitLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function formatValue(value: unknown): string {
    if (value instanceof Error) {
        return JSON.stringify(value.message);
    }
    if (typeof value === "string") {
        return /[\s"=]/.test(value) ? JSON.stringify(value) : value;
    }
    if (value === undefined) {
        return "undefined";
    }
    try {
        return JSON.stringify(value);
    } catch {
        return String(value);
    }
}

/** Renders context as ` key=value` pairs; strings with spaces are quoted. */
export function formatContext(context: LogContext | undefined): string {
    if (!context) {
        return "";
    }
    return Object.entries(context)
        .map(([key, value]) => ` ${key}=${formatValue(value)}`)
        .join("");
}

function stackOf(context: LogContext | undefined): string | undefined {
    if (!context) {
        return undefined;
    }
    const error = Object.values(context).find(
        (value): value is Error => value instanceof Error
    );
    return error?.stack;
}

// Info lines are the tool's output and go to stdout untagged; everything else goes to stderr.
function emit(
    level: EmitLevel,
    message: string,
    scope: string | null,
    context: LogContext | undefined
): void {
    if (!shouldLog(level)) {
        return;
    }

    const scopeTag = scope ? `[${scope}] ` : "";
    const body = `${scopeTag}${message}${formatContext(context)}`;

    if (level === "info") {
        console.log(body);
        return;
    }

    console.error(`[${level.toUpperCase()}] ${body}`);

    const stack = stackOf(context);
    if (stack && shouldLog("debug")) {
        console.error(stack);
    }
}

export function createLogger(scope?: string): Logger {
    const scoped = scope?.trim() || null;

    return {
        debug: (message, context) => emit("debug", message, scoped, context),
        info: (message, context) => emit("info", message, scoped, context),
        warn: (message, context) => emit("warn", message, scoped, context),
        error: (message, context) => emit("error", message, scoped, context),
        child: (childScope: string) => {
            const trimmed = childScope.trim();
            return createLogger(scoped ? `${scoped}.${trimmed}` : trimmed);
        },
    };
}

export async function withLogTiming<T>(
    loggerInstance: Logger,
    operation: string,
    run: () => Promise<T> | T,
    context: LogContext = {}
): Promise<T> {
    const startedAt = Date.now();
    loggerInstance.debug(`${operation} started`, context);

    try {
        const result = await run();
        loggerInstance.debug(`${operation} completed`, {
            ...context,
            durationMs: Date.now() - startedAt,
        });
        return result;
    } catch (error) {
        loggerInstance.debug(`${operation} failed`, {
            ...context,
            durationMs: Date.now() - startedAt,
            error,
        });
        throw error;
    }
}

export function logErrorWithContext(
    loggerInstance: Logger,
    message: string,
    error: unknown,
    context: LogContext = {}
): void {
    loggerInstance.error(message, { ...context, error });
}

export const logger = createLogger();
