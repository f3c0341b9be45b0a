import fs from "fs";
import path from "path";
import { wrapNodeError } from "./errors";

export const LIDARR_TAG_PREFIX = "lidarr:";

export function toLidarrTag(mbid: string): string {
    return `${LIDARR_TAG_PREFIX}${mbid}`;
}

export function dedupePreservingOrder(values: Iterable<string>): string[] {
    return Array.from(new Set(values));
}

function readLines(filePath: string): string[] {
    try {
        return fs.readFileSync(filePath, "utf-8").split(/\r?\n/);
    } catch (err) {
        throw wrapNodeError(err, filePath);
    }
}

function ensureParentDir(filePath: string): void {
    const dir = path.dirname(filePath);
    if (dir && !fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
    }
}

/**
 * Artist names, one per line; blank lines skipped, first occurrence wins.
 */
export function parseArtistsFile(filePath: string): string[] {
    const names = readLines(filePath)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
    return dedupePreservingOrder(names);
}

/**
 * MBIDs, one per line, either bare or as `lidarr:<mbid>`.
 */
export function parseIdentifierFile(filePath: string): string[] {
    const ids = readLines(filePath)
        .map((line) => line.trim())
        .filter((line) => line.length > 0)
        .map((line) =>
            line.startsWith(LIDARR_TAG_PREFIX)
                ? line.slice(LIDARR_TAG_PREFIX.length).trim()
                : line
        )
        .filter((id) => id.length > 0);
    return dedupePreservingOrder(ids);
}

/**
 * MBIDs already present as `lidarr:<mbid>` lines; a missing file yields none.
 */
export function loadWrittenIdentifiers(filePath: string): Set<string> {
    if (!fs.existsSync(filePath)) {
        return new Set();
    }

    const written = new Set<string>();
    for (const raw of readLines(filePath)) {
        const line = raw.trim();
        if (line.startsWith(LIDARR_TAG_PREFIX) && line.length > LIDARR_TAG_PREFIX.length) {
            written.add(line.slice(LIDARR_TAG_PREFIX.length));
        }
    }
    return written;
}

/**
 * Append-only `lidarr:<mbid>` writer. Each line goes straight to the file
 * descriptor so an interrupted run keeps everything written so far.
 */
export class IdentifierFileWriter {
    private fd: number | null;
    private readonly known: Set<string>;

    constructor(
        private readonly filePath: string,
        options: { append: boolean }
    ) {
        this.known = options.append
            ? loadWrittenIdentifiers(filePath)
            : new Set();

        try {
            ensureParentDir(filePath);
            this.fd = fs.openSync(filePath, options.append ? "a" : "w");
        } catch (err) {
            throw wrapNodeError(err, filePath);
        }
    }

    get path(): string {
        return this.filePath;
    }

    get size(): number {
        return this.known.size;
    }

    has(mbid: string): boolean {
        return this.known.has(mbid);
    }

    /**
     * Writes the MBID unless it is already in the file. Returns whether it was written.
     */
    write(mbid: string): boolean {
        if (!mbid || this.known.has(mbid)) {
            return false;
        }
        if (this.fd === null) {
            throw new Error(`Identifier file already closed: ${this.filePath}`);
        }

        fs.writeSync(this.fd, `${toLidarrTag(mbid)}\n`);
        this.known.add(mbid);
        return true;
    }

    close(): void {
        if (this.fd !== null) {
            fs.closeSync(this.fd);
            this.fd = null;
        }
    }
}

/**
 * Writes the sorted artist names, one per line.
 */
export function writeArtistList(filePath: string, names: Iterable<string>): number {
    const sorted = Array.from(new Set(names)).sort();
    try {
        ensureParentDir(filePath);
        const body = sorted.map((name) => `${name}\n`).join("");
        fs.writeFileSync(filePath, body, "utf-8");
    } catch (err) {
        throw wrapNodeError(err, filePath);
    }
    return sorted.length;
}
