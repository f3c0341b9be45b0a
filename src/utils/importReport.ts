import fs from "fs";
import path from "path";
import { wrapNodeError } from "./errors";

export type ImportStatus =
    | "ADDED"
    | "EXISTS"
    | "LOOKUP_ERROR"
    | "NO_RESULTS"
    | "ADD_ERROR"
    | "DRY_RUN";

export interface ImportTally {
    added: number;
    exists: number;
    lookupError: number;
    addError: number;
    dryRun: number;
}

const TALLY_KEY: Record<ImportStatus, keyof ImportTally> = {
    ADDED: "added",
    EXISTS: "exists",
    LOOKUP_ERROR: "lookupError",
    NO_RESULTS: "lookupError",
    ADD_ERROR: "addError",
    DRY_RUN: "dryRun",
};

export function emptyTally(): ImportTally {
    return { added: 0, exists: 0, lookupError: 0, addError: 0, dryRun: 0 };
}

/** Collapses tabs and line breaks so each outcome stays on one report line. */
export function sanitizeField(value: string): string {
    const collapsed = value.replace(/[\t\r\n]+/g, " ").trim();
    return collapsed.length > 0 ? collapsed : "-";
}

export function formatSummaryLine(tally: ImportTally): string {
    return [
        "SUMMARY",
        `ADDED=${tally.added}`,
        `EXISTS=${tally.exists}`,
        `LOOKUP_ERROR=${tally.lookupError}`,
        `ADD_ERROR=${tally.addError}`,
        `DRY_RUN=${tally.dryRun}`,
    ].join("\t");
}

/**
 * Tab-separated per-artist outcome report; every line is appended as soon as
 * it is known. A previous report at the same path is replaced when the first
 * line is written.
 */
export class ImportReport {
    private readonly counts: ImportTally = emptyTally();
    private started = false;

    constructor(private readonly filePath: string) {}

    get path(): string {
        return this.filePath;
    }

    get tally(): ImportTally {
        return { ...this.counts };
    }

    record(mbid: string, status: ImportStatus, name: string, detail: string): void {
        this.counts[TALLY_KEY[status]] += 1;
        this.append(
            [mbid, status, name, detail].map(sanitizeField).join("\t")
        );
    }

    writeSummary(): string {
        const line = formatSummaryLine(this.counts);
        this.append(line);
        return line;
    }

    private reset(): void {
        const dir = path.dirname(this.filePath);
        if (dir && !fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
        fs.rmSync(this.filePath, { force: true });
        this.started = true;
    }

    private append(line: string): void {
        try {
            if (!this.started) {
                this.reset();
            }
            fs.appendFileSync(this.filePath, `${line}\n`, "utf-8");
        } catch (err) {
            throw wrapNodeError(err, this.filePath);
        }
    }
}
