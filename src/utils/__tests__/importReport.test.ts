import fs from "fs";
import path from "path";
import { ImportReport, formatSummaryLine, sanitizeField } from "../importReport";
import { makeTempDir, removeDir } from "../../__tests__/fixtures";

describe("ImportReport", () => {
    let dir: string;

    beforeEach(() => {
        dir = makeTempDir();
    });

    afterEach(() => {
        removeDir(dir);
    });

    it("collapses tabs and line breaks inside fields", () => {
        expect(sanitizeField("HTTP 400:\t{\n\"error\": 1\r\n}")).toBe(
            'HTTP 400: { "error": 1 }'
        );
        expect(sanitizeField("  ")).toBe("-");
    });

    it("formats the summary line", () => {
        expect(
            formatSummaryLine({ added: 2, exists: 1, lookupError: 0, addError: 3, dryRun: 0 })
        ).toBe("SUMMARY\tADDED=2\tEXISTS=1\tLOOKUP_ERROR=0\tADD_ERROR=3\tDRY_RUN=0");
    });

    it("does not touch an existing report until the first line", () => {
        const reportPath = path.join(dir, "report.txt");
        fs.writeFileSync(reportPath, "previous run\n");

        new ImportReport(reportPath);

        expect(fs.readFileSync(reportPath, "utf-8")).toBe("previous run\n");
    });

    it("replaces the previous report and tallies outcomes", () => {
        const reportPath = path.join(dir, "output", "report.txt");
        fs.mkdirSync(path.dirname(reportPath));
        fs.writeFileSync(reportPath, "previous run\n");

        const report = new ImportReport(reportPath);
        report.record("aaa", "ADDED", "Portishead", "-");
        report.record("bbb", "EXISTS", "-", "precheck");
        report.record("ccc", "NO_RESULTS", "-", "no lookup results");
        report.record("ddd", "ADD_ERROR", "Tricky", "HTTP 500:\tboom");
        const summary = report.writeSummary();

        expect(summary).toBe(
            "SUMMARY\tADDED=1\tEXISTS=1\tLOOKUP_ERROR=1\tADD_ERROR=1\tDRY_RUN=0"
        );
        expect(report.tally).toEqual({
            added: 1,
            exists: 1,
            lookupError: 1,
            addError: 1,
            dryRun: 0,
        });
        expect(fs.readFileSync(reportPath, "utf-8")).toBe(
            [
                "aaa\tADDED\tPortishead\t-",
                "bbb\tEXISTS\t-\tprecheck",
                "ccc\tNO_RESULTS\t-\tno lookup results",
                "ddd\tADD_ERROR\tTricky\tHTTP 500: boom",
                summary,
                "",
            ].join("\n")
        );
    });

    it("creates missing directories", () => {
        const reportPath = path.join(dir, "a", "b", "report.txt");

        const report = new ImportReport(reportPath);
        report.writeSummary();

        expect(report.path).toBe(reportPath);
        expect(fs.existsSync(reportPath)).toBe(true);
    });
});
