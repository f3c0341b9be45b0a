export {};

const originalEnv = { ...process.env };

describe("logger", () => {
    afterEach(() => {
        process.env = originalEnv;
        jest.resetModules();
        jest.restoreAllMocks();
    });

    function loadLoggerModule(logLevel?: string) {
        jest.resetModules();
        jest.restoreAllMocks();
        process.env = { ...originalEnv };

        if (logLevel === undefined) {
            delete process.env.LOG_LEVEL;
        } else {
            process.env.LOG_LEVEL = logLevel;
        }

        const stdout = jest.spyOn(console, "log").mockImplementation(() => {});
        const stderr = jest.spyOn(console, "error").mockImplementation(() => {});

        // eslint-disable-next-line @typescript-eslint/no-var-requires
        const loggerModule: typeof import("../logger") = require("../logger");

        return { ...loggerModule, stdout, stderr };
    }

    it("gates logs based on LOG_LEVEL ordering", () => {
        const cases = [
            { level: "debug", expected: [1, 3] },
            { level: "info", expected: [1, 2] },
            { level: "warn", expected: [0, 2] },
            { level: "error", expected: [0, 1] },
            { level: "silent", expected: [0, 0] },
        ];

        for (const scenario of cases) {
            const { logger, stdout, stderr } = loadLoggerModule(scenario.level);

            logger.debug("debug call");
            logger.info("info call");
            logger.warn("warn call");
            logger.error("error call");

            expect([stdout.mock.calls.length, stderr.mock.calls.length]).toEqual(
                scenario.expected
            );
        }
    });

    it("prints info untagged on stdout and tags the rest on stderr", () => {
        const { logger, stdout, stderr } = loadLoggerModule();

        logger.debug("hidden");
        logger.info("Portishead: 8f6bd1e4-fbe1-4f50-aa9b-94c450ec0f11");
        logger.warn("slow down");

        expect(stdout).toHaveBeenCalledWith("Portishead: 8f6bd1e4-fbe1-4f50-aa9b-94c450ec0f11");
        expect(stderr.mock.calls).toEqual([["[WARN] slow down"]]);
    });

    it("silences all levels when LOG_LEVEL is unknown", () => {
        const { logger, stdout, stderr } = loadLoggerModule("noisy");

        logger.info("info call");
        logger.error("error call");

        expect(stdout).not.toHaveBeenCalled();
        expect(stderr).not.toHaveBeenCalled();
    });

    it("lets the command line override the configured level", () => {
        const { logger, setLogLevel, getLogLevel, stderr } = loadLoggerModule("warn");

        setLogLevel("debug");
        logger.debug("now visible");

        expect(getLogLevel()).toBe("debug");
        expect(stderr).toHaveBeenCalledWith("[DEBUG] now visible");
    });

    it("recognizes the supported level names", () => {
        const { isLogLevel } = loadLoggerModule();

        expect(isLogLevel("warn")).toBe(true);
        expect(isLogLevel("silent")).toBe(true);
        expect(isLogLevel("verbose")).toBe(false);
    });

    it("renders context as key=value pairs", () => {
        const { formatContext } = loadLoggerModule();

        expect(formatContext(undefined)).toBe("");
        expect(
            formatContext({
                count: 3,
                report: "output/lidarr_output.txt",
                name: "Massive Attack",
                ids: [1, 2],
                error: new Error("socket hang up"),
            })
        ).toBe(
            ' count=3 report=output/lidarr_output.txt name="Massive Attack" ids=[1,2] error="socket hang up"'
        );
    });

    it("prints the stack of a logged error only at debug level", () => {
        const quiet = loadLoggerModule("info");
        quiet.logger.error("failed", { error: new Error("nope") });
        expect(quiet.stderr.mock.calls).toEqual([['[ERROR] failed error="nope"']]);

        const verbose = loadLoggerModule("debug");
        const error = new Error("nope");
        verbose.logger.error("failed", { error });
        expect(verbose.stderr.mock.calls).toEqual([
            ['[ERROR] failed error="nope"'],
            [error.stack],
        ]);
    });

    it("creates scoped child loggers with dotted scope names", () => {
        const { createLogger, stdout, stderr } = loadLoggerModule("info");

        const base = createLogger("importer");
        base.child("report").info("written");
        base.warn("careful");

        expect(stdout).toHaveBeenCalledWith("[importer.report] written");
        expect(stderr).toHaveBeenCalledWith("[WARN] [importer] careful");
    });

    it("withLogTiming records start and completion", async () => {
        const { logger, withLogTiming, stderr } = loadLoggerModule("debug");

        const result = await withLogTiming(logger, "import", async () => "ok", {
            count: 3,
        });

        expect(result).toBe("ok");
        expect(stderr).toHaveBeenCalledTimes(2);
        expect(stderr.mock.calls[0]).toEqual(["[DEBUG] import started count=3"]);
        expect(stderr.mock.calls[1][0]).toMatch(/^\[DEBUG\] import completed count=3 durationMs=\d+$/);
    });

    it("withLogTiming rethrows failures", async () => {
        const { logger, withLogTiming, stderr } = loadLoggerModule("info");

        await expect(
            withLogTiming(logger, "import", async () => {
                throw new Error("boom");
            })
        ).rejects.toThrow("boom");

        expect(stderr).not.toHaveBeenCalled();
    });

    it("logErrorWithContext merges explicit context with the error", () => {
        const { logger, logErrorWithContext, stderr } = loadLoggerModule("error");

        logErrorWithContext(logger, "command failed", new Error("nope"), {
            command: "import",
        });

        expect(stderr).toHaveBeenCalledWith('[ERROR] command failed command=import error="nope"');
    });
});
