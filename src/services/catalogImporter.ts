import axios from "axios";
import { createLogger } from "../utils/logger";
import {
    AppError,
    ErrorCategory,
    ErrorCode,
    describeHttpError,
    errorMessage,
} from "../utils/errors";
import { stripTrailingSlashes, type MonitorOption } from "../config";
import type { ImportReport, ImportTally } from "../utils/importReport";
import {
    pickDefaultProfileId,
    type AddArtistOptions,
    type LidarrLookupArtist,
    type LidarrProfile,
    type LidarrRootFolder,
} from "./lidarr";

const log = createLogger("importer");

const CONFLICT_STATUSES = new Set([400, 409]);

/** The Lidarr operations the importer relies on. */
export interface LidarrCatalog {
    getExistingForeignIds(): Promise<Set<string>>;
    lookupByMbid(mbid: string): Promise<LidarrLookupArtist[]>;
    addArtist(
        candidate: LidarrLookupArtist,
        options: AddArtistOptions
    ): Promise<LidarrLookupArtist>;
    getRootFolders(): Promise<LidarrRootFolder[]>;
    getQualityProfiles(): Promise<LidarrProfile[]>;
    getMetadataProfiles(): Promise<LidarrProfile[]>;
}

export interface ImportOptions {
    rootFolder: string;
    qualityProfileId: number;
    metadataProfileId: number;
    monitor: MonitorOption;
    searchForMissingAlbums: boolean;
    dryRun: boolean;
}

export interface ImportArtistsParams {
    mbids: string[];
    lidarr: LidarrCatalog;
    report: ImportReport;
    options: ImportOptions;
}

export interface ResolvedProfiles {
    qualityProfileId: number;
    metadataProfileId: number;
}

/**
 * Fails unless `requested` is one of Lidarr's root folders.
 */
export async function verifyRootFolder(
    lidarr: LidarrCatalog,
    requested: string
): Promise<string> {
    const desired = stripTrailingSlashes(requested);
    const available = Array.from(
        new Set(
            (await lidarr.getRootFolders()).map((folder) =>
                stripTrailingSlashes(folder.path)
            )
        )
    ).sort();

    if (!available.includes(desired)) {
        const listing =
            available.length > 0
                ? `available: ${available.join(", ")}`
                : "no root folders returned by Lidarr";
        throw new AppError(
            ErrorCode.ROOT_FOLDER_NOT_CONFIGURED,
            ErrorCategory.FATAL,
            `Root folder not configured in Lidarr: ${requested} (${listing})`,
            { requested, available }
        );
    }
    return desired;
}

async function fetchProfiles(
    kind: string,
    fetch: () => Promise<LidarrProfile[]>
): Promise<LidarrProfile[]> {
    try {
        return await fetch();
    } catch (error) {
        log.warn(`Could not load ${kind} profiles: ${describeHttpError(error)}`);
        return [];
    }
}

function validateProfileId(
    kind: string,
    id: number,
    profiles: LidarrProfile[]
): void {
    const available = profiles.map((profile) => profile.id).sort((a, b) => a - b);
    if (id > 0 && (available.length === 0 || available.includes(id))) {
        return;
    }

    const suffix =
        available.length > 0
            ? ` (available ${kind} profile ids: ${available.join(", ")})`
            : "";
    throw new AppError(
        ErrorCode.INVALID_PROFILE,
        ErrorCategory.FATAL,
        `Invalid ${kind} profile id: ${id}${suffix}`,
        { kind, id, available }
    );
}

/**
 * Fills in missing (≤ 0) profile ids from the library's defaults and checks
 * the result against the profiles Lidarr knows. Ids the operator supplied
 * are never replaced.
 */
export async function resolveProfiles(
    lidarr: LidarrCatalog,
    options: Pick<ImportOptions, "qualityProfileId" | "metadataProfileId">
): Promise<ResolvedProfiles> {
    const qualityProfiles = await fetchProfiles("quality", () =>
        lidarr.getQualityProfiles()
    );
    const metadataProfiles = await fetchProfiles("metadata", () =>
        lidarr.getMetadataProfiles()
    );

    let qualityProfileId = options.qualityProfileId;
    let metadataProfileId = options.metadataProfileId;

    if (qualityProfileId <= 0) {
        qualityProfileId = pickDefaultProfileId(qualityProfiles);
    }
    if (metadataProfileId <= 0) {
        metadataProfileId = pickDefaultProfileId(metadataProfiles);
    }

    validateProfileId("quality", qualityProfileId, qualityProfiles);
    validateProfileId("metadata", metadataProfileId, metadataProfiles);

    return { qualityProfileId, metadataProfileId };
}

async function loadExisting(
    lidarr: LidarrCatalog,
    fallback: Set<string>
): Promise<Set<string>> {
    try {
        return await lidarr.getExistingForeignIds();
    } catch (error) {
        log.warn(`Could not load existing artists: ${describeHttpError(error)}`);
        return fallback;
    }
}

function pickCandidate(
    results: LidarrLookupArtist[],
    mbid: string
): LidarrLookupArtist {
    return results.find((result) => result.foreignArtistId === mbid) ?? results[0];
}

/**
 * Adds each MBID to Lidarr, writing one report line per MBID and a trailing
 * summary. Per-artist failures are reported and never stop the run.
 */
export async function importArtists(
    params: ImportArtistsParams
): Promise<ImportTally> {
    const { mbids, lidarr, report, options } = params;

    await verifyRootFolder(lidarr, options.rootFolder);
    const profiles = await resolveProfiles(lidarr, options);
    const existing = await loadExisting(lidarr, new Set());

    for (const mbid of mbids) {
        if (existing.has(mbid)) {
            log.info(`${mbid}: already present (precheck)`);
            report.record(mbid, "EXISTS", "-", "precheck");
            continue;
        }

        let results: LidarrLookupArtist[];
        try {
            results = await lidarr.lookupByMbid(mbid);
        } catch (error) {
            const detail = describeHttpError(error);
            log.info(`${mbid}: LOOKUP ERROR ${detail}`);
            report.record(mbid, "LOOKUP_ERROR", "-", detail);
            continue;
        }

        if (results.length === 0) {
            log.info(`${mbid}: no lookup results`);
            report.record(mbid, "NO_RESULTS", "-", "no lookup results");
            continue;
        }

        const candidate = pickCandidate(results, mbid);
        const name = candidate.artistName || "<unknown>";
        log.info(`Found: ${name} (${candidate.disambiguation || "N/A"}) -> ${mbid}`);

        if (options.dryRun) {
            report.record(mbid, "DRY_RUN", name, "-");
            continue;
        }

        const qualityProfileId =
            candidate.qualityProfileId || profiles.qualityProfileId;
        const metadataProfileId =
            candidate.metadataProfileId || profiles.metadataProfileId;
        log.debug(
            `Using profiles -> qualityProfileId=${qualityProfileId}, metadataProfileId=${metadataProfileId}`
        );

        try {
            const added = await lidarr.addArtist(candidate, {
                qualityProfileId,
                metadataProfileId,
                rootFolderPath: options.rootFolder,
                monitor: options.monitor,
                searchForMissingAlbums: options.searchForMissingAlbums,
            });
            log.info(`Added: ${added.artistName || name}`);
            report.record(mbid, "ADDED", name, "-");
            existing.add(mbid);
        } catch (error) {
            if (axios.isAxiosError(error) && error.response) {
                const status = error.response.status;
                // A rejected add may still have landed, e.g. a concurrent add
                const current = await loadExisting(lidarr, existing);
                if (CONFLICT_STATUSES.has(status) && current.has(mbid)) {
                    log.info(`${name}: already exists (HTTP ${status})`);
                    report.record(mbid, "EXISTS", name, `HTTP ${status}`);
                    existing.add(mbid);
                } else {
                    const detail = describeHttpError(error);
                    log.info(`${name}: ADD ERROR ${detail}`);
                    report.record(mbid, "ADD_ERROR", name, detail);
                }
                continue;
            }

            const detail = errorMessage(error);
            log.info(`${name}: ADD ERROR ${detail}`);
            report.record(mbid, "ADD_ERROR", name, detail);
        }
    }

    const summary = report.writeSummary();
    log.info(summary.replace(/\t/g, " "));
    return report.tally;
}
