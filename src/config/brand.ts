import fs from "fs";
import path from "path";
import { z } from "zod";

export const BRAND_NAME = "artist-catalog-sync";
export const BRAND_CLI_NAME = "artist-sync";

const manifestSchema = z.object({ version: z.string().min(1) });

// Resolves to the project root from both src/config and dist/config.
export const PACKAGE_MANIFEST_PATH = path.resolve(__dirname, "..", "..", "package.json");

function readPackageVersion(): string {
    const manifest: unknown = JSON.parse(fs.readFileSync(PACKAGE_MANIFEST_PATH, "utf-8"));
    return manifestSchema.parse(manifest).version;
}

export const BRAND_VERSION = readPackageVersion();

// MusicBrainz asks every client to identify itself with a contact address.
export const BRAND_USER_AGENT = `${BRAND_NAME}/${BRAND_VERSION} (set MUSICBRAINZ_UA to include your contact)`;
