import { z } from "zod";
import { decodeJson, foldKeys } from "./decode.js";
import { ResolveError } from "./errors.js";
import { getText } from "./http.js";
import { escapeModulePath } from "./module-path.js";
import { ProxyClient } from "./proxy.js";
import { compareToolchainVersions, compareVersions } from "./semver.js";
import {
  STANDARD_LIBRARY,
  type ListVersionsOptions,
  type ResolveOptions,
  type RetractionRange,
  type VersionRecord,
} from "../types.js";

export const STD_INDEX_URL = "https://go.dev/dl/?mode=json&include=all";

// Entries may spell their fields "version" or "Version"
const StdReleaseSchema = z.array(
  z.preprocess(
    foldKeys(["version", "time"]),
    z
      .object({
        version: z.string(),
        time: z.string().datetime({ offset: true }).optional(),
      })
      .passthrough(),
  ),
);

/**
 * Sort records in descending version order and drop every record whose
 * version compares equal to the one kept before it.
 */
export function uniqueVersions(records: VersionRecord[]): VersionRecord[] {
  const sorted = [...records].sort((a, b) => compareVersions(b.version, a.version));

  const unique: VersionRecord[] = [];
  for (const record of sorted) {
    const last = unique[unique.length - 1];
    if (last && compareVersions(last.version, record.version) === 0) {
      continue;
    }
    unique.push(record);
  }
  return unique;
}

/**
 * Whether a version lies in the inclusive interval of a retraction
 */
export function isRetractedBy(version: string, range: RetractionRange): boolean {
  return (
    compareVersions(version, range.low) >= 0 &&
    compareVersions(version, range.high) <= 0
  );
}

/**
 * Mark every record covered by one of the ranges. When several ranges
 * cover a record, the reason of the last one is kept.
 */
export function applyRetractions(
  records: readonly VersionRecord[],
  ranges: readonly RetractionRange[],
): VersionRecord[] {
  return records.map((record) => {
    let annotated: VersionRecord = record;
    for (const range of ranges) {
      if (isRetractedBy(record.version, range)) {
        annotated = {
          ...record,
          retracted: true,
          retractionReason: range.reason || undefined,
        };
      }
    }
    return annotated;
  });
}

/**
 * Released toolchains from the distribution index, newest first
 */
export async function listStdVersions(
  options: ResolveOptions = {},
): Promise<VersionRecord[]> {
  let body: string;
  try {
    body = await getText(STD_INDEX_URL, options);
  } catch (err) {
    if (err instanceof ResolveError) {
      err.message = `query distribution index: ${err.message}`;
    }
    throw err;
  }

  const releases = decodeJson(STD_INDEX_URL, body, StdReleaseSchema, "release index");

  return releases
    .map((release): VersionRecord => ({
      version: release.version,
      publishedAt: release.time ? new Date(release.time) : undefined,
      retracted: false,
    }))
    .sort((a, b) => compareToolchainVersions(b.version, a.version));
}

/**
 * List the versions of a module known to the given proxy mirrors.
 *
 * Versions older than `current` are skipped unless `includeAll` is set.
 * Every mirror is drained in order, and each retained version costs one
 * .info and one .mod request. Any failed request aborts the call: a
 * missing manifest could hide a retraction.
 */
export async function listVersions(
  modulePath: string,
  current: string,
  options: ListVersionsOptions,
): Promise<VersionRecord[]> {
  if (modulePath === STANDARD_LIBRARY) {
    return listStdVersions(options);
  }

  const escaped = escapeModulePath(modulePath);
  const { proxies, includeAll = false, ...requestOptions } = options;

  const records: VersionRecord[] = [];
  const retractions: RetractionRange[] = [];

  for (const proxy of proxies) {
    const client = new ProxyClient(proxy, escaped, requestOptions);

    const versions = (await client.list()).filter(
      (version) => includeAll || compareToolchainVersions(version, current) >= 0,
    );

    for (const version of versions) {
      const info = await client.info(version);
      records.push({
        version: info.Version,
        publishedAt: info.Time ? new Date(info.Time) : undefined,
        retracted: false,
      });

      retractions.push(...(await client.retractions(version)));
    }
  }

  return applyRetractions(uniqueVersions(records), retractions);
}
