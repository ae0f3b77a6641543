import { listVersions } from "../lib/versions.js";
import {
  compareToolchainVersions,
  prerelease,
  toolchainToSemver,
} from "../lib/semver.js";
import { reportFailure, requestContext, type RequestFlags } from "./common.js";
import type { VersionRecord } from "../types.js";

export interface ListOptions extends RequestFlags {
  /** Version considered installed; only newer ones are listed */
  current?: string;
  /** List older and retracted versions too */
  all?: boolean;
  /** Only list versions whose pre-release part matches */
  suffix?: RegExp;
  json?: boolean;
}

export interface Selection {
  versions: VersionRecord[];
  /** Nothing newer than the current version exists */
  upToDate: boolean;
}

const COLUMN_PADDING = 2;

/**
 * Pick the versions worth showing from a newest-first list.
 *
 * Unless `all` is set, the walk stops at the first version that is not
 * newer than `current` and retracted versions are hidden.
 */
export function selectVersions(
  records: readonly VersionRecord[],
  current: string,
  options: { all?: boolean; suffix?: RegExp } = {},
): Selection {
  const { all = false, suffix } = options;
  const versions: VersionRecord[] = [];

  for (const record of records) {
    if (!all && compareToolchainVersions(record.version, current) <= 0) {
      return { versions, upToDate: versions.length === 0 };
    }
    if (!all && record.retracted) continue;
    if (suffix && !suffix.test(prerelease(toolchainToSemver(record.version)))) {
      continue;
    }
    versions.push(record);
  }
  return { versions, upToDate: false };
}

/**
 * "2023-08-08 17:04", always in UTC
 */
export function formatTime(date: Date): string {
  return date.toISOString().slice(0, 16).replace("T", " ");
}

function formatRow(record: VersionRecord): string[] {
  const cells = [record.version];
  if (record.publishedAt) {
    cells.push(formatTime(record.publishedAt));
  }
  if (record.retracted) {
    cells.push(
      record.retractionReason ? `retracted: ${record.retractionReason}` : "retracted",
    );
  }
  return cells;
}

/**
 * Align cells into columns. The last cell of a row is never padded and
 * does not widen its column.
 */
export function formatColumns(rows: readonly string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.slice(0, -1).forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }

  return rows.map((row) =>
    row
      .map((cell, i) =>
        i === row.length - 1 ? cell : cell.padEnd((widths[i] ?? 0) + COLUMN_PADDING),
      )
      .join(""),
  );
}

/**
 * List the available versions of a module
 */
export async function listCommand(
  modulePath: string,
  options: ListOptions = {},
): Promise<void> {
  const current = options.current ?? "";

  try {
    const context = await requestContext(options);
    const records = await listVersions(modulePath, current, {
      proxies: context.proxies,
      includeAll: options.all,
      signal: context.signal,
      log: context.log,
    });

    const selection = selectVersions(records, current, {
      all: options.all,
      suffix: options.suffix,
    });

    if (options.json) {
      console.log(JSON.stringify(selection.versions, null, 2));
      return;
    }

    if (selection.upToDate) {
      console.error("no new version");
      return;
    }

    for (const line of formatColumns(selection.versions.map(formatRow))) {
      console.log(line);
    }
  } catch (err) {
    reportFailure(err);
  }
}
