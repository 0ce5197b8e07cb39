import type { PackageRecord } from "./types.js";

const PLUGIN_NOTICE = "Loaded plugin";

/**
 * Drops the trailing `.arch` segment from a `name.arch` token.
 * A token without a dot is returned unchanged.
 */
export function stripArch(nameArch: string): string {
  const dot = nameArch.lastIndexOf(".");
  return dot === -1 ? nameArch : nameArch.slice(0, dot);
}

/**
 * Best-effort extraction of `name.arch version status` rows from the
 * package tool's human-readable listings (`list`, `check-update`).
 *
 * Lines that do not split into exactly three whitespace-separated tokens
 * are skipped: headers, blank lines, wrapped rows and obsoletes notes all
 * fall out here.
 */
export function parseListing(rawText: string): PackageRecord[] {
  const records: PackageRecord[] = [];

  for (const line of rawText.split(/\r?\n/)) {
    if (line.startsWith(PLUGIN_NOTICE)) continue;

    const tokens = line.trim().split(/\s+/).filter(Boolean);
    if (tokens.length !== 3) continue;

    const [nameArch, version, status] = tokens;
    records.push({ name: stripArch(nameArch), version, status });
  }

  return records;
}

/**
 * Folds records into name -> version; a later row for a name wins.
 */
export function recordsToVersions(records: PackageRecord[]): Record<string, string> {
  const versions: Record<string, string> = {};
  for (const record of records) {
    versions[record.name] = record.version;
  }
  return versions;
}
