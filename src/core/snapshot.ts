import { QUERY_SEPARATOR } from "./command-composer.js";
import { sortVersions } from "./version.js";
import type { InstalledSnapshot, InstalledVersion } from "./types.js";

export interface SnapshotOptions {
  cpuArch: string;
  versionsAsList?: boolean;
}

/**
 * Builds an installed-package snapshot from `name_|-version_|-release_|-arch`
 * query rows. Rows with any other field count are skipped.
 *
 * 32-bit packages on x86_64 hosts are keyed `name.i686`. A key seen more
 * than once collects every version, sorted ascending; unless
 * `versionsAsList` is set those are joined with `,`.
 */
export function parseInstalledQuery(rawText: string, options: SnapshotOptions): InstalledSnapshot {
  const collected = new Map<string, string[]>();

  for (const line of rawText.split(/\r?\n/)) {
    const fields = line.split(QUERY_SEPARATOR);
    if (fields.length !== 4) continue;

    const [rawName, version, release, arch] = fields;
    const name = options.cpuArch === "x86_64" && arch === "i686" ? `${rawName}.i686` : rawName;
    const pkgver = release ? `${version}-${release}` : version;

    const versions = collected.get(name);
    if (versions) {
      versions.push(pkgver);
    } else {
      collected.set(name, [pkgver]);
    }
  }

  const snapshot: Record<string, InstalledVersion> = {};
  for (const [name, versions] of collected) {
    const sorted = sortVersions(versions);
    snapshot[name] = options.versionsAsList ? sorted : sorted.join(",");
  }
  return snapshot;
}

/**
 * The newest installed version of an entry, or undefined when absent.
 */
export function latestInstalled(value: InstalledVersion | undefined): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "string") {
    const parts = value.split(",");
    return parts[parts.length - 1];
  }
  return value[value.length - 1];
}

/**
 * Display form of an entry: list entries joined with `,`.
 */
export function versionString(value: InstalledVersion | undefined): string {
  if (value === undefined) return "";
  return typeof value === "string" ? value : value.join(",");
}
