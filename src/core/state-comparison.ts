import { versionString } from "./snapshot.js";
import type { ChangeSet, InstalledSnapshot, InstalledVersion } from "./types.js";

function sameVersion(a: InstalledVersion, b: InstalledVersion): boolean {
  if (typeof a === "string" || typeof b === "string") {
    return versionString(a) === versionString(b);
  }
  return a.length === b.length && a.every((version, index) => version === b[index]);
}

function has(snapshot: InstalledSnapshot, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(snapshot, name);
}

/**
 * Names installed before but not after, in `before`'s order.
 */
export function diffRemoved(before: InstalledSnapshot, after: InstalledSnapshot): string[] {
  return Object.keys(before).filter((name) => !has(after, name));
}

/**
 * Packages that appeared or changed version between two snapshots.
 *
 * New packages report `old: ""`. Packages that disappeared are not listed
 * here; removals are reported by {@link diffRemoved}.
 */
export function diffChanges(before: InstalledSnapshot, after: InstalledSnapshot): ChangeSet {
  const changes: ChangeSet = {};

  for (const [name, next] of Object.entries(after)) {
    if (!has(before, name)) {
      changes[name] = { old: "", new: versionString(next) };
      continue;
    }
    const previous = before[name];
    if (!sameVersion(previous, next)) {
      changes[name] = { old: versionString(previous), new: versionString(next) };
    }
  }

  return changes;
}
