import chalk from "chalk";
import type { ChangeSet, InstalledSnapshot } from "../core/types.js";
import { versionString } from "../core/snapshot.js";

function pad(names: string[]): number {
  return names.reduce((width, name) => Math.max(width, name.length), 0);
}

/**
 * One line per changed package: `name  old -> new`, new installs marked.
 */
export function formatChanges(changes: ChangeSet): string[] {
  const names = Object.keys(changes);
  if (names.length === 0) return [chalk.dim("No changes")];

  const width = pad(names);
  return names.map((name) => {
    const { old, new: next } = changes[name];
    const from = old ? chalk.red(old) : chalk.cyan("(new)");
    return `${name.padEnd(width)}  ${from} -> ${chalk.green(next)}`;
  });
}

export function formatRemoved(names: string[]): string[] {
  if (names.length === 0) return [chalk.dim("Nothing removed")];
  return names.map((name) => `${chalk.red("-")} ${name}`);
}

/**
 * `name  version` rows; a missing version shows as `(none)`.
 */
export function formatVersions(versions: Record<string, string> | InstalledSnapshot): string[] {
  const names = Object.keys(versions);
  if (names.length === 0) return [chalk.dim("No packages")];

  const width = pad(names);
  return names.map((name) => {
    const version = versionString(versions[name]);
    return `${name.padEnd(width)}  ${version ? chalk.green(version) : chalk.dim("(none)")}`;
  });
}

export function formatBoolean(value: boolean): string {
  return value ? chalk.green("true") : chalk.red("false");
}

export function formatOrdering(value: -1 | 0 | 1 | undefined): string {
  return value === undefined ? chalk.yellow("undetermined") : String(value);
}
