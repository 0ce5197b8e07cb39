import type { Logger } from "pino";
import type { VersionOperator } from "./types.js";

export const VERSION_OPERATORS: readonly VersionOperator[] = ["==", "!=", "<", "<=", ">", ">="];

export type Ordering = -1 | 0 | 1;

export interface Evr {
  epoch: number;
  version: string;
  release: string;
}

export function isVersionOperator(value: string): value is VersionOperator {
  return VERSION_OPERATORS.some((op) => op === value);
}

const isDigit = (ch: string) => ch >= "0" && ch <= "9";
const isAlpha = (ch: string) => (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
const isAlnum = (ch: string) => isDigit(ch) || isAlpha(ch);

function sign(value: number): Ordering {
  if (value < 0) return -1;
  return value > 0 ? 1 : 0;
}

/**
 * Segment-wise comparison of a single version or release string, as RPM
 * does it. Digit runs compare numerically and beat alpha runs; `~` sorts
 * before anything, even the end of the string; `^` sorts after the end of
 * the string but before any further segment.
 */
export function rpmvercmp(a: string, b: string): Ordering {
  if (a === b) return 0;

  let i = 0;
  let j = 0;

  while (i < a.length || j < b.length) {
    while (i < a.length && !isAlnum(a[i]) && a[i] !== "~" && a[i] !== "^") i++;
    while (j < b.length && !isAlnum(b[j]) && b[j] !== "~" && b[j] !== "^") j++;

    if (a[i] === "~" || b[j] === "~") {
      if (a[i] !== "~") return 1;
      if (b[j] !== "~") return -1;
      i++;
      j++;
      continue;
    }

    if (a[i] === "^" || b[j] === "^") {
      if (i >= a.length) return -1;
      if (j >= b.length) return 1;
      if (a[i] !== "^") return 1;
      if (b[j] !== "^") return -1;
      i++;
      j++;
      continue;
    }

    if (i >= a.length || j >= b.length) break;

    const startA = i;
    const startB = j;
    const numeric = isDigit(a[i]);
    const matches = numeric ? isDigit : isAlpha;

    while (i < a.length && matches(a[i])) i++;
    while (j < b.length && matches(b[j])) j++;

    // Segments of different types: numeric is newer.
    if (j === startB) return numeric ? 1 : -1;

    let segA = a.slice(startA, i);
    let segB = b.slice(startB, j);

    if (numeric) {
      segA = segA.replace(/^0+/, "");
      segB = segB.replace(/^0+/, "");
      if (segA.length !== segB.length) return segA.length > segB.length ? 1 : -1;
    }

    if (segA !== segB) return segA < segB ? -1 : 1;
  }

  if (i >= a.length && j >= b.length) return 0;
  return i < a.length ? 1 : -1;
}

/**
 * Splits `[epoch:]version[-release]`. Returns undefined for strings the
 * comparison cannot make sense of.
 */
export function parseEvr(value: string): Evr | undefined {
  if (value.trim() === "" || /\s/.test(value)) return undefined;

  let epoch = 0;
  let rest = value;
  const colon = value.indexOf(":");
  if (colon !== -1) {
    const rawEpoch = value.slice(0, colon);
    if (!/^\d+$/.test(rawEpoch)) return undefined;
    epoch = Number.parseInt(rawEpoch, 10);
    rest = value.slice(colon + 1);
  }

  const dash = rest.lastIndexOf("-");
  const version = dash === -1 ? rest : rest.slice(0, dash);
  const release = dash === -1 ? "" : rest.slice(dash + 1);
  if (version === "") return undefined;

  return { epoch, version, release };
}

/**
 * Orders two package versions: -1, 0 or 1, or undefined when either
 * cannot be parsed. Releases are compared only when both sides carry one.
 */
export function compareVersions(a: string, b: string): Ordering | undefined {
  const left = parseEvr(a);
  const right = parseEvr(b);
  if (!left || !right) return undefined;

  if (left.epoch !== right.epoch) return sign(left.epoch - right.epoch);

  const byVersion = rpmvercmp(left.version, right.version);
  if (byVersion !== 0 || !left.release || !right.release) return byVersion;

  return rpmvercmp(left.release, right.release);
}

/**
 * Evaluates `a <operator> b`. False whenever the ordering is undecidable.
 */
export function compare(
  a: string,
  operator: string,
  b: string,
  logger?: Logger,
): boolean {
  if (!isVersionOperator(operator)) {
    logger?.error({ operator }, `Invalid version operator "${operator}"`);
    return false;
  }

  const order = compareVersions(a, b);
  if (order === undefined) {
    logger?.warn({ a, b }, "Unable to compare versions");
    return false;
  }

  switch (operator) {
    case "==":
      return order === 0;
    case "!=":
      return order !== 0;
    case "<":
      return order < 0;
    case "<=":
      return order <= 0;
    case ">":
      return order > 0;
    case ">=":
      return order >= 0;
  }
}

/**
 * Ascending sort by package version; undecidable pairs keep their order.
 */
export function sortVersions(versions: readonly string[]): string[] {
  return [...versions].sort((a, b) => compareVersions(a, b) ?? 0);
}
