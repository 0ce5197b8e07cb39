import os from "node:os";
import { readFileSync } from "node:fs";

import type { HostFacts } from "./types.js";

const REDHAT_IDS = ["rhel", "centos", "fedora", "amzn", "rocky", "almalinux", "ol", "scientific"];

const ARCH_NAMES: Record<string, string> = {
  x64: "x86_64",
  ia32: "i686",
  arm64: "aarch64",
  arm: "armv7hl",
  ppc64: "ppc64le",
  s390x: "s390x",
};

/**
 * Parses os-release content into a map of lower-cased, unquoted values.
 */
export function parseOsRelease(content: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const match = line.match(/^([A-Z_]+)=(.*)$/);
    if (match) {
      fields[match[1]] = match[2].replace(/^['"]|['"]$/g, "").toLowerCase();
    }
  }
  return fields;
}

function readOsRelease(): Record<string, string> {
  try {
    return parseOsRelease(readFileSync("/etc/os-release", "utf8"));
  } catch {
    // No os-release (non-Linux host or a minimal container).
    return {};
  }
}

/**
 * Maps Node's architecture name to the RPM one (x64 -> x86_64).
 */
export function rpmArch(nodeArch: string): string {
  return ARCH_NAMES[nodeArch] ?? nodeArch;
}

/**
 * Collects OS identity and CPU architecture. ID/ID_LIKE/VERSION_ID
 * environment variables take precedence over /etc/os-release.
 */
export function detectHostFacts(): HostFacts {
  const release = readOsRelease();
  const id = process.env.ID?.toLowerCase() || release.ID || "";
  const idLike = process.env.ID_LIKE?.toLowerCase() || release.ID_LIKE || "";
  const versionId = process.env.VERSION_ID || release.VERSION_ID || "";

  const ids = [id, ...idLike.split(/\s+/)].filter(Boolean);
  const osFamily = os.platform() === "linux" && ids.some((value) => REDHAT_IDS.includes(value))
    ? "RedHat"
    : os.platform();

  return {
    os: id || os.platform(),
    osFamily,
    osRelease: versionId,
    cpuArch: rpmArch(os.arch()),
  };
}

/**
 * Whether yum-based package management applies to a host: a RedHat-family
 * OS whose release starts with a numeric major version.
 */
export function isApplicable(facts: Pick<HostFacts, "osFamily" | "osRelease">): boolean {
  return facts.osFamily === "RedHat" && /^\d+/.test(facts.osRelease);
}
