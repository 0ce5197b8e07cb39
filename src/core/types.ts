import type { Logger } from "pino";

/**
 * One row of package-tool listing output.
 */
export interface PackageRecord {
  name: string;
  version: string;
  status: string;
}

/**
 * Installed version of a package: a single string, or every installed
 * version in ascending order when the snapshot is taken as lists.
 */
export type InstalledVersion = string | string[];

/**
 * Point-in-time mapping of installed package names to their version(s).
 * Keys for 32-bit packages on x86_64 hosts carry a `.i686` suffix.
 */
export type InstalledSnapshot = Readonly<Record<string, InstalledVersion>>;

/**
 * Repository filters for a single package-tool invocation.
 * `fromRepo` (or its older spelling `repo`) wins over enable/disable.
 */
export interface RepoOptions {
  fromRepo?: string;
  repo?: string;
  enableRepo?: string;
  disableRepo?: string;
}

/**
 * A requested package. `version` pins it; `null` accepts any version.
 */
export interface InstallTarget {
  name: string;
  version: string | null;
}

export type InstallMode = "install" | "downgrade";

/**
 * Where install targets come from: named repository packages, or package
 * files handed to the tool by path or URI.
 */
export type TargetKind = "repository" | "file";

export interface ParsedTargets {
  kind: TargetKind;
  /** Package name to version (repository) or to source path (file). */
  params: Record<string, string | null>;
}

export interface PackageChange {
  old: string;
  new: string;
}

/**
 * Observable effect of an install or upgrade, keyed by package name.
 */
export type ChangeSet = Record<string, PackageChange>;

export type VersionOperator = "==" | "!=" | "<" | "<=" | ">" | ">=";

/**
 * Facts about the host, as read from /etc/os-release and the CPU.
 */
export interface HostFacts {
  os: string;
  osFamily: string;
  osRelease: string;
  cpuArch: string;
}

/**
 * Captured outcome of one external command.
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  code: number;
}

/**
 * Runs a command line and reports its output. Implementations must not
 * reject on a non-zero exit status; the status is part of the result.
 */
export interface CommandExecutor {
  run(command: string): Promise<CommandResult>;
}

export interface Settings {
  verbose: boolean;
  prettyLogs: boolean;
  yumBin: string;
  rpmBin: string;
  sudo: boolean;
  versionsAsList: boolean;
  failOnError: boolean;
}

/**
 * Collaborators handed to a package manager at construction.
 * `queryExecutor` runs the RPM database query and defaults to `executor`.
 */
export interface PackageManagerContext {
  executor: CommandExecutor;
  queryExecutor?: CommandExecutor;
  host: HostFacts;
  logger: Logger;
  settings: Settings;
}

export interface InstallOptions extends RepoOptions {
  name?: string;
  version?: string;
  /** Names or `{name: version}` entries; checked when targets are parsed. */
  pkgs?: unknown;
  /** `{name: pathOrUri}` entries; checked when targets are parsed. */
  sources?: unknown;
  refresh?: unknown;
  skipVerify?: boolean;
}
