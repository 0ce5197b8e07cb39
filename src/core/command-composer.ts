import type { Logger } from "pino";
import type { InstallMode, InstallTarget, RepoOptions } from "./types.js";

const COMPAT_ARCH = ".i686";

/**
 * Builds `--disablerepo`/`--enablerepo` arguments.
 *
 * `fromRepo` (or the older `repo`) restricts the run to that one repo.
 * Otherwise disable and enable are applied independently, disable first.
 */
export function buildRepoArgs(options: RepoOptions, logger?: Logger): string {
  const fromRepo = options.fromRepo || options.repo || "";

  if (fromRepo) {
    logger?.info({ repo: fromRepo }, `Restricting to repo "${fromRepo}"`);
    return `--disablerepo="*" --enablerepo=${quote(fromRepo)}`;
  }

  const args: string[] = [];
  if (options.disableRepo) {
    logger?.info({ repo: options.disableRepo }, `Disabling repo "${options.disableRepo}"`);
    args.push(`--disablerepo=${quote(options.disableRepo)}`);
  }
  if (options.enableRepo) {
    logger?.info({ repo: options.enableRepo }, `Enabling repo "${options.enableRepo}"`);
    args.push(`--enablerepo=${quote(options.enableRepo)}`);
  }
  return args.join(" ");
}

/**
 * Renders one target as the tool expects it.
 *
 * A pinned target becomes `name-version`. On x86_64 a `.i686` name has the
 * suffix moved after the version (`foo.i686` @ `1-2` -> `foo-1-2.i686`).
 * Unpinned targets keep their name as given.
 */
export function formatTargetSpec(target: InstallTarget, cpuArch: string): string {
  if (target.version === null) return target.name;

  let name = target.name;
  let arch = "";
  if (cpuArch === "x86_64" && name.endsWith(COMPAT_ARCH)) {
    name = name.slice(0, -COMPAT_ARCH.length);
    arch = COMPAT_ARCH;
  }
  return `${name}-${target.version}${arch}`;
}

/**
 * Double-quotes a shell word, escaping what `sh` still expands inside quotes.
 */
export function quote(value: string): string {
  return `"${value.replace(/(["\\$`])/g, "\\$1")}"`;
}

/**
 * Joins command words, leaving out empty ones.
 */
export function joinCommand(...parts: Array<string | false | undefined>): string {
  return parts.filter((part): part is string => Boolean(part)).join(" ");
}

export interface InstallCommandOptions {
  tool: string;
  targets: InstallTarget[];
  cpuArch: string;
  repoArgs: string;
  skipVerify: boolean;
  mode: InstallMode;
}

/**
 * `<tool> -y <repoArgs> [--nogpgcheck] <install|downgrade> "<spec>" ...`
 */
export function buildInstallCommand(options: InstallCommandOptions): string {
  return joinCommand(
    options.tool,
    "-y",
    options.repoArgs,
    options.skipVerify && "--nogpgcheck",
    options.mode,
    options.targets.map((target) => quote(formatTargetSpec(target, options.cpuArch))).join(" "),
  );
}

export function buildUpgradeCommand(tool: string): string {
  return joinCommand(tool, "-q", "-y", "upgrade");
}

export function buildRemoveCommand(tool: string, names: string[]): string {
  return joinCommand(tool, "-q", "-y", "remove", names.map(quote).join(" "));
}

export function buildCleanCommand(tool: string): string {
  return joinCommand(tool, "-q", "clean", "dbcache");
}

export function buildListAvailableCommand(tool: string, names: string[], repoArgs: string): string {
  return joinCommand(tool, "-q", repoArgs, "list", "available", names.map(quote).join(" "));
}

export function buildCheckUpdateCommand(tool: string): string {
  return joinCommand(tool, "-q", "check-update");
}

/** Field separator of the installed-package query. */
export const QUERY_SEPARATOR = "_|-";

export function buildInstalledQueryCommand(rpmBin: string): string {
  const format = ["%{NAME}", "%{VERSION}", "%{RELEASE}", "%{ARCH}"].join(QUERY_SEPARATOR);
  return `${rpmBin} -qa --queryformat "${format}\\n"`;
}
