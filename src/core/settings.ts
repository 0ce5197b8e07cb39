import type { Settings } from "./types.js";

const TRUTHY = new Set(["1", "true", "yes", "on", "y"]);

/**
 * Loose boolean coercion for flags that may arrive as strings, numbers or
 * booleans from the environment, the CLI or a caller.
 */
export function isTrue(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) && value !== 0;
  if (typeof value === "string") return TRUTHY.has(value.trim().toLowerCase());
  return false;
}

export const defaultSettings: Settings = {
  verbose: false,
  prettyLogs: true,
  yumBin: "yum",
  rpmBin: "rpm",
  sudo: false,
  versionsAsList: false,
  failOnError: false,
};

function flag(raw: string | undefined, fallback: boolean): boolean {
  return raw === undefined || raw === "" ? fallback : isTrue(raw);
}

/**
 * Resolves settings from YUMKIT_* environment variables; explicit
 * overrides take precedence.
 */
export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<Settings> = {},
): Settings {
  return {
    verbose: overrides.verbose ?? flag(env.YUMKIT_VERBOSE, defaultSettings.verbose),
    prettyLogs:
      overrides.prettyLogs ?? flag(env.YUMKIT_PRETTY_LOGS, defaultSettings.prettyLogs),
    yumBin: overrides.yumBin ?? (env.YUMKIT_YUM_BIN || defaultSettings.yumBin),
    rpmBin: overrides.rpmBin ?? (env.YUMKIT_RPM_BIN || defaultSettings.rpmBin),
    sudo: overrides.sudo ?? flag(env.YUMKIT_SUDO, defaultSettings.sudo),
    versionsAsList:
      overrides.versionsAsList ??
      flag(env.YUMKIT_VERSIONS_AS_LIST, defaultSettings.versionsAsList),
    failOnError:
      overrides.failOnError ?? flag(env.YUMKIT_FAIL_ON_ERROR, defaultSettings.failOnError),
  };
}
