import {
  buildCheckUpdateCommand,
  buildCleanCommand,
  buildInstallCommand,
  buildInstalledQueryCommand,
  buildListAvailableCommand,
  buildRemoveCommand,
  buildRepoArgs,
  buildUpgradeCommand,
} from './command-composer.js';
import { PackageCommandError, TargetError } from './errors.js';
import { parseListing, recordsToVersions } from './listing-parser.js';
import { isApplicable } from './platform.js';
import { isTrue } from './settings.js';
import { latestInstalled, parseInstalledQuery, versionString } from './snapshot.js';
import { diffChanges, diffRemoved } from './state-comparison.js';
import { parseTargets } from './targets.js';
import { compare, compareVersions, type Ordering } from './version.js';
import type {
  ChangeSet,
  CommandExecutor,
  CommandResult,
  InstallMode,
  InstallOptions,
  InstallTarget,
  InstalledSnapshot,
  PackageManagerContext,
  ParsedTargets,
  RepoOptions,
} from './types.js';

export interface PackageManagerConfig {
  name: string;
  command: string;
  queryCommand: string;
  requiresSudo?: boolean;
  /** Exit statuses of the update check that are not failures. */
  checkUpdateCodes: number[];
}

export interface PackageManagerOptions {
  id: string;
  description?: string;
}

interface ExecuteOptions {
  mutating?: boolean;
  okCodes?: number[];
}

export interface InstallPlan {
  install: InstallTarget[];
  downgrade: InstallTarget[];
}

/**
 * Runs package operations against an RPM-based host and reports what
 * changed by diffing installed-package snapshots taken around each run.
 *
 * Every external invocation is awaited before the next one starts.
 */
export abstract class PackageManager {
  protected abstract readonly config: PackageManagerConfig;

  public readonly id: string;
  public readonly description?: string;

  constructor(
    options: PackageManagerOptions,
    protected readonly ctx: PackageManagerContext,
  ) {
    this.id = options.id;
    this.description = options.description;
  }

  isApplicable(): boolean {
    return isApplicable(this.ctx.host);
  }

  private get queryExecutor(): CommandExecutor {
    return this.ctx.queryExecutor ?? this.ctx.executor;
  }

  /** Tool invocation prefix for commands that modify the system. */
  protected get mutatingTool(): string {
    const sudo = this.config.requiresSudo || this.ctx.settings.sudo;
    return sudo ? `sudo ${this.config.command}` : this.config.command;
  }

  protected logProgress(message: string, fields: Record<string, unknown> = {}): void {
    this.ctx.logger.info({ module: this.id, ...fields }, message);
  }

  protected async execute(
    command: string,
    options: ExecuteOptions = {},
    executor: CommandExecutor = this.ctx.executor,
  ): Promise<CommandResult> {
    this.ctx.logger.debug({ module: this.id, command }, 'Running command');
    const result = await executor.run(command);
    const okCodes = options.okCodes ?? [0];

    if (!okCodes.includes(result.code)) {
      if (options.mutating) {
        this.ctx.logger.warn(
          { module: this.id, command, code: result.code, stderr: result.stderr },
          `${this.config.name} exited with status ${result.code}`,
        );
        if (this.ctx.settings.failOnError) {
          throw new PackageCommandError(command, result);
        }
      } else {
        this.ctx.logger.debug(
          { module: this.id, command, code: result.code },
          'Query exited non-zero',
        );
      }
    }
    return result;
  }

  /**
   * Installed packages from the RPM database. Diffs use the scalar form;
   * pass `versionsAsList` for every installed version of a name.
   */
  async snapshot(options: { versionsAsList?: boolean } = {}): Promise<InstalledSnapshot> {
    const { stdout } = await this.execute(
      buildInstalledQueryCommand(this.config.queryCommand),
      {},
      this.queryExecutor,
    );
    return parseInstalledQuery(stdout, {
      cpuArch: this.ctx.host.cpuArch,
      versionsAsList: options.versionsAsList,
    });
  }

  async listInstalled(versionsAsList: unknown = this.ctx.settings.versionsAsList): Promise<InstalledSnapshot> {
    return this.snapshot({ versionsAsList: isTrue(versionsAsList) });
  }

  /**
   * Installed version per name, `""` for names that are not installed.
   */
  async installedVersions(names: string[]): Promise<Record<string, string>> {
    if (names.length === 0) return {};
    const installed = await this.snapshot();
    return Object.fromEntries(names.map((name) => [name, versionString(installed[name])]));
  }

  async installedVersion(name: string): Promise<string> {
    const versions = await this.installedVersions([name]);
    return versions[name] ?? '';
  }

  /**
   * Newest version available for install or upgrade per name; `""` when
   * the repositories offer nothing newer than what is installed.
   */
  async latestVersions(names: string[], repo: RepoOptions = {}): Promise<Record<string, string>> {
    if (names.length === 0) return {};

    const result: Record<string, string> = Object.fromEntries(names.map((name) => [name, '']));
    const repoArgs = buildRepoArgs(repo, this.ctx.logger);
    const { stdout } = await this.execute(
      buildListAvailableCommand(this.config.command, names, repoArgs),
    );
    return { ...result, ...recordsToVersions(parseListing(stdout)) };
  }

  async latestVersion(name: string, repo: RepoOptions = {}): Promise<string> {
    const versions = await this.latestVersions([name], repo);
    return versions[name] ?? '';
  }

  /**
   * True when the repositories list any available version of the package.
   * The listed version is not compared against the installed one.
   */
  async isUpgradeAvailable(name: string): Promise<boolean> {
    return (await this.latestVersion(name)) !== '';
  }

  async listUpgrades(refresh: unknown = true): Promise<Record<string, string>> {
    if (isTrue(refresh)) {
      await this.refresh();
    }
    const { stdout } = await this.execute(buildCheckUpdateCommand(this.config.command), {
      okCodes: this.config.checkUpdateCodes,
    });
    return recordsToVersions(parseListing(stdout));
  }

  /**
   * Cleans the tool's metadata cache so the next operation re-reads it.
   */
  async refresh(): Promise<true> {
    this.logProgress(`Cleaning ${this.config.name} metadata cache`);
    await this.execute(buildCleanCommand(this.mutatingTool), { mutating: true });
    return true;
  }

  /**
   * Splits pinned repository targets by the installed version: older or
   * absent goes to install; equal, newer or not comparable goes to
   * downgrade.
   */
  planInstall(targets: ParsedTargets, installed: InstalledSnapshot): InstallPlan {
    const plan: InstallPlan = { install: [], downgrade: [] };

    for (const [name, value] of Object.entries(targets.params)) {
      if (targets.kind === 'file' || value === null) {
        plan.install.push({ name: value ?? name, version: null });
        continue;
      }

      const current = latestInstalled(installed[name]);
      if (current === undefined) {
        plan.install.push({ name, version: value });
        continue;
      }

      const order: Ordering | undefined = compareVersions(current, value);
      if (order !== undefined && order < 0) {
        plan.install.push({ name, version: value });
      } else {
        plan.downgrade.push({ name, version: value });
      }
    }

    return plan;
  }

  private resolveTargets(options: InstallOptions): ParsedTargets | undefined {
    const parsed = parseTargets(options);
    if (!parsed || !options.version) return parsed;

    if (options.pkgs == null && options.sources == null && options.name) {
      return { kind: 'repository', params: { [options.name]: options.version } };
    }
    this.ctx.logger.warn(
      { module: this.id, version: options.version },
      '"version" parameter will be ignored for multiple package targets',
    );
    return parsed;
  }

  private async runInstall(
    mode: InstallMode,
    targets: InstallTarget[],
    repoArgs: string,
    skipVerify: boolean,
  ): Promise<void> {
    if (targets.length === 0) return;
    this.logProgress(`Running ${mode} of ${targets.length} package(s)`, {
      targets: targets.map((target) => target.name),
    });
    await this.execute(
      buildInstallCommand({
        tool: this.mutatingTool,
        targets,
        cpuArch: this.ctx.host.cpuArch,
        repoArgs,
        skipVerify,
        mode,
      }),
      { mutating: true },
    );
  }

  /**
   * Installs the requested packages and returns what changed. Returns `{}`
   * without touching the system when no target can be resolved.
   */
  async install(options: InstallOptions = {}): Promise<ChangeSet> {
    if (isTrue(options.refresh)) {
      await this.refresh();
    }

    let targets: ParsedTargets | undefined;
    try {
      targets = this.resolveTargets(options);
    } catch (error) {
      if (error instanceof TargetError) {
        this.ctx.logger.error({ module: this.id, err: error }, error.message);
        return {};
      }
      throw error;
    }
    if (!targets || Object.keys(targets.params).length === 0) {
      return {};
    }

    const repoArgs = buildRepoArgs(options, this.ctx.logger);
    const before = await this.snapshot();
    const plan = this.planInstall(targets, before);

    await this.runInstall('install', plan.install, repoArgs, Boolean(options.skipVerify));
    await this.runInstall('downgrade', plan.downgrade, repoArgs, Boolean(options.skipVerify));

    const after = await this.snapshot();
    return diffChanges(before, after);
  }

  /**
   * Full system upgrade. Reports version bumps and newly pulled-in packages.
   */
  async upgrade(refresh: unknown = true): Promise<ChangeSet> {
    if (isTrue(refresh)) {
      await this.refresh();
    }
    const before = await this.snapshot();
    this.logProgress(`Upgrading all ${this.config.name} packages`);
    await this.execute(buildUpgradeCommand(this.mutatingTool), { mutating: true });
    const after = await this.snapshot();
    return diffChanges(before, after);
  }

  async remove(names: string | string[]): Promise<string[]> {
    const targets = (Array.isArray(names) ? names : [names]).filter(Boolean);
    if (targets.length === 0) return [];

    const before = await this.snapshot();
    this.logProgress(`Removing ${targets.length} package(s)`, { targets });
    await this.execute(buildRemoveCommand(this.mutatingTool, targets), { mutating: true });
    const after = await this.snapshot();
    return diffRemoved(before, after);
  }

  /** No separate purge exists; same as {@link remove}. */
  async purge(names: string | string[]): Promise<string[]> {
    return this.remove(names);
  }

  compareVersions(a: string, b: string): Ordering | undefined {
    return compareVersions(a, b);
  }

  compare(a: string, operator: string, b: string): boolean {
    return compare(a, operator, b, this.ctx.logger);
  }
}
