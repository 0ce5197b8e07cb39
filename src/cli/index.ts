#!/usr/bin/env node
import yargs, { type Argv } from 'yargs';
import { hideBin } from 'yargs/helpers';

import { errorMessage, TargetError } from '../core/errors.js';
import { parseRepoOptions } from '../core/targets.js';
import type { RepoOptions } from '../core/types.js';
import { createYumPackageManager, type YumPackageManager } from '../modules/packages/yum.js';
import {
  formatBoolean,
  formatChanges,
  formatOrdering,
  formatRemoved,
  formatVersions,
} from './format.js';

interface GlobalArgs {
  verbose?: boolean;
  json?: boolean;
  sudo?: boolean;
  'fail-on-error'?: boolean;
  'versions-as-list'?: boolean;
}

interface RepoArgs {
  fromrepo?: string;
  repo?: string;
  enablerepo?: string;
  disablerepo?: string;
}

function manager(argv: GlobalArgs): YumPackageManager {
  return createYumPackageManager({
    settings: {
      verbose: argv.verbose,
      sudo: argv.sudo,
      failOnError: argv['fail-on-error'],
      versionsAsList: argv['versions-as-list'],
    },
  });
}

function repoOptions(argv: RepoArgs): RepoOptions {
  return parseRepoOptions({
    fromRepo: argv.fromrepo,
    repo: argv.repo,
    enableRepo: argv.enablerepo,
    disableRepo: argv.disablerepo,
  });
}

function parseJsonOption(raw: string | undefined, label: string): unknown {
  if (raw === undefined) return undefined;
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new TargetError(`--${label} is not valid JSON: ${errorMessage(error)}`);
  }
}

function output(argv: GlobalArgs, value: unknown, lines: () => string[]): void {
  const text = argv.json ? JSON.stringify(value, null, 2) : lines().join('\n');
  process.stdout.write(`${text}\n`);
}

function withRepoOptions<T>(y: Argv<T>) {
  return y
    .option('fromrepo', { type: 'string', describe: 'Use only this repository' })
    .option('repo', { type: 'string', describe: 'Older spelling of --fromrepo' })
    .option('enablerepo', { type: 'string', describe: 'Enable a disabled repository' })
    .option('disablerepo', { type: 'string', describe: 'Disable an enabled repository' });
}

const cli = yargs(hideBin(process.argv))
  .scriptName('yumkit')
  .usage('$0 <cmd> [args]')
  .version(false)
  .option('verbose', { type: 'boolean', default: false, describe: 'Debug logging and live tool output' })
  .option('json', { type: 'boolean', default: false, describe: 'Print results as JSON' })
  .option('sudo', { type: 'boolean', describe: 'Run modifying commands through sudo' })
  .option('fail-on-error', { type: 'boolean', describe: 'Fail when the package tool exits non-zero' })
  .option('versions-as-list', { type: 'boolean', describe: 'Report every installed version as a list' })
  .command(
    'list',
    'List installed packages',
    (y) => y,
    async (argv) => {
      const installed = await manager(argv).listInstalled(argv['versions-as-list']);
      output(argv, installed, () => formatVersions(installed));
    },
  )
  .command(
    'version <names..>',
    'Show installed versions',
    (y) => y.positional('names', { type: 'string', array: true, demandOption: true }),
    async (argv) => {
      const versions = await manager(argv).installedVersions(argv.names);
      output(argv, versions, () => formatVersions(versions));
    },
  )
  .command(
    'latest <names..>',
    'Show the newest available versions',
    (y) => withRepoOptions(y.positional('names', { type: 'string', array: true, demandOption: true })),
    async (argv) => {
      const versions = await manager(argv).latestVersions(argv.names, repoOptions(argv));
      output(argv, versions, () => formatVersions(versions));
    },
  )
  .command(
    'upgrade-available <name>',
    'Check whether an upgrade is available',
    (y) => y.positional('name', { type: 'string', demandOption: true }),
    async (argv) => {
      const available = await manager(argv).isUpgradeAvailable(argv.name);
      output(argv, available, () => [formatBoolean(available)]);
    },
  )
  .command(
    'list-upgrades',
    'List packages with updates available',
    (y) => y.option('refresh', { type: 'boolean', default: true }),
    async (argv) => {
      const upgrades = await manager(argv).listUpgrades(argv.refresh);
      output(argv, upgrades, () => formatVersions(upgrades));
    },
  )
  .command(
    'refresh',
    'Clean the package metadata cache',
    (y) => y,
    async (argv) => {
      const refreshed = await manager(argv).refresh();
      output(argv, refreshed, () => [formatBoolean(refreshed)]);
    },
  )
  .command(
    'install [name]',
    'Install packages',
    (y) =>
      withRepoOptions(y.positional('name', { type: 'string' }))
        .option('version', { type: 'string', describe: 'Version to install (single name only)' })
        .option('pkgs', { type: 'string', describe: 'JSON list of names or {"name": "version"}' })
        .option('sources', { type: 'string', describe: 'JSON list of {"name": "path-or-uri"}' })
        .option('skip-verify', { type: 'boolean', default: false, describe: 'Skip GPG checks' })
        .option('refresh', { type: 'boolean', default: false }),
    async (argv) => {
      const changes = await manager(argv).install({
        ...repoOptions(argv),
        name: argv.name,
        version: argv.version,
        pkgs: parseJsonOption(argv.pkgs, 'pkgs'),
        sources: parseJsonOption(argv.sources, 'sources'),
        skipVerify: argv['skip-verify'],
        refresh: argv.refresh,
      });
      output(argv, changes, () => formatChanges(changes));
    },
  )
  .command(
    'upgrade',
    'Upgrade all packages',
    (y) => y.option('refresh', { type: 'boolean', default: true }),
    async (argv) => {
      const changes = await manager(argv).upgrade(argv.refresh);
      output(argv, changes, () => formatChanges(changes));
    },
  )
  .command(
    'remove <names..>',
    'Remove packages',
    (y) => y.positional('names', { type: 'string', array: true, demandOption: true }),
    async (argv) => {
      const removed = await manager(argv).remove(argv.names);
      output(argv, removed, () => formatRemoved(removed));
    },
  )
  .command(
    'purge <names..>',
    'Remove packages (yum has no separate purge)',
    (y) => y.positional('names', { type: 'string', array: true, demandOption: true }),
    async (argv) => {
      const removed = await manager(argv).purge(argv.names);
      output(argv, removed, () => formatRemoved(removed));
    },
  )
  .command(
    'compare <a> <operator> <b>',
    'Compare two versions with ==, !=, <, <=, > or >=',
    (y) =>
      y
        .positional('a', { type: 'string', demandOption: true })
        .positional('operator', { type: 'string', demandOption: true })
        .positional('b', { type: 'string', demandOption: true }),
    (argv) => {
      const result = manager(argv).compare(argv.a, argv.operator, argv.b);
      output(argv, result, () => [formatBoolean(result)]);
    },
  )
  .command(
    'cmp <a> <b>',
    'Order two versions: -1, 0 or 1',
    (y) =>
      y
        .positional('a', { type: 'string', demandOption: true })
        .positional('b', { type: 'string', demandOption: true }),
    (argv) => {
      const result = manager(argv).compareVersions(argv.a, argv.b);
      output(argv, result ?? null, () => [formatOrdering(result)]);
    },
  )
  .command(
    'applicable',
    'Check whether this host uses yum',
    (y) => y,
    (argv) => {
      const pm = manager(argv);
      const applicable = pm.isApplicable();
      output(argv, applicable, () => [formatBoolean(applicable)]);
    },
  )
  .demandCommand(1)
  .strict()
  .help();

cli.parseAsync().catch((error: unknown) => {
  process.stderr.write(`${errorMessage(error)}\n`);
  process.exitCode = 1;
});
