import { createShellExecutor } from '../lib/exec.js';
import { createLogger } from './logger.js';
import { detectHostFacts } from './platform.js';
import { loadSettings } from './settings.js';
import type { PackageManagerContext, Settings } from './types.js';

export interface ContextOptions {
  settings?: Partial<Settings>;
  env?: NodeJS.ProcessEnv;
}

/**
 * Wires the real host collaborators: shell executor, pino logger,
 * os-release facts and YUMKIT_* settings.
 */
export function buildContext(options: ContextOptions = {}): PackageManagerContext {
  const settings = loadSettings(options.env ?? process.env, options.settings);
  const logger = createLogger({ pretty: settings.prettyLogs, verbose: settings.verbose });
  return {
    executor: createShellExecutor({ stream: settings.verbose }),
    queryExecutor: createShellExecutor(),
    host: detectHostFacts(),
    logger,
    settings,
  };
}
