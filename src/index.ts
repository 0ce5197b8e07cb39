/**
 * Public API: yum package manager, the pieces it is built from, and the
 * host wiring used by the CLI.
 */
export * from "./core/types.js";
export * from "./core/errors.js";
export * from "./core/logger.js";
export * from "./core/settings.js";
export * from "./core/platform.js";
export * from "./core/context.js";
export * from "./core/version.js";
export * from "./core/listing-parser.js";
export * from "./core/command-composer.js";
export * from "./core/snapshot.js";
export * from "./core/state-comparison.js";
export * from "./core/targets.js";
export * from "./core/package-manager.js";
export * from "./lib/exec.js";
export * from "./modules/packages/yum.js";
