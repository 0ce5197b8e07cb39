import type { CommandResult } from "./types.js";

/**
 * A package-tool invocation exited non-zero while `failOnError` was set.
 */
export class PackageCommandError extends Error {
  readonly command: string;
  readonly code: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(command: string, result: CommandResult) {
    super(`Command failed with exit code ${result.code}: ${command}`);
    this.name = "PackageCommandError";
    this.command = command;
    this.code = result.code;
    this.stdout = result.stdout;
    this.stderr = result.stderr;
  }
}

/**
 * Install targets or repository options that cannot be interpreted.
 */
export class TargetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TargetError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
