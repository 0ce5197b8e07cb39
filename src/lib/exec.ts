import { exec as nodeExec, spawn } from 'node:child_process';
import { promisify } from 'node:util';

import type { CommandExecutor, CommandResult } from '../core/types.js';

const execAsync = promisify(nodeExec);

export interface RunCommandOptions {
  cwd?: string;
  /** Echo output to this process's stdout/stderr while capturing it. */
  stream?: boolean;
}

function exitResult(error: unknown): CommandResult | undefined {
  if (!(error instanceof Error) || !('code' in error) || typeof error.code !== 'number') {
    return undefined;
  }
  const stdout = 'stdout' in error && typeof error.stdout === 'string' ? error.stdout : '';
  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : '';
  return { stdout: stdout.trim(), stderr: stderr.trim(), code: error.code };
}

function streamCommand(command: string, options: RunCommandOptions): Promise<CommandResult> {
  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn('/bin/sh', ['-c', command], {
      cwd: options.cwd,
      env: process.env,
    });
    let stdoutBuf = '';
    let stderrBuf = '';
    child.stdout.on('data', (data: Buffer) => {
      const text = data.toString();
      stdoutBuf += text;
      process.stdout.write(text);
    });
    child.stderr.on('data', (data: Buffer) => {
      const text = data.toString();
      stderrBuf += text;
      process.stderr.write(text);
    });
    child.on('error', (err) => reject(err));
    child.on('close', (code) =>
      resolve({ stdout: stdoutBuf.trim(), stderr: stderrBuf.trim(), code: code ?? 1 }),
    );
  });
}

/**
 * Runs a shell command and captures its output. A non-zero exit status is
 * returned in the result; only a failure to start the shell rejects.
 */
export async function runCommand(
  command: string,
  options: RunCommandOptions = {},
): Promise<CommandResult> {
  if (options.stream) {
    return streamCommand(command, options);
  }

  try {
    const { stdout, stderr } = await execAsync(command, {
      cwd: options.cwd,
      env: process.env,
      shell: '/bin/sh',
      maxBuffer: 10 * 1024 * 1024, // rpm -qa on a full system is large
    });
    return { stdout: stdout.trim(), stderr: stderr.trim(), code: 0 };
  } catch (error) {
    const result = exitResult(error);
    if (result) return result;
    throw error;
  }
}

export function createShellExecutor(options: RunCommandOptions = {}): CommandExecutor {
  return {
    run: (command) => runCommand(command, options),
  };
}
