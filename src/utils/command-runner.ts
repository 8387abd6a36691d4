/**
 * Host command execution.
 *
 * Every external program the deployer touches (tar, pm2, nginx, package
 * managers, cleanup commands) runs through a CommandRunner so the drivers can
 * be exercised in tests with a scripted fake.
 */

import { execa } from 'execa';

export interface CommandOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
}

export interface CommandResult {
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  /** Set when the process could not be spawned or was killed */
  failureMessage?: string;
}

export type CommandRunner = (
  file: string,
  args: readonly string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Default runner backed by execa. Never rejects on a non-zero exit; callers
 * inspect `exitCode`.
 */
export const execaRunner: CommandRunner = async (file, args, options = {}) => {
  const startedAt = Date.now();
  const result = await execa(file, [...args], {
    cwd: options.cwd,
    env: options.env,
    timeout: options.timeoutMs,
    reject: false,
    stripFinalNewline: true,
  });

  return {
    command: [file, ...args].join(' '),
    exitCode: typeof result.exitCode === 'number' ? result.exitCode : 1,
    stdout: typeof result.stdout === 'string' ? result.stdout : '',
    stderr: typeof result.stderr === 'string' ? result.stderr : '',
    durationMs: Date.now() - startedAt,
    failureMessage: result.failed && result.exitCode === undefined ? result.shortMessage : undefined,
  };
};

/**
 * Last few lines of combined output, for error messages.
 */
export function summarizeOutput(result: CommandResult, maxLines = 5): string {
  const combined = [result.stderr, result.stdout, result.failureMessage]
    .filter((part): part is string => typeof part === 'string' && part.trim().length > 0)
    .join('\n')
    .trim();
  if (combined.length === 0) {
    return `exit code ${result.exitCode}`;
  }
  return combined.split('\n').slice(-maxLines).join('\n');
}
