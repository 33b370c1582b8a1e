import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { CallOptions } from '../../interfaces/storage';

const execFileAsync = promisify(execFile);

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

/**
 * Runs an external tool with an explicit argument array (no shell). The
 * child is killed when `options.signal` aborts.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: CallOptions,
) => Promise<CommandOutput>;

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export const runCommand: CommandRunner = async (command, args, options = {}) => {
  const { stdout, stderr } = await execFileAsync(command, [...args], {
    encoding: 'utf8',
    maxBuffer: MAX_OUTPUT_BYTES,
    signal: options.signal,
  });
  return { stdout, stderr };
};

/**
 * The tool's own diagnostics when it failed, otherwise the error message.
 */
export function commandFailureMessage(error: unknown): string {
  if (error instanceof Error) {
    const stderr: unknown = Reflect.get(error, 'stderr');
    if (typeof stderr === 'string' && stderr.trim() !== '') {
      return stderr.trim();
    }
    return error.message;
  }
  return String(error);
}
