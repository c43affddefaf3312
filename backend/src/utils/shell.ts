import { execFile } from 'node:child_process';

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
}

export class CommandNotFoundError extends Error {
  constructor(readonly command: string) {
    super(`Command not found: ${command}`);
    this.name = 'CommandNotFoundError';
  }
}

/**
 * Runs a command to completion and reports how it ended. A non-zero exit or a
 * timeout resolves normally; only a failure to start the process rejects.
 */
export function runProcess(
  command: string,
  args: string[],
  cwd: string,
  timeoutMs: number,
): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      { cwd, timeout: timeoutMs, maxBuffer: 1024 * 1024 * 20, encoding: 'utf8' },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0, timedOut: false });
          return;
        }

        if (error.code === 'ENOENT') {
          reject(new CommandNotFoundError(command));
          return;
        }

        if (typeof error.code === 'string') {
          reject(new Error(`${command} ${args.join(' ')} failed: ${error.message}`));
          return;
        }

        resolve({
          stdout,
          stderr,
          exitCode: typeof error.code === 'number' ? error.code : null,
          timedOut: error.killed === true,
        });
      },
    );
  });
}
