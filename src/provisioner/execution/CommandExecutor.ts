import { spawn } from 'node:child_process';

import type { CommandResult, CommandRunOptions, CommandRunner } from '../shared/types.js';

/**
 * Runs external tools one at a time and captures their output.
 */
export class CommandExecutor implements CommandRunner {
  private readonly timeoutMs: number;

  /**
   * A timeout of 0 lets commands run until they exit.
   */
  constructor(options: { timeoutMs?: number } = {}) {
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  /**
   * Runs a command without a shell. Spawn failures (e.g. ENOENT) resolve with
   * `exitCode: null` and the error message instead of rejecting.
   */
  run(command: string, args: string[], options: CommandRunOptions = {}): Promise<CommandResult> {
    const hooks = options.hooks ?? {};
    return new Promise<CommandResult>((resolve) => {
      const child = spawn(command, args, {
        cwd: options.cwd || process.cwd(),
        env: process.env,
        shell: false,
        windowsHide: true
      });

      let stdout = '';
      let stderr = '';
      let finished = false;
      let timedOut = false;

      const timeoutId =
        this.timeoutMs > 0
          ? setTimeout(() => {
              timedOut = true;
              child.kill();
            }, this.timeoutMs)
          : null;

      const finish = (exitCode: number | null, error: string | null) => {
        if (finished) {
          return;
        }
        finished = true;
        if (timeoutId) {
          clearTimeout(timeoutId);
        }
        resolve({
          command,
          arguments: args,
          exitCode: timedOut ? null : exitCode,
          stdout,
          stderr,
          timedOut,
          error
        });
      };

      child.stdout.on('data', (chunk: Buffer) => {
        const text = chunk.toString();
        stdout += text;
        hooks.onStdout?.(text);
      });

      child.stderr.on('data', (chunk: Buffer) => {
        const text = chunk.toString();
        stderr += text;
        hooks.onStderr?.(text);
      });

      child.on('error', (error) => {
        finish(null, error.message);
      });

      child.on('close', (code) => {
        finish(code, timedOut ? `Command "${command}" timed out.` : null);
      });
    });
  }
}

export function succeeded(result: CommandResult): boolean {
  return !result.timedOut && result.error === null && result.exitCode === 0;
}
