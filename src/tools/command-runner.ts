/**
 * Child-process runner for the external tools.
 *
 * Spawns a program with an argument vector (no shell), captures its
 * exit status and output, and optionally streams stdout straight into
 * a file for tools whose report is their standard output.
 *
 * @module tools/command-runner
 */

import { spawn } from 'node:child_process';
import { createWriteStream } from 'node:fs';

/** Exit status and captured output of one tool invocation. */
export interface CommandResult {
  /** Process exit code; -1 when the process was killed by a signal. */
  exitCode: number;
  /** Captured stdout; empty when stdout was written to `stdoutPath`. */
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  cwd?: string;
  /** Write stdout to this file instead of capturing it. */
  stdoutPath?: string;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: RunCommandOptions,
) => Promise<CommandResult>;

/**
 * Thrown when an external tool cannot be started at all.
 *
 * This is a configuration problem, not a per-AIP failure, so it ends
 * the batch.
 */
export class ToolNotFoundError extends Error {
  constructor(public readonly command: string) {
    super(`External tool not found: ${command}. Check the tools section of the config.`);
    this.name = 'ToolNotFoundError';
  }
}

/**
 * Run `command` with `args` and wait for it to exit.
 *
 * Resolves with the exit status whatever it is; rejects only when the
 * program cannot be spawned or the stdout file cannot be written.
 */
export const runCommand: CommandRunner = (command, args, options = {}) =>
  new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let exitCode = -1;
    let childClosed = false;
    let sinkClosed = options.stdoutPath === undefined;
    let sinkError: Error | undefined;

    const settle = (): void => {
      if (!childClosed || !sinkClosed) return;
      if (sinkError) {
        reject(sinkError);
      } else {
        resolve({ exitCode, stdout, stderr });
      }
    };

    if (options.stdoutPath !== undefined) {
      const sink = createWriteStream(options.stdoutPath);
      sink.on('error', (err) => {
        sinkError = err;
        sinkClosed = true;
        settle();
      });
      sink.on('close', () => {
        sinkClosed = true;
        settle();
      });
      child.stdout.pipe(sink);
    } else {
      child.stdout.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });
    }

    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on('error', (err: NodeJS.ErrnoException) => {
      reject(err.code === 'ENOENT' ? new ToolNotFoundError(command) : err);
    });

    child.on('close', (code: number | null) => {
      exitCode = code ?? -1;
      childClosed = true;
      settle();
    });
  });
