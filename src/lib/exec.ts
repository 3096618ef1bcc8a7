/**
 * Child process helper. Commands run without a shell, argv only.
 */

import { spawn, type ChildProcess } from 'node:child_process';

export interface SpawnResult {
  /** Exit code 0 and no spawn error */
  ok: boolean;
  code: number | null;
  stdout: string;
  stderr: string;
  /** Spawn failure message (binary missing, permission denied, timeout) */
  error?: string;
  /** errno code of the spawn failure, e.g. ENOENT */
  errorCode?: string;
  timedOut?: boolean;
}

export interface RunOptions {
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Runs a command to completion. Never rejects: failures are described in the
 * result so callers can classify them.
 */
export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<SpawnResult>;

const DEFAULT_TIMEOUT_MS = 10_000;

export const runCommand: CommandRunner = async (command, args, options = {}) => {
  return await new Promise<SpawnResult>((resolve) => {
    let child: ChildProcess;
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let timedOut = false;

    try {
      child = spawn(command, args, {
        shell: false,
        stdio: ['ignore', 'pipe', 'pipe'],
        env: options.env,
        cwd: options.cwd,
      });
    } catch (error) {
      resolve({
        ok: false,
        code: null,
        stdout: '',
        stderr: '',
        error: error instanceof Error ? error.message : String(error),
      });
      return;
    }

    child.stdout?.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    const timeout = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);

    let settled = false;
    const finish = (result: SpawnResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      resolve(result);
    };

    child.on('error', (error: NodeJS.ErrnoException) => {
      finish({
        ok: false,
        code: null,
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: Buffer.concat(stderrChunks).toString('utf-8'),
        error: error.message,
        errorCode: error.code,
      });
    });

    child.on('close', (code: number | null) => {
      const stdout = Buffer.concat(stdoutChunks).toString('utf-8');
      const stderr = Buffer.concat(stderrChunks).toString('utf-8');
      if (timedOut) {
        finish({ ok: false, code, stdout, stderr, error: `${command} timed out`, errorCode: 'ETIMEDOUT', timedOut: true });
        return;
      }
      finish({ ok: code === 0, code, stdout, stderr });
    });
  });
};

/**
 * One-line description of a failed command for log messages.
 */
export function describeFailure(command: string, result: SpawnResult): string {
  if (result.error) return `${command}: ${result.error}`;
  const detail = result.stderr.trim().split('\n').filter(Boolean).slice(-3).join(' | ');
  return detail ? `${command} exited with code ${result.code}: ${detail}` : `${command} exited with code ${result.code}`;
}
