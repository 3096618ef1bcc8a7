/**
 * Doctor checks for the tools stackctl shells out to.
 */

import { runCommand, type CommandRunner } from './exec.js';
import { serverBinary } from './backup.js';
import type { BackendKind, StackConfig } from '../types/config.js';

/**
 * Result of one tool check.
 */
export interface ToolCheck {
  /** Tool name as shown to the operator */
  name: string;
  /** Binary that was executed */
  command: string;
  /** Whether a missing tool makes `doctor` fail */
  required: boolean;
  available: boolean;
  /** First line of the version output, if any */
  version?: string;
  /** Failure detail when not available */
  details?: string;
}

export interface DoctorReport {
  ok: boolean;
  active_backend: BackendKind;
  checks: ToolCheck[];
}

interface ToolSpec {
  name: string;
  command: string;
  args: string[];
  required: boolean;
}

function firstLine(text: string): string | undefined {
  const line = text.split('\n').map((part) => part.trim()).find(Boolean);
  return line || undefined;
}

/**
 * Runs the tool once. A tool counts as available when it could be executed at
 * all; `lsof -v` for one exits non-zero on some platforms.
 */
export async function checkTool(spec: ToolSpec, run: CommandRunner = runCommand, timeoutMs = 5000): Promise<ToolCheck> {
  const result = await run(spec.command, spec.args, { timeoutMs });
  const base = { name: spec.name, command: spec.command, required: spec.required };

  if (result.errorCode === 'ENOENT') {
    return { ...base, available: false, details: `${spec.command} not found on PATH` };
  }
  if (result.error) {
    return { ...base, available: false, details: result.error };
  }

  const version = firstLine(result.stdout) ?? firstLine(result.stderr);
  return version ? { ...base, available: true, version } : { ...base, available: true };
}

/**
 * Checks ps and lsof always, pg_dump and psql for the server backend. The
 * server tools are required only while the server backend is active.
 */
export async function runDoctor(
  config: StackConfig,
  activeBackend: BackendKind,
  run: CommandRunner = runCommand
): Promise<DoctorReport> {
  const serverRequired = activeBackend === 'server';
  const specs: ToolSpec[] = [
    { name: 'ps', command: 'ps', args: ['-o', 'pid=', '-p', String(process.pid)], required: true },
    { name: 'lsof', command: 'lsof', args: ['-v'], required: true },
    { name: 'pg_dump', command: serverBinary(config.server, 'pg_dump'), args: ['--version'], required: serverRequired },
    { name: 'psql', command: serverBinary(config.server, 'psql'), args: ['--version'], required: serverRequired },
  ];

  const checks: ToolCheck[] = [];
  for (const spec of specs) {
    checks.push(await checkTool(spec, run, config.command_timeout_ms));
  }

  return {
    ok: checks.every((check) => check.available || !check.required),
    active_backend: activeBackend,
    checks,
  };
}
