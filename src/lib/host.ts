/**
 * ProcessHost backed by ps, lsof and process.kill.
 */

import { describeFailure, runCommand, type CommandRunner } from './exec.js';
import { errnoCode } from './fs.js';
import type { PidLookup, ProcessHost, ProcessInfo, SignalOutcome } from '../types/process.js';

/**
 * Parses `ps -o pid=,args=` output into rows. Lines that do not start with a
 * PID are skipped.
 */
export function parsePsOutput(output: string): ProcessInfo[] {
  const rows: ProcessInfo[] = [];
  for (const line of output.split('\n')) {
    const match = line.match(/^\s*(\d+)\s+(.*\S)\s*$/);
    if (!match) continue;
    const pid = Number.parseInt(match[1], 10);
    if (pid > 0) rows.push({ pid, command: match[2] });
  }
  return rows;
}

/**
 * Parses `lsof -t` output (one PID per line) into unique PIDs.
 */
export function parseLsofPids(output: string): number[] {
  const pids: number[] = [];
  for (const line of output.split('\n')) {
    const token = line.trim();
    if (!/^\d+$/.test(token)) continue;
    const pid = Number.parseInt(token, 10);
    if (pid > 0 && !pids.includes(pid)) pids.push(pid);
  }
  return pids;
}

/**
 * Turns an lsof result into a lookup.
 *
 * lsof exits 1 both when nothing matched and when it failed, so the exit code
 * alone is not enough: privilege problems show up on stderr.
 */
export function interpretLsof(result: Awaited<ReturnType<CommandRunner>>, target: string): PidLookup {
  if (result.errorCode === 'ENOENT') {
    return { pids: [], warning: `lsof is not installed; cannot inspect ${target}` };
  }
  if (result.error) {
    return { pids: [], warning: `Could not inspect ${target}: ${describeFailure('lsof', result)}` };
  }

  const pids = parseLsofPids(result.stdout);
  const stderr = result.stderr.toLowerCase();
  if (stderr.includes('permission denied') || stderr.includes('operation not permitted')) {
    return {
      pids,
      warning: `Insufficient privilege to see every process using ${target}; re-run with elevated privileges for a complete scan`,
    };
  }
  if (result.code !== 0 && result.code !== 1) {
    return { pids, warning: `Could not inspect ${target}: ${describeFailure('lsof', result)}` };
  }
  return { pids };
}

/**
 * Delivers a signal, mapping the two expected races to outcomes.
 */
export function deliverSignal(pid: number, signal: NodeJS.Signals, kill: typeof process.kill = process.kill): SignalOutcome {
  try {
    kill(pid, signal);
    return 'sent';
  } catch (error) {
    const code = errnoCode(error);
    if (code === 'ESRCH') return 'gone';
    if (code === 'EPERM') return 'denied';
    throw error;
  }
}

export interface SystemHostOptions {
  run?: CommandRunner;
  timeoutMs?: number;
}

export function createSystemHost(options: SystemHostOptions = {}): ProcessHost {
  const run = options.run ?? runCommand;
  const timeoutMs = options.timeoutMs;

  return {
    async listProcesses() {
      // "ax" lists every process, "ww" keeps long command lines intact.
      const result = await run('ps', ['axww', '-o', 'pid=,args='], { timeoutMs });
      if (!result.ok) {
        throw new Error(`Cannot list processes: ${describeFailure('ps', result)}`);
      }
      return parsePsOutput(result.stdout);
    },

    async findListeners(port) {
      const result = await run('lsof', ['-nP', '-t', `-iTCP:${port}`, '-sTCP:LISTEN'], { timeoutMs });
      return interpretLsof(result, `port ${port}`);
    },

    async findFileHolders(path) {
      const result = await run('lsof', ['-t', '--', path], { timeoutMs });
      return interpretLsof(result, path);
    },

    signal(pid, signal) {
      return deliverSignal(pid, signal);
    },

    protectedPids() {
      return [process.pid, process.ppid];
    },
  };
}
