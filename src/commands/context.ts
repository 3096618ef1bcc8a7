/**
 * Everything a command needs from the outside world, injectable for tests.
 */

import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { createSystemHost } from '../lib/host.js';
import { createStepLogger, type StepLogger } from '../lib/log.js';
import { runCommand, type CommandRunner } from '../lib/exec.js';
import type { Sleep } from '../lib/verifier.js';
import type { StackConfig } from '../types/config.js';
import type { ProcessHost } from '../types/process.js';
import type { ProbeResult } from '../types/stop.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
/** 128 + SIGINT */
export const EXIT_INTERRUPTED = 130;

export interface CommandContext {
  config: StackConfig;
  host: ProcessHost;
  log: StepLogger;
  run: CommandRunner;
  /** Raw output for `--json` */
  print: (text: string) => void;
  /** Whether the operator can answer a prompt */
  interactive: boolean;
  confirm: (question: string) => Promise<boolean>;
  signal?: AbortSignal;
  sleep?: Sleep;
  probe?: (dbPath: string) => Promise<ProbeResult>;
  now?: () => Date;
}

/**
 * Asks a yes/no question on the terminal. Anything but y/yes is a no.
 */
export async function confirmOnTerminal(question: string): Promise<boolean> {
  if (!input.isTTY) return false;
  const rl = readline.createInterface({ input, output });
  try {
    const answer = (await rl.question(`${question} [y/N]: `)).trim().toLowerCase();
    return answer === 'y' || answer === 'yes';
  } finally {
    rl.close();
  }
}

export function createCommandContext(config: StackConfig, overrides: Partial<CommandContext> = {}): CommandContext {
  return {
    config,
    host: createSystemHost({ timeoutMs: config.command_timeout_ms }),
    log: createStepLogger(),
    run: runCommand,
    print: (text) => process.stdout.write(`${text}\n`),
    interactive: Boolean(input.isTTY),
    confirm: confirmOnTerminal,
    ...overrides,
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * `du -h` style size: 512B, 1.5K, 20M, 3.1G.
 */
export function formatSize(bytes: number): string {
  const units = ['B', 'K', 'M', 'G', 'T'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  if (unit === 0) return `${bytes}B`;
  return `${value < 10 ? value.toFixed(1) : Math.round(value)}${units[unit]}`;
}
