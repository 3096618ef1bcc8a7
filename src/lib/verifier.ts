/**
 * Shutdown Verifier: waits the settle interval, re-scans and probes.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { locateProcesses } from './process_locator.js';
import { probeDatabase } from './db_probe.js';
import type { PatternSet } from '../types/config.js';
import type { ProcessHandle, ProcessHost } from '../types/process.js';
import type { ProbeResult, VerificationResult } from '../types/stop.js';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

export interface VerifyOptions {
  patterns: PatternSet;
  dbPath: string;
  settleMs: number;
  sleep?: Sleep;
  probe?: (dbPath: string) => Promise<ProbeResult>;
}

export async function verifyShutdown(host: ProcessHost, options: VerifyOptions): Promise<VerificationResult> {
  const sleep = options.sleep ?? defaultSleep;
  const probe = options.probe ?? probeDatabase;

  if (options.settleMs > 0) {
    await sleep(options.settleMs);
  }

  let remaining: ProcessHandle[] = [];
  let scanError: string | undefined;
  try {
    remaining = await locateProcesses(host, options.patterns);
  } catch (error) {
    scanError = error instanceof Error ? error.message : String(error);
  }

  const result: VerificationResult = { remaining, probe: await probe(options.dbPath) };
  if (scanError) result.scan_error = scanError;
  return result;
}

/**
 * A pass is verified when the re-scan worked and found nothing, and the probe
 * did not find the database locked. An unreadable file holds no lock.
 */
export function isVerified(result: VerificationResult): boolean {
  return result.remaining.length === 0 && !result.scan_error && result.probe.status !== 'locked';
}
