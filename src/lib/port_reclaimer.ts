/**
 * Port Reclaimer: frees the application's ports with SIGKILL.
 *
 * There is no grace period here; the caller wants everything stopped now.
 */

import type { PortBinding, ProcessHost } from '../types/process.js';
import type { PortReclaimResult } from '../types/stop.js';

export async function reclaimPorts(host: ProcessHost, ports: number[]): Promise<PortReclaimResult> {
  const bindings: PortBinding[] = [];
  const warnings: string[] = [];
  const protectedPids = host.protectedPids();
  const signaled = new Set<number>();
  let killed = 0;

  for (const port of ports) {
    const lookup = await host.findListeners(port);
    if (lookup.warning) warnings.push(lookup.warning);

    const pids = lookup.pids.filter((pid) => !protectedPids.includes(pid));
    if (pids.length === 0) {
      bindings.push({ port, pids: [], status: 'free' });
      continue;
    }

    let failed = false;
    for (const pid of pids) {
      // Several ports can share one process; signal it once.
      if (signaled.has(pid)) continue;
      const outcome = host.signal(pid, 'SIGKILL');
      if (outcome === 'sent') {
        signaled.add(pid);
        killed++;
      } else if (outcome === 'gone') {
        warnings.push(`PID ${pid} on port ${port} exited before it could be killed`);
      } else {
        failed = true;
        warnings.push(`Not permitted to kill PID ${pid} on port ${port}`);
      }
    }

    bindings.push({ port, pids, status: failed ? 'failed' : 'reclaimed' });
  }

  return { bindings, killed, warnings };
}
