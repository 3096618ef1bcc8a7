import { describe, it, expect } from 'vitest';
import { reclaimPorts } from '@/lib/port_reclaimer.js';
import { FakeHost, SELF_PID } from '../helpers/mocks.js';

describe('reclaimPorts', () => {
  it('should kill listeners on busy ports and report free ports', async () => {
    // 3000 free, 3001 held by one dev server, 3002 held by two processes
    const host = new FakeHost().listen(3001, 501).listen(3002, 502, 503);

    const result = await reclaimPorts(host, [3000, 3001, 3002]);

    expect(result.bindings).toEqual([
      { port: 3000, pids: [], status: 'free' },
      { port: 3001, pids: [501], status: 'reclaimed' },
      { port: 3002, pids: [502, 503], status: 'reclaimed' },
    ]);
    expect(result.killed).toBe(3);
    expect(host.signalsFor('SIGKILL')).toEqual([501, 502, 503]);
    expect(result.warnings).toEqual([]);
  });

  it('should leave no listener on any configured port afterwards', async () => {
    const host = new FakeHost().listen(3000, 1).listen(3001, 2).listen(3002, 3);

    await reclaimPorts(host, [3000, 3001, 3002]);

    for (const port of [3000, 3001, 3002]) {
      expect((await host.findListeners(port)).pids).toEqual([]);
    }
  });

  it('should signal a process once when it listens on several ports', async () => {
    const host = new FakeHost().listen(3000, 700).listen(3001, 700);

    const result = await reclaimPorts(host, [3000, 3001]);

    expect(result.killed).toBe(1);
    expect(host.signalsFor('SIGKILL')).toEqual([700]);
    expect(result.bindings[1]).toEqual({ port: 3001, pids: [], status: 'free' });
  });

  it('should mark a port failed when the listener cannot be killed', async () => {
    const host = new FakeHost().listen(3000, 800);
    host.denied.add(800);

    const result = await reclaimPorts(host, [3000]);

    expect(result.bindings).toEqual([{ port: 3000, pids: [800], status: 'failed' }]);
    expect(result.warnings).toEqual(['Not permitted to kill PID 800 on port 3000']);
  });

  it('should never kill the controller itself', async () => {
    const host = new FakeHost().listen(3000, SELF_PID);

    const result = await reclaimPorts(host, [3000]);

    expect(result.bindings).toEqual([{ port: 3000, pids: [], status: 'free' }]);
    expect(host.signals).toEqual([]);
  });

  it('should pass lookup warnings through', async () => {
    const host = new FakeHost();
    host.listenerWarnings.set(3000, 'lsof is not installed; cannot inspect port 3000');

    const result = await reclaimPorts(host, [3000]);

    expect(result.warnings).toEqual(['lsof is not installed; cannot inspect port 3000']);
  });
});
