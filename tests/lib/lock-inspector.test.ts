import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { clearLocks, findLockHolders, lockTargets } from '@/lib/lock_inspector.js';
import { FakeHost, createTestDir, removeTestDir } from '../helpers/mocks.js';

describe('lock inspector', () => {
  let testDir: string;
  let dbPath: string;

  beforeEach(async () => {
    testDir = await createTestDir();
    dbPath = join(testDir, 'letters.db');
  });

  afterEach(async () => {
    await removeTestDir(testDir);
  });

  it('should report no lock when the database file does not exist', async () => {
    const host = new FakeHost().hold(dbPath, 42);

    const result = await clearLocks(host, dbPath);

    expect(result).toEqual({ file_present: false, holders: [], killed: 0, remaining: [], warnings: [] });
    expect(host.signals).toEqual([]);
  });

  it('should include existing sidecars as targets', async () => {
    await writeFile(dbPath, '');
    await writeFile(`${dbPath}-wal`, '');

    expect(await lockTargets(dbPath)).toEqual([dbPath, `${dbPath}-wal`]);
  });

  it('should kill a single holder with SIGKILL', async () => {
    await writeFile(dbPath, 'data');
    const host = new FakeHost().addProcess(4321, 'python production_pipeline.py').hold(dbPath, 4321);

    const result = await clearLocks(host, dbPath);

    expect(result.holders).toEqual([{ pid: 4321, path: dbPath }]);
    expect(result.killed).toBe(1);
    expect(result.remaining).toEqual([]);
    expect(host.signalsFor('SIGKILL')).toEqual([4321]);
    expect((await findLockHolders(host, dbPath)).holders).toEqual([]);
  });

  it('should count a process holding the file and its sidecar once', async () => {
    await writeFile(dbPath, 'data');
    await writeFile(`${dbPath}-wal`, 'wal');
    const host = new FakeHost().hold(dbPath, 10).hold(`${dbPath}-wal`, 10, 11);

    const found = await findLockHolders(host, dbPath);

    expect(found.holders).toEqual([
      { pid: 10, path: dbPath },
      { pid: 11, path: `${dbPath}-wal` },
    ]);
  });

  it('should warn and continue when privilege is insufficient', async () => {
    await writeFile(dbPath, 'data');
    const warning = `Insufficient privilege to see every process using ${dbPath}; re-run with elevated privileges for a complete scan`;
    const host = new FakeHost().hold(dbPath, 55);
    host.holderWarnings.set(dbPath, warning);

    const result = await clearLocks(host, dbPath);

    expect(result.warnings).toEqual([warning]);
    expect(result.killed).toBe(1);
  });

  it('should keep holders it may not kill as remaining', async () => {
    await writeFile(dbPath, 'data');
    const host = new FakeHost().hold(dbPath, 66);
    host.denied.add(66);

    const result = await clearLocks(host, dbPath);

    expect(result.remaining).toEqual([{ pid: 66, path: dbPath }]);
    expect(result.warnings).toEqual([`Not permitted to kill PID 66 holding ${dbPath}`]);
  });
});
