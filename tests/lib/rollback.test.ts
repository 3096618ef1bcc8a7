import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { rollback, RollbackError, unmetPreconditions } from '@/lib/rollback.js';
import { createBackup } from '@/lib/backup.js';
import { readBackendSelection } from '@/lib/selection.js';
import { createMemoryLogger } from '@/lib/log.js';
import { StopPhase, type StopReport } from '@/types/stop.js';
import type { StackConfig } from '@/types/config.js';
import { FakeHost, createFakeRunner, createMockConfig, createTestDir, okResult, removeTestDir } from '../helpers/mocks.js';

const noon = new Date(Date.UTC(2024, 2, 1, 12, 0, 5));
const okProbe = async () => ({ status: 'ok' as const });

function createDatabase(path: string, body: string): void {
  const db = new Database(path);
  db.exec('CREATE TABLE letters (id INTEGER PRIMARY KEY, body TEXT)');
  db.prepare('INSERT INTO letters (body) VALUES (?)').run(body);
  db.close();
}

describe('rollback', () => {
  let testDir: string;
  let config: StackConfig;

  beforeEach(async () => {
    testDir = await createTestDir();
    config = createMockConfig(testDir);
    await mkdir(join(testDir, 'data'), { recursive: true });
  });

  afterEach(async () => {
    await removeTestDir(testDir);
  });

  it('should fail before stopping anything when no artifact exists', async () => {
    await writeFile(config.embedded.db_path, 'live data');
    const host = new FakeHost().addProcess(100, 'next dev').listen(3000, 100);

    const attempt = rollback(config, 'embedded', { host, log: createMemoryLogger(), probe: okProbe });

    await expect(attempt).rejects.toThrow(RollbackError);
    await expect(attempt).rejects.toThrow(`No embedded backup found in ${config.backup_dir}`);
    expect(host.signals).toEqual([]);
    expect(await readFile(config.embedded.db_path, 'utf-8')).toBe('live data');
  });

  it('should restore the latest artifact and flip the selection', async () => {
    createDatabase(config.embedded.db_path, 'good');
    await createBackup({ config, now: () => noon }, 'embedded');
    const backedUp = await readFile(config.embedded.db_path);
    await writeFile(config.embedded.db_path, 'broken after a bad migration');
    const host = new FakeHost().addProcess(100, 'next dev').hold(config.embedded.db_path, 100);

    const log = createMemoryLogger();
    const outcome = await rollback(config, 'embedded', { host, log, probe: okProbe, now: () => noon });

    expect(outcome.stop.phase).toBe(StopPhase.VERIFIED);
    expect(outcome.artifact.file).toBe('letters_embedded_20240301_120005.db');
    expect((await readFile(config.embedded.db_path)).equals(backedUp)).toBe(true);
    expect(outcome.selection).toEqual({
      version: 1,
      backend: 'embedded',
      updated_at: '2024-03-01T12:00:05.000Z',
      updated_by: 'rollback',
      previous_backend: 'none',
    });
    expect(await readBackendSelection(config)).toEqual(outcome.selection);
    expect(log.lines()).toContain('[SUCCESS] Backup matches its manifest');
    expect(log.lines()).toContain('[INFO] Restart the application to pick up the change.');
  });

  it('should restore over a corrupt live file with the real lock probe', async () => {
    createDatabase(config.embedded.db_path, 'good');
    const backedUp = await readFile(config.embedded.db_path);
    await createBackup({ config, now: () => noon }, 'embedded');
    await writeFile(config.embedded.db_path, 'garbage '.repeat(64));

    const log = createMemoryLogger();
    const outcome = await rollback(config, 'embedded', { host: new FakeHost(), log, sleep: async () => {} });

    expect(outcome.stop.verification?.probe).toEqual({ status: 'unreadable', message: 'file is not a database' });
    expect(outcome.stop.phase).toBe(StopPhase.VERIFIED);
    expect((await readFile(config.embedded.db_path)).equals(backedUp)).toBe(true);
    expect(log.lines()).toContain(
      '[WARNING] Database file is not readable (file is not a database); no lock, restore a backup to repair it'
    );
  });

  it('should abort without overwriting when a lock holder survives', async () => {
    createDatabase(config.embedded.db_path, 'good');
    await createBackup({ config, now: () => noon }, 'embedded');
    await writeFile(config.embedded.db_path, 'live data');
    const host = new FakeHost().hold(config.embedded.db_path, 4242);
    host.denied.add(4242);

    const attempt = rollback(config, 'embedded', { host, log: createMemoryLogger(), probe: okProbe });

    await expect(attempt).rejects.toThrow('PID(s) 4242 still hold the database file');
    expect(await readFile(config.embedded.db_path, 'utf-8')).toBe('live data');
    expect((await readBackendSelection(config)).version).toBe(0);
  });

  it('should abort when the artifact does not match its manifest', async () => {
    createDatabase(config.embedded.db_path, 'good');
    const { artifact } = await createBackup({ config, now: () => noon }, 'embedded');
    await writeFile(artifact.path, 'tampered');
    const host = new FakeHost().addProcess(100, 'next dev');

    const attempt = rollback(config, 'embedded', { host, log: createMemoryLogger(), probe: okProbe });

    await expect(attempt).rejects.toThrow(/failed verification/);
    expect(host.signals).toEqual([]);
  });

  it('should restore a server dump through psql', async () => {
    const { run, calls } = createFakeRunner(async (_command, args) => {
      if (args.includes('--clean')) await writeFile(args[args.length - 1], '-- dump');
      return okResult();
    });
    await createBackup({ config, run, now: () => noon }, 'server');

    const outcome = await rollback(config, 'server', {
      host: new FakeHost(),
      log: createMemoryLogger(),
      run,
      probe: okProbe,
    });

    expect(calls.map((call) => call.command)).toEqual(['pg_dump', 'psql']);
    expect(outcome.selection.backend).toBe('server');
  });
});

describe('unmetPreconditions', () => {
  const base: StopReport = {
    phase: StopPhase.VERIFIED,
    started_at: '2024-03-01T12:00:00.000Z',
    finished_at: '2024-03-01T12:00:02.000Z',
    locator: { matched: [], signaled: 0, nothing_to_do: true, warnings: [] },
    ports: { bindings: [{ port: 3000, pids: [], status: 'free' }], killed: 0, warnings: [] },
    locks: { file_present: true, holders: [], killed: 0, remaining: [], warnings: [] },
    verification: { remaining: [], probe: { status: 'ok' } },
    interrupted: false,
  };

  it('should accept a clean stop', () => {
    expect(unmetPreconditions(base)).toEqual([]);
  });

  it('should not block on an unreadable database file', () => {
    expect(
      unmetPreconditions({
        ...base,
        verification: { remaining: [], probe: { status: 'unreadable', message: 'file is not a database' } },
      })
    ).toEqual([]);
  });

  it('should list every unmet condition', () => {
    expect(
      unmetPreconditions({
        ...base,
        ports: { bindings: [{ port: 3001, pids: [9], status: 'failed' }], killed: 0, warnings: [] },
        verification: { remaining: [], probe: { status: 'locked', message: 'database is locked' } },
      })
    ).toEqual([
      'port(s) 3001 could not be reclaimed',
      'the database is still locked (database is locked)',
    ]);
  });
});
