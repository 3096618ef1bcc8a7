import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  atomicWriteJson,
  atomicReadJson,
  atomicCopyFile,
  AtomicFsError,
  cleanupTmpFiles,
  removeIfExists,
  sha256File,
  errnoCode,
} from '@/lib/fs.js';
import { readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createTestDir, removeTestDir } from '../helpers/mocks.js';

describe('atomicWriteJson', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTestDir();
  });

  afterEach(async () => {
    await removeTestDir(testDir);
  });

  it('should write JSON data atomically', async () => {
    const filePath = join(testDir, 'selection.json');
    const data = { version: 1, backend: 'embedded' };

    await atomicWriteJson(filePath, data);

    const result = await atomicReadJson<typeof data>(filePath);
    expect(result).toEqual(data);
  });

  it('should format JSON with 2-space indent and a trailing newline', async () => {
    const filePath = join(testDir, 'formatted.json');

    await atomicWriteJson(filePath, { a: 1 });

    expect(await readFile(filePath, 'utf-8')).toBe('{\n  "a": 1\n}\n');
  });

  it('should not leave .tmp file after successful write', async () => {
    const filePath = join(testDir, 'clean.json');

    await atomicWriteJson(filePath, { test: true });

    const files = await readdir(testDir);
    expect(files).toEqual(['clean.json']);
  });

  it('should throw AtomicFsError on write failure', async () => {
    const filePath = join(testDir, 'missing', 'dir', 'test.json');

    await expect(atomicWriteJson(filePath, { test: true })).rejects.toThrow(AtomicFsError);
  });
});

describe('atomicReadJson', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTestDir();
  });

  afterEach(async () => {
    await removeTestDir(testDir);
  });

  it('should throw AtomicFsError when file does not exist', async () => {
    await expect(atomicReadJson(join(testDir, 'nonexistent.json'))).rejects.toThrow(AtomicFsError);
  });

  it('should throw AtomicFsError on invalid JSON', async () => {
    const filePath = join(testDir, 'invalid.json');
    await writeFile(filePath, '{ invalid json }');

    await expect(atomicReadJson(filePath)).rejects.toThrow(AtomicFsError);
  });
});

describe('atomicCopyFile', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTestDir();
  });

  afterEach(async () => {
    await removeTestDir(testDir);
  });

  it('should copy bytes exactly and return the size', async () => {
    const source = join(testDir, 'source.bin');
    const destination = join(testDir, 'copy.bin');
    const bytes = Buffer.from([0, 1, 2, 255, 254, 10, 13]);
    await writeFile(source, bytes);

    const size = await atomicCopyFile(source, destination);

    expect(size).toBe(7);
    expect((await readFile(destination)).equals(bytes)).toBe(true);
    expect(await readdir(testDir)).not.toContain('copy.bin.tmp');
  });

  it('should replace an existing destination', async () => {
    const source = join(testDir, 'new.db');
    const destination = join(testDir, 'live.db');
    await writeFile(source, 'new contents');
    await writeFile(destination, 'old contents');

    await atomicCopyFile(source, destination);

    expect(await readFile(destination, 'utf-8')).toBe('new contents');
  });

  it('should leave the destination untouched when the source is missing', async () => {
    const destination = join(testDir, 'live.db');
    await writeFile(destination, 'live');

    await expect(atomicCopyFile(join(testDir, 'absent.db'), destination)).rejects.toThrow(AtomicFsError);

    expect(await readFile(destination, 'utf-8')).toBe('live');
    expect(await readdir(testDir)).toEqual(['live.db']);
  });
});

describe('sha256File', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTestDir();
  });

  afterEach(async () => {
    await removeTestDir(testDir);
  });

  it('should hash file contents', async () => {
    const filePath = join(testDir, 'abc.txt');
    await writeFile(filePath, 'abc');

    expect(await sha256File(filePath)).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });
});

describe('removeIfExists', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTestDir();
  });

  afterEach(async () => {
    await removeTestDir(testDir);
  });

  it('should report whether a file was removed', async () => {
    const filePath = join(testDir, 'letters.db-wal');
    await writeFile(filePath, 'wal');

    expect(await removeIfExists(filePath)).toBe(true);
    expect(await removeIfExists(filePath)).toBe(false);
  });
});

describe('cleanupTmpFiles', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTestDir();
  });

  afterEach(async () => {
    await removeTestDir(testDir);
  });

  it('should delete .tmp files only', async () => {
    const tmpFile = join(testDir, 'letters_server_20240101_120000.sql.tmp');
    await writeFile(tmpFile, 'partial');
    await writeFile(join(testDir, 'letters_server_20240101_110000.sql'), 'complete');

    const deleted = await cleanupTmpFiles(testDir);

    expect(deleted).toEqual([tmpFile]);
    expect(await readdir(testDir)).toEqual(['letters_server_20240101_110000.sql']);
  });

  it('should return an empty array for a missing directory', async () => {
    expect(await cleanupTmpFiles(join(testDir, 'absent'))).toEqual([]);
  });
});

describe('errnoCode', () => {
  it('should extract the code of a system error', () => {
    const error = Object.assign(new Error('no such file'), { code: 'ENOENT' });
    expect(errnoCode(error)).toBe('ENOENT');
    expect(errnoCode(new Error('plain'))).toBeUndefined();
    expect(errnoCode('ENOENT')).toBeUndefined();
  });
});
