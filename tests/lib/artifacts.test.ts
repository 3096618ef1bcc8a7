import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  artifactFileName,
  formatStamp,
  latestArtifact,
  listArtifacts,
  nextArtifactPath,
  parseArtifactName,
  readManifest,
  verifyArtifact,
  ArtifactError,
} from '@/lib/artifacts.js';
import { atomicWriteJson, sha256File } from '@/lib/fs.js';
import { createTestDir, removeTestDir } from '../helpers/mocks.js';

const noon = new Date(Date.UTC(2024, 2, 1, 12, 0, 5));

describe('artifact names', () => {
  it('should format UTC timestamps', () => {
    expect(formatStamp(noon)).toBe('20240301_120005');
  });

  it('should build names with backend extension and collision suffix', () => {
    expect(artifactFileName('letters', 'embedded', noon)).toBe('letters_embedded_20240301_120005.db');
    expect(artifactFileName('letters', 'server', noon)).toBe('letters_server_20240301_120005.sql');
    expect(artifactFileName('letters', 'server', noon, 2)).toBe('letters_server_20240301_120005_2.sql');
  });

  it('should parse names back', () => {
    expect(parseArtifactName('letters_server_20240301_120005_3.sql')).toEqual({
      system: 'letters',
      backend: 'server',
      stamp: '20240301_120005',
      seq: 3,
      created_at: noon,
    });
  });

  it('should reject names that are not artifacts', () => {
    expect(parseArtifactName('letters_embedded_20240301_120005.sql')).toBeNull();
    expect(parseArtifactName('letters_embedded_20240301_120005.db.tmp')).toBeNull();
    expect(parseArtifactName('notes.txt')).toBeNull();
  });
});

describe('artifact catalog', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTestDir();
  });

  afterEach(async () => {
    await removeTestDir(testDir);
  });

  it('should list newest first by name, ignoring temp files, manifests and other systems', async () => {
    for (const name of [
      'letters_embedded_20240101_090000.db',
      'letters_embedded_20240301_120005.db',
      'letters_embedded_20240301_120005_2.db',
      'letters_embedded_20240301_120005_10.db',
      'letters_embedded_20240401_000000.db.tmp',
      'letters_embedded_20240101_090000.db.manifest.json',
      'orders_embedded_20250101_000000.db',
      'letters_server_20240201_000000.sql',
    ]) {
      await writeFile(join(testDir, name), name.endsWith('.json') ? '{}' : 'x');
    }

    const embedded = await listArtifacts(testDir, 'letters', 'embedded');

    expect(embedded.map((artifact) => artifact.file)).toEqual([
      'letters_embedded_20240301_120005_10.db',
      'letters_embedded_20240301_120005_2.db',
      'letters_embedded_20240301_120005.db',
      'letters_embedded_20240101_090000.db',
    ]);
    // The manifest above is invalid, so it is not attached.
    expect(embedded[3].manifest).toBeNull();

    const all = await listArtifacts(testDir, 'letters');
    expect(all.map((artifact) => artifact.backend)).toEqual(['embedded', 'embedded', 'embedded', 'server', 'embedded']);
  });

  it('should return an empty list for a missing directory', async () => {
    expect(await listArtifacts(join(testDir, 'absent'), 'letters')).toEqual([]);
    expect(await latestArtifact(join(testDir, 'absent'), 'letters', 'embedded')).toBeNull();
  });

  it('should append a sequence number when the second is taken', async () => {
    const first = await nextArtifactPath(testDir, 'letters', 'server', noon);
    expect(first).toBe(join(testDir, 'letters_server_20240301_120005.sql'));

    await writeFile(first, 'dump');
    expect(await nextArtifactPath(testDir, 'letters', 'server', noon)).toBe(
      join(testDir, 'letters_server_20240301_120005_2.sql')
    );
  });
});

describe('manifests', () => {
  let testDir: string;
  let artifactPath: string;

  beforeEach(async () => {
    testDir = await createTestDir();
    artifactPath = join(testDir, 'letters_embedded_20240301_120005.db');
    await writeFile(artifactPath, 'database bytes');
  });

  afterEach(async () => {
    await removeTestDir(testDir);
  });

  async function writeManifest(overrides: Record<string, unknown> = {}): Promise<void> {
    await atomicWriteJson(`${artifactPath}.manifest.json`, {
      backend: 'embedded',
      created_at: noon.toISOString(),
      source: '/srv/data/letters.db',
      file: 'letters_embedded_20240301_120005.db',
      size: 14,
      sha256: await sha256File(artifactPath),
      ...overrides,
    });
  }

  it('should return null when there is no manifest', async () => {
    expect(await readManifest(artifactPath)).toBeNull();
    expect(await verifyArtifact(artifactPath)).toEqual({ ok: true, checked: false, problems: [] });
  });

  it('should verify a matching manifest', async () => {
    await writeManifest();
    expect(await verifyArtifact(artifactPath)).toEqual({ ok: true, checked: true, problems: [] });
  });

  it('should detect a changed artifact', async () => {
    await writeManifest();
    await writeFile(artifactPath, 'database byteZ');

    expect(await verifyArtifact(artifactPath)).toEqual({
      ok: false,
      checked: true,
      problems: ['sha256 does not match manifest'],
    });
  });

  it('should detect a size mismatch', async () => {
    await writeManifest({ size: 99 });

    const check = await verifyArtifact(artifactPath);
    expect(check.ok).toBe(false);
    expect(check.problems).toEqual(['size 14 does not match manifest size 99']);
  });

  it('should throw ArtifactError for an invalid manifest', async () => {
    await writeManifest({ backend: 'cloud' });

    await expect(readManifest(artifactPath)).rejects.toThrow(ArtifactError);
    expect((await verifyArtifact(artifactPath)).ok).toBe(false);
  });
});
