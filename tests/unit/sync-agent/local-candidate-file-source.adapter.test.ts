import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, mkdtemp, rm, symlink, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { LocalCandidateFileSourceAdapter } from '../../../src/infrastructure/filesystem/local-candidate-file-source.adapter';

test('LocalCandidateFileSourceAdapter lists supported regular files with their metadata', async () => {
  const directory = await mkdtemp(path.join(tmpdir(), 'candidate-source-'));
  const adapter = new LocalCandidateFileSourceAdapter();

  try {
    await writeFile(path.join(directory, 'shot.PNG'), 'png-bytes');
    await writeFile(path.join(directory, 'notes.txt'), 'ignored');
    await mkdir(path.join(directory, 'nested.jpg'));
    await utimes(path.join(directory, 'shot.PNG'), 1_700_000_000, 1_700_000_123);

    const candidates = await adapter.listCandidates(directory, ['.png', '.jpg']);

    assert.equal(candidates.length, 1);
    assert.equal(candidates[0]?.name, 'shot.PNG');
    assert.equal(candidates[0]?.path, path.join(directory, 'shot.PNG'));
    assert.equal(candidates[0]?.sizeBytes, 9);
    assert.equal(candidates[0]?.modifiedAtMs, 1_700_000_123_000);
    assert.ok((candidates[0]?.createdAtMs ?? 0) > 0);
  } finally {
    await rm(directory, { recursive: true, force: true });
  }
});

test('LocalCandidateFileSourceAdapter reports whether the source directory exists', async () => {
  const directory = await mkdtemp(path.join(tmpdir(), 'candidate-source-'));
  const adapter = new LocalCandidateFileSourceAdapter();

  try {
    await writeFile(path.join(directory, 'a.png'), 'x');

    assert.equal(await adapter.directoryExists(directory), true);
    assert.equal(await adapter.directoryExists(path.join(directory, 'a.png')), false);
    assert.equal(await adapter.directoryExists(path.join(directory, 'missing')), false);
  } finally {
    await rm(directory, { recursive: true, force: true });
  }
});

test('LocalCandidateFileSourceAdapter follows symbolic links to image files', async () => {
  const root = await mkdtemp(path.join(tmpdir(), 'candidate-source-'));
  const directory = path.join(root, 'inbox');
  const elsewhere = path.join(root, 'elsewhere');
  const adapter = new LocalCandidateFileSourceAdapter();

  try {
    await mkdir(directory);
    await mkdir(elsewhere);
    await mkdir(path.join(elsewhere, 'album.png'));
    await writeFile(path.join(directory, 'plain.png'), 'plain');
    await writeFile(path.join(elsewhere, 'real.png'), 'linked-bytes');
    await symlink(path.join(elsewhere, 'real.png'), path.join(directory, 'linked.png'));
    await symlink(path.join(elsewhere, 'album.png'), path.join(directory, 'folder-link.png'));
    await symlink(path.join(elsewhere, 'missing.png'), path.join(directory, 'dangling.png'));

    const candidates = await adapter.listCandidates(directory, ['.png']);
    const byName = candidates.map((file) => file.name).sort();

    assert.deepEqual(byName, ['linked.png', 'plain.png']);
    const linked = candidates.find((file) => file.name === 'linked.png');
    assert.equal(linked?.path, path.join(directory, 'linked.png'));
    assert.equal(linked?.sizeBytes, 12);
  } finally {
    await rm(root, { recursive: true, force: true });
  }
});
