/**
 * Bulwark Runtime Host — Filesystem Adapter Tests
 *
 *   FS-U1: an existing path canonicalizes to its realpath
 *   FS-U2: a missing path keeps its missing components under the real ancestor
 *   FS-U3: a symlinked directory resolves to its target, outside the root
 *   FS-U4: a dangling symlink and a null byte yield no canonical form
 *   FS-U5: atomic writes create parents and leave no temporary file
 *   FS-U6: a throwing beforeCommit hook leaves the target untouched
 *   FS-U7: remove, rename, exists and isDirectory
 *   FS-U8: a symlink swapped in after the path was checked fails the write
 *
 * Isolation: each test creates temp directories. No shared state.
 */

import { describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, readdirSync, readFileSync, realpathSync, rmSync, symlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ErrorKind } from '@bulwark/kernel';
import { FsPathResolver, NodeWorkspaceFilesystem } from '../src/adapters/fs.js';

function tempRoot(label: string): string {
  return realpathSync(mkdtempSync(join(tmpdir(), `bulwark-fs-${label}-`)));
}

const encoder = new TextEncoder();

// ---------------------------------------------------------------------------
// Canonicalization
// ---------------------------------------------------------------------------

describe('FsPathResolver', () => {
  const resolver = new FsPathResolver();

  it('FS-U1: existing file resolves to its realpath', async () => {
    const root = tempRoot('u1');
    writeFileSync(join(root, 'notes.md'), 'hello');

    const resolved = await resolver.canonicalize(root, 'notes.md');

    expect(resolved).toEqual({
      requested: 'notes.md',
      absolute: join(root, 'notes.md'),
      canonical: join(root, 'notes.md'),
      exists: true,
    });
  });

  it('FS-U2: missing components are re-appended to the nearest real ancestor', async () => {
    const root = tempRoot('u2');

    const resolved = await resolver.canonicalize(root, 'a/b/c.txt');

    expect(resolved.canonical).toBe(join(root, 'a', 'b', 'c.txt'));
    expect(resolved.exists).toBe(false);
  });

  it('FS-U2: dot-dot segments are normalized before resolution', async () => {
    const root = tempRoot('u2b');
    const resolved = await resolver.canonicalize(root, 'src/../../escape.txt');

    expect(resolved.absolute).toBe(join(root, '..', 'escape.txt'));
    expect(resolved.canonical).toBe(join(realpathSync(join(root, '..')), 'escape.txt'));
  });

  it('FS-U3: a symlinked parent directory cannot hide an escape', async () => {
    const root = tempRoot('u3');
    const outside = tempRoot('u3-outside');
    symlinkSync(outside, join(root, 'link'));

    const resolved = await resolver.canonicalize(root, 'link/new.txt');

    expect(resolved.absolute).toBe(join(root, 'link', 'new.txt'));
    expect(resolved.canonical).toBe(join(outside, 'new.txt'));
  });

  it('FS-U4: dangling symlink yields a null canonical form', async () => {
    const root = tempRoot('u4');
    symlinkSync(join(root, 'nowhere'), join(root, 'dangling'));

    const resolved = await resolver.canonicalize(root, 'dangling');

    expect(resolved.canonical).toBeNull();
    expect(resolved.error).toBe(`${join(root, 'dangling')} is a symlink to a missing target`);
  });

  it('FS-U4: null byte yields a null canonical form', async () => {
    const root = tempRoot('u4b');

    const resolved = await resolver.canonicalize(root, 'bad\0name');

    expect(resolved.canonical).toBeNull();
    expect(resolved.error).toBe('path contains a null byte');
  });
});

// ---------------------------------------------------------------------------
// Filesystem
// ---------------------------------------------------------------------------

describe('NodeWorkspaceFilesystem', () => {
  const fs = new NodeWorkspaceFilesystem();

  it('FS-U5: atomic write creates parents and leaves only the target', async () => {
    const root = tempRoot('u5');
    const target = join(root, 'deep', 'dir', 'out.txt');

    await fs.writeFileAtomic(target, encoder.encode('content'));

    expect(readFileSync(target, 'utf-8')).toBe('content');
    expect(readdirSync(join(root, 'deep', 'dir'))).toEqual(['out.txt']);
    expect(new TextDecoder().decode(await fs.readFile(target))).toBe('content');
  });

  it('FS-U6: throwing beforeCommit keeps the old bytes and removes the temp file', async () => {
    const root = tempRoot('u6');
    const target = join(root, 'keep.txt');
    writeFileSync(target, 'old');

    await expect(
      fs.writeFileAtomic(target, encoder.encode('new'), {
        beforeCommit: () => {
          throw new Error('cancelled before commit');
        },
      }),
    ).rejects.toThrow('cancelled before commit');

    expect(readFileSync(target, 'utf-8')).toBe('old');
    expect(readdirSync(root)).toEqual(['keep.txt']);
  });

  it('FS-U7: remove ignores absent files', async () => {
    const root = tempRoot('u7');
    const target = join(root, 'gone.txt');
    writeFileSync(target, 'x');

    await fs.remove(target);
    await fs.remove(target);

    expect(await fs.exists(target)).toBe(false);
  });

  it('FS-U7: rename creates the destination directory', async () => {
    const root = tempRoot('u7b');
    writeFileSync(join(root, 'a.txt'), 'moved');

    await fs.rename(join(root, 'a.txt'), join(root, 'sub', 'b.txt'));

    expect(readFileSync(join(root, 'sub', 'b.txt'), 'utf-8')).toBe('moved');
    expect(await fs.exists(join(root, 'a.txt'))).toBe(false);
  });

  it('FS-U7: isDirectory distinguishes files, directories and absent paths', async () => {
    const root = tempRoot('u7c');
    mkdirSync(join(root, 'dir'));
    writeFileSync(join(root, 'file.txt'), '');

    expect(await fs.isDirectory(join(root, 'dir'))).toBe(true);
    expect(await fs.isDirectory(join(root, 'file.txt'))).toBe(false);
    expect(await fs.isDirectory(join(root, 'absent'))).toBe(false);
  });

  it('FS-U7: null bytes are rejected before any I/O', async () => {
    await expect(fs.readFile('/tmp/bad\0name')).rejects.toThrow('null byte');
  });
});

describe('NodeWorkspaceFilesystem re-check', () => {
  const fs = new NodeWorkspaceFilesystem();

  it('FS-U8: a parent directory swapped for a symlink is refused', async () => {
    const root = tempRoot('u8a');
    const outside = tempRoot('u8a-out');
    mkdirSync(join(root, 'sub'));
    const target = join(root, 'sub', 'out.txt');
    rmSync(join(root, 'sub'), { recursive: true });
    symlinkSync(outside, join(root, 'sub'));

    await expect(fs.writeFileAtomic(target, encoder.encode('x'))).rejects.toMatchObject({
      kind: ErrorKind.PathTraversal,
      reason: `${join(root, 'sub')} now resolves to ${outside}; refusing to write ${target}`,
    });
    expect(readdirSync(outside)).toEqual([]);
  });

  it('FS-U8: a swap during beforeCommit is caught before the rename', async () => {
    const root = tempRoot('u8b');
    const outside = tempRoot('u8b-out');
    mkdirSync(join(root, 'sub'));
    const target = join(root, 'sub', 'out.txt');

    await expect(
      fs.writeFileAtomic(target, encoder.encode('x'), {
        beforeCommit: () => {
          rmSync(join(root, 'sub'), { recursive: true });
          symlinkSync(outside, join(root, 'sub'));
        },
      }),
    ).rejects.toMatchObject({ kind: ErrorKind.PathTraversal });
    expect(readdirSync(outside)).toEqual([]);
  });

  it('FS-U8: a target replaced by a symlink keeps the link target intact', async () => {
    const root = tempRoot('u8c');
    const outside = tempRoot('u8c-out');
    writeFileSync(join(outside, 'secret.txt'), 'keep');
    const target = join(root, 'notes.md');
    symlinkSync(join(outside, 'secret.txt'), target);

    await expect(fs.writeFileAtomic(target, encoder.encode('x'))).rejects.toMatchObject({
      kind: ErrorKind.PathTraversal,
      reason: `${target} was replaced by a symlink; refusing to write it`,
    });
    expect(readFileSync(join(outside, 'secret.txt'), 'utf-8')).toBe('keep');
  });

  it('FS-U8: rename refuses a destination under a swapped directory', async () => {
    const root = tempRoot('u8d');
    const outside = tempRoot('u8d-out');
    writeFileSync(join(root, 'a.txt'), 'a');
    symlinkSync(outside, join(root, 'dest'));

    await expect(fs.rename(join(root, 'a.txt'), join(root, 'dest', 'a.txt'))).rejects.toMatchObject({
      kind: ErrorKind.PathTraversal,
    });
    expect(readdirSync(outside)).toEqual([]);
    expect(readFileSync(join(root, 'a.txt'), 'utf-8')).toBe('a');
  });
});
