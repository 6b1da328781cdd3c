/**
 * Bulwark Runtime Host — Filesystem Adapters
 *
 * Implements the PathResolver and WorkspaceFilesystem interfaces from
 * @bulwark/kernel using node:fs/promises.
 *
 * The kernel never imports node:fs. It decides policy on the canonical paths
 * this resolver reports, then performs I/O through the filesystem adapter
 * on exactly those paths.
 *
 * CANONICALIZATION:
 *   - The requested path is joined onto the workspace root and normalized.
 *   - realpath() removes every symlink. For a path that does not exist yet,
 *     the nearest existing ancestor is resolved and the missing components
 *     re-appended, so a symlinked parent directory cannot smuggle a write
 *     outside the root.
 *   - A dangling symlink as the first missing component, a null byte, or
 *     any error other than ENOENT yields `canonical: null`; the kernel
 *     denies such paths as PathTraversal.
 *
 * ATOMIC WRITES:
 *   Content goes to a temporary sibling file first and is renamed over the
 *   target. The `beforeCommit` hook runs between the two, so a cancellation
 *   checkpoint there leaves the target untouched.
 *
 * RE-CHECK:
 *   Approval can wait on an operator for minutes. Before creating parents
 *   and again just before the rename, the write target's directory must
 *   still be its own realpath and the target itself must not be a symlink;
 *   otherwise the write fails as PathTraversal.
 */

import type { Stats } from 'node:fs';
import { lstat, mkdir, readFile, realpath, rename, rm, stat, unlink, writeFile } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import type { AtomicWriteOptions, PathResolver, ResolvedPath, WorkspaceFilesystem } from '@bulwark/kernel';
import { CommandError, ErrorKind, isNodeError } from '@bulwark/kernel';
import { ulid } from '../logging/ulid.js';

// ---------------------------------------------------------------------------
// Path safety helpers
// ---------------------------------------------------------------------------

/**
 * Reject paths containing null bytes. They are never valid in filesystem
 * paths and can truncate the path seen by the OS.
 */
function assertSafePath(path: string): void {
  if (path.includes('\0')) {
    throw new Error(`Invalid path: null byte detected in path: ${JSON.stringify(path)}`);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// FsPathResolver
// ---------------------------------------------------------------------------

export class FsPathResolver implements PathResolver {
  async canonicalize(workspaceRoot: string, requested: string): Promise<ResolvedPath> {
    const absolute = resolve(workspaceRoot, requested);
    if (requested.includes('\0')) {
      return { requested, absolute, canonical: null, exists: false, error: 'path contains a null byte' };
    }

    try {
      return { requested, absolute, canonical: await realpath(absolute), exists: true };
    } catch (err: unknown) {
      if (!isNodeError(err, 'ENOENT')) {
        return { requested, absolute, canonical: null, exists: false, error: errorMessage(err) };
      }
    }

    // The target does not exist: resolve the nearest existing ancestor.
    const missing: string[] = [basename(absolute)];
    let ancestor = dirname(absolute);
    for (;;) {
      try {
        const realAncestor = await realpath(ancestor);
        const first = join(realAncestor, missing[0] ?? '');
        if (await isSymlink(first)) {
          return {
            requested,
            absolute,
            canonical: null,
            exists: false,
            error: `${first} is a symlink to a missing target`,
          };
        }
        return { requested, absolute, canonical: join(realAncestor, ...missing), exists: false };
      } catch (err: unknown) {
        if (!isNodeError(err, 'ENOENT') || dirname(ancestor) === ancestor) {
          return { requested, absolute, canonical: null, exists: false, error: errorMessage(err) };
        }
        missing.unshift(basename(ancestor));
        ancestor = dirname(ancestor);
      }
    }
  }
}

/** True when the directory entry at `path` is itself a symlink, followed or not. */
async function isSymlink(path: string): Promise<boolean> {
  try {
    return (await lstat(path)).isSymbolicLink();
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return false;
    throw err;
  }
}

/**
 * Fails when `path`, a canonical path checked earlier, no longer resolves to
 * itself: a parent directory or the target was replaced by a symlink.
 */
async function assertStillCanonical(path: string): Promise<void> {
  let ancestor = dirname(path);
  for (;;) {
    try {
      const real = await realpath(ancestor);
      if (real !== ancestor) {
        throw new CommandError(ErrorKind.PathTraversal, `${ancestor} now resolves to ${real}; refusing to write ${path}`);
      }
      break;
    } catch (err: unknown) {
      if (!isNodeError(err, 'ENOENT') || dirname(ancestor) === ancestor) throw err;
      ancestor = dirname(ancestor);
    }
  }
  if (await isSymlink(path)) {
    throw new CommandError(ErrorKind.PathTraversal, `${path} was replaced by a symlink; refusing to write it`);
  }
}

// ---------------------------------------------------------------------------
// NodeWorkspaceFilesystem
// ---------------------------------------------------------------------------

/**
 * Node.js implementation of the kernel's WorkspaceFilesystem.
 *
 * Paths arriving here are the canonical paths the kernel already checked;
 * the adapter does not re-derive policy, it only confirms that a write
 * target still canonicalizes to the same place.
 */
export class NodeWorkspaceFilesystem implements WorkspaceFilesystem {
  async readFile(path: string): Promise<Uint8Array> {
    assertSafePath(path);
    const buffer = await readFile(path);
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  }

  async writeFileAtomic(path: string, content: Uint8Array, options?: AtomicWriteOptions): Promise<void> {
    assertSafePath(path);
    await assertStillCanonical(path);
    const dir = dirname(path);
    await mkdir(dir, { recursive: true });
    const temp = join(dir, `.${basename(path)}.${ulid()}.tmp`);
    await writeFile(temp, content);
    try {
      options?.beforeCommit?.();
      await assertStillCanonical(path);
      await rename(temp, path);
    } catch (err: unknown) {
      await rm(temp, { force: true });
      throw err;
    }
  }

  async remove(path: string): Promise<void> {
    assertSafePath(path);
    try {
      await unlink(path);
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return;
      throw err;
    }
  }

  async rename(from: string, to: string): Promise<void> {
    assertSafePath(from);
    assertSafePath(to);
    await assertStillCanonical(to);
    await mkdir(dirname(to), { recursive: true });
    await rename(from, to);
  }

  async exists(path: string): Promise<boolean> {
    return (await statOrNull(path)) !== null;
  }

  async isDirectory(path: string): Promise<boolean> {
    return (await statOrNull(path))?.isDirectory() ?? false;
  }
}

async function statOrNull(path: string): Promise<Stats | null> {
  assertSafePath(path);
  try {
    return await stat(path);
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return null;
    throw err;
  }
}
