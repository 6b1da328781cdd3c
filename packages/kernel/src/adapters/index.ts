/**
 * Bulwark Kernel — Adapter Interfaces
 *
 * All command side effects flow through adapters. Command handlers never
 * touch the filesystem or spawn processes directly: the pipeline hands them
 * guarded views of these adapters only after policy and approval passed.
 *
 * No implementations are provided here. Adapters are injected, not
 * constructed. Concrete implementations live in @bulwark/runtime-host.
 */

// ---------------------------------------------------------------------------
// Path Resolution
// ---------------------------------------------------------------------------

/**
 * Outcome of canonicalizing a requested path against the workspace root.
 *
 * `canonical` is null when canonicalization failed (broken symlink chain,
 * permission error, null byte). For a path that does not exist yet, the
 * nearest existing ancestor is canonicalized and the remaining components
 * re-appended.
 */
export interface ResolvedPath {
  /** As written by the caller. */
  readonly requested: string;
  /** Joined onto the workspace root and normalized, symlinks untouched. */
  readonly absolute: string;
  readonly canonical: string | null;
  readonly exists: boolean;
  /** Why canonicalization failed, when it did. */
  readonly error?: string;
}

export interface PathResolver {
  canonicalize(workspaceRoot: string, requested: string): Promise<ResolvedPath>;
}

// ---------------------------------------------------------------------------
// Filesystem
// ---------------------------------------------------------------------------

export interface AtomicWriteOptions {
  /**
   * Called after the temporary file is fully written and before the rename
   * commits it. Throwing here abandons the write and leaves the target
   * untouched.
   */
  readonly beforeCommit?: () => void;
}

/**
 * Filesystem operations over canonical absolute paths.
 *
 * Writes use a write-then-rename discipline: the target is either the old
 * bytes or the new bytes, never a partial file.
 */
export interface WorkspaceFilesystem {
  readFile(path: string): Promise<Uint8Array>;
  /** Creates missing parent directories. */
  writeFileAtomic(path: string, content: Uint8Array, options?: AtomicWriteOptions): Promise<void>;
  /** Removes a file. Absent files are not an error. */
  remove(path: string): Promise<void>;
  /** Creates missing parent directories of `to`. */
  rename(from: string, to: string): Promise<void>;
  exists(path: string): Promise<boolean>;
  isDirectory(path: string): Promise<boolean>;
}

// ---------------------------------------------------------------------------
// Shell
// ---------------------------------------------------------------------------

export interface ShellRunOptions {
  readonly cwd: string;
  readonly env?: Readonly<Record<string, string>> | undefined;
  readonly timeoutMs: number;
  /** Aborting terminates the child gracefully (SIGTERM, then SIGKILL). */
  readonly signal?: AbortSignal | undefined;
}

/** Partial output is kept when the process is timed out or cancelled. */
export interface ShellRunResult {
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;
  readonly cancelled: boolean;
}

export interface ShellExecutor {
  run(command: string, options: ShellRunOptions): Promise<ShellRunResult>;
}

// ---------------------------------------------------------------------------
// Bundle
// ---------------------------------------------------------------------------

export interface KernelAdapters {
  readonly paths: PathResolver;
  readonly fs: WorkspaceFilesystem;
  readonly shell: ShellExecutor;
}
