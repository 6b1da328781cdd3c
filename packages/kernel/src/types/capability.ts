/**
 * Bulwark Kernel — Capability Types
 *
 * Defines the capability tags, the ordered sandbox levels, and the static
 * command descriptor every registered command declares.
 *
 * A command is runnable under a grant iff its required capabilities are a
 * subset of the granted capabilities. There is no partial execution: one
 * missing capability fails the whole command before any side effect.
 */

// ---------------------------------------------------------------------------
// Capabilities
// ---------------------------------------------------------------------------

/**
 * Fine-grained permission tags a command declares as required.
 */
export enum Capability {
  ReadFile = 'ReadFile',
  WriteFile = 'WriteFile',
  ExecuteShell = 'ExecuteShell',
  NetworkAccess = 'NetworkAccess',
  /** Contacting a language-model provider on the operator's behalf. */
  ProviderAccess = 'ProviderAccess',
}

/** Every capability tag, in declaration order. */
export const ALL_CAPABILITIES: ReadonlyArray<Capability> = Object.values(Capability);

// ---------------------------------------------------------------------------
// Sandbox Levels
// ---------------------------------------------------------------------------

/**
 * Ordered permission tier: ReadOnly < WorkspaceWrite < FullAccess.
 *
 * The levels form a lattice. Anything Allow-able at a lower level is never
 * Deny at a higher level (monotonicity).
 */
export enum SandboxLevel {
  ReadOnly = 'read-only',
  WorkspaceWrite = 'workspace-write',
  FullAccess = 'full-access',
}

/**
 * Numeric ordering of sandbox levels for comparison.
 */
export const SANDBOX_LEVEL_ORDER: Readonly<Record<SandboxLevel, number>> = {
  [SandboxLevel.ReadOnly]: 0,
  [SandboxLevel.WorkspaceWrite]: 1,
  [SandboxLevel.FullAccess]: 2,
} as const;

/** Sandbox levels from least to most permissive. */
export const SANDBOX_LEVELS: ReadonlyArray<SandboxLevel> = [
  SandboxLevel.ReadOnly,
  SandboxLevel.WorkspaceWrite,
  SandboxLevel.FullAccess,
];

/**
 * Parse a sandbox level from its flag/config spelling.
 * Returns null for anything that is not one of the three levels.
 */
export function parseSandboxLevel(raw: string): SandboxLevel | null {
  const value = raw.trim().toLowerCase();
  return SANDBOX_LEVELS.find((level) => level === value) ?? null;
}

// ---------------------------------------------------------------------------
// Command Descriptor
// ---------------------------------------------------------------------------

/**
 * When the pipeline renders a human-readable preview for a command.
 *
 * Never skips rendering; the command's plan (touched paths, shell text) is
 * still computed because policy evaluation depends on it.
 */
export enum PreviewMode {
  Always = 'Always',
  OnRequest = 'OnRequest',
  Never = 'Never',
}

/**
 * Static declaration of a command. Immutable, registered once at startup.
 */
export interface CommandDescriptor {
  /** Registry key, e.g. `create` or `run`. */
  readonly id: string;
  readonly description: string;
  readonly required_capabilities: ReadonlyArray<Capability>;
  /** Forces RequireApproval for every capability check of this command. */
  readonly requires_approval: boolean;
  readonly preview_mode: PreviewMode;
  /**
   * Narrow opt-in allowing ExecuteShell at WorkspaceWrite (always behind
   * approval). Without it, shell execution is denied below FullAccess.
   */
  readonly workspace_shell_opt_in: boolean;
  readonly supports_dry_run: boolean;
}

/**
 * Return the required capabilities missing from a grant, in required order.
 * An empty result means the command is runnable under the grant.
 */
export function missingCapabilities(
  required: ReadonlyArray<Capability>,
  granted: ReadonlySet<Capability>,
): Capability[] {
  return required.filter((capability) => !granted.has(capability));
}
