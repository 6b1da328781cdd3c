/**
 * Bulwark Kernel — Command Registry
 *
 * Closed registry mapping command id to handler. Commands are registered
 * once at startup; `seal()` freezes the set before the first invocation.
 *
 * `defineCommand` erases a typed handler into a RegisteredCommand: the
 * argument type lives only inside the closure created by `bind`, after the
 * raw payload has passed the handler's zod schema.
 */

import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import type { ShellExecutor, WorkspaceFilesystem } from '../adapters/index.js';
import type { ActionChange } from '../types/action.js';
import type { CommandDescriptor } from '../types/capability.js';
import type { CommandContext, CommandPlan } from '../types/command.js';

// ---------------------------------------------------------------------------
// Handler contract
// ---------------------------------------------------------------------------

/**
 * Read access for preview rendering. Only paths the plan declared and that
 * resolve inside the workspace are readable; anything else yields null.
 */
export interface PreviewReader {
  read(path: string): Promise<Uint8Array | null>;
}

/**
 * Capabilities handed to `execute` once policy and approval have passed.
 */
export interface ExecutionControls {
  /** Filesystem view that refuses mutations before `begin()`. */
  readonly fs: WorkspaceFilesystem;
  /** Shell view bound to the invocation's cancellation signal. */
  readonly shell: ShellExecutor;
  /**
   * Canonical path for a path the plan declared. Throws PolicyDenied for a
   * path the plan did not declare.
   */
  target(path: string): string;
  /** Declare the state transition about to happen. Call once, before mutating. */
  begin(change: ActionChange): void;
  /** Throws Cancelled if the invocation's signal fired. */
  checkpoint(): void;
}

export interface CommandHandler<A> {
  readonly descriptor: CommandDescriptor;
  readonly argsSchema: ZodType<A, ZodTypeDef, unknown>;
  /** Side-effect free. Declares every path and shell text the command touches. */
  plan(args: A, context: CommandContext): CommandPlan;
  /** Human-readable preview (diff, literal shell invocation). */
  readonly render?: (args: A, context: CommandContext, reader: PreviewReader) => Promise<string>;
  /** Performs the side effect and returns the command's output text. */
  execute(args: A, context: CommandContext, controls: ExecutionControls): Promise<string>;
}

// ---------------------------------------------------------------------------
// Erased form
// ---------------------------------------------------------------------------

/** A handler bound to validated arguments for one invocation. */
export interface BoundCommand {
  plan(): CommandPlan;
  readonly render: ((reader: PreviewReader) => Promise<string>) | undefined;
  execute(controls: ExecutionControls): Promise<string>;
}

export type BindResult =
  | { readonly ok: true; readonly command: BoundCommand }
  | { readonly ok: false; readonly reason: string };

export interface RegisteredCommand {
  readonly descriptor: CommandDescriptor;
  bind(rawArgs: unknown, context: CommandContext): BindResult;
}

export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function defineCommand<A>(handler: CommandHandler<A>): RegisteredCommand {
  return {
    descriptor: handler.descriptor,
    bind(rawArgs, context) {
      const parsed = handler.argsSchema.safeParse(rawArgs);
      if (!parsed.success) {
        return { ok: false, reason: formatZodError(parsed.error) };
      }
      const args = parsed.data;
      const render = handler.render;
      return {
        ok: true,
        command: {
          plan: () => handler.plan(args, context),
          render: render !== undefined ? (reader) => render(args, context, reader) : undefined,
          execute: (controls) => handler.execute(args, context, controls),
        },
      };
    },
  };
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class CommandRegistry {
  private readonly commands = new Map<string, RegisteredCommand>();
  private sealed = false;

  register(command: RegisteredCommand): this {
    if (this.sealed) {
      throw new Error(`Cannot register '${command.descriptor.id}': registry is sealed`);
    }
    if (this.commands.has(command.descriptor.id)) {
      throw new Error(`Command '${command.descriptor.id}' is already registered`);
    }
    this.commands.set(command.descriptor.id, command);
    return this;
  }

  get(id: string): RegisteredCommand | undefined {
    return this.commands.get(id);
  }

  list(): ReadonlyArray<RegisteredCommand> {
    return [...this.commands.values()];
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }
}
