/**
 * Bulwark Shell Commands — Manifest
 *
 * `run` executes arbitrary shell text and is only available at the
 * full-access sandbox level. `check` is the narrow workspace opt-in: it
 * runs one of a configured allowlist of project scripts (tests, lint) at
 * workspace-write. Both always require approval and always render a
 * preview.
 */

import { z } from 'zod';
import type { CommandDescriptor } from '@bulwark/kernel';
import { Capability, PreviewMode } from '@bulwark/kernel';

export const RUN_DESCRIPTOR: CommandDescriptor = {
  id: 'run',
  description: 'Run a shell command in the workspace root',
  required_capabilities: [Capability.ExecuteShell],
  requires_approval: true,
  preview_mode: PreviewMode.Always,
  workspace_shell_opt_in: false,
  supports_dry_run: true,
};

export const CHECK_DESCRIPTOR: CommandDescriptor = {
  id: 'check',
  description: 'Run an allowlisted project script (tests, lint) in the workspace root',
  required_capabilities: [Capability.ExecuteShell],
  requires_approval: true,
  preview_mode: PreviewMode.Always,
  workspace_shell_opt_in: true,
  supports_dry_run: true,
};

const ENV_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const runArgsSchema = z
  .object({
    command: z.string().trim().min(1, 'command must not be empty'),
    timeout_ms: z.number().int().positive().optional(),
    env: z
      .record(z.string())
      .refine((env) => Object.keys(env).every((name) => ENV_NAME.test(name)), 'env names must be identifiers')
      .optional(),
  })
  .strict();

export type RunArgs = z.infer<typeof runArgsSchema>;

export function checkArgsSchema(allowed: ReadonlyArray<string>) {
  return z
    .object({
      script: z.string().trim(),
    })
    .strict()
    .superRefine((args, ctx) => {
      if (!allowed.includes(args.script)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['script'],
          message: `'${args.script}' is not an allowed check script (allowed: ${allowed.join(', ') || 'none'})`,
        });
      }
    });
}

export type CheckArgs = z.infer<ReturnType<typeof checkArgsSchema>>;
