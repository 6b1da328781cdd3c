/**
 * bulwark status — Show the effective configuration
 *
 * Displays:
 * - sandbox level, approval mode and `--ask-for-approval`
 * - workspace root, home directory and audit file
 * - capabilities the sandbox can grant
 * - registered commands and whether each can run at this level
 *
 * Reads configuration only; no session is opened.
 */

import { Command } from 'commander';
import { grantedCapabilities } from '@bulwark/kernel';
import { formatStatus, isAvailable } from '../tui/output/status.js';
import type { GlobalOptions } from './runtime.js';
import { buildCommands, loadConfig } from './runtime.js';

export const statusCommand = new Command('status')
  .description('Show sandbox level, approval mode, paths and available commands')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }, command: Command) => {
    const config = loadConfig(command.optsWithGlobals<GlobalOptions>());
    const descriptors = buildCommands(config).map((entry) => entry.descriptor);

    if (options.json === true) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({
        workspace_root: config.workspaceRoot,
        home: config.home,
        sandbox_level: config.sandboxLevel,
        approval_mode: config.approvalMode,
        ask_for_approval: config.requireApproval,
        audit_enabled: config.auditEnabled,
        audit_path: config.auditPath,
        capabilities: [...grantedCapabilities(config.sandboxLevel, { requireApproval: config.requireApproval })],
        commands: descriptors.map((descriptor) => ({
          id: descriptor.id,
          capabilities: descriptor.required_capabilities,
          requires_approval: descriptor.requires_approval,
          available: isAvailable(config, descriptor),
        })),
      }, null, 2));
      return;
    }

    process.stdout.write(formatStatus({ config, commands: descriptors }));
  });
