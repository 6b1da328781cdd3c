/**
 * bulwark audit — Read the audit log
 *
 * Entries are de-duplicated and ordered by the reader; `--session` and
 * `--limit` narrow the result. `--view` opens the full-screen Ink view.
 */

import { Command } from 'commander';
import React from 'react';
import { render } from 'ink';
import type { AuditSelection } from '@bulwark/runtime-host';
import { readAuditFile, readAuditLog, selectAuditEntries } from '@bulwark/runtime-host';
import type { AuditData } from '../tui/audit/AuditView.js';
import { AuditView } from '../tui/audit/AuditView.js';
import { formatAuditLog } from '../tui/output/audit.js';
import { parsePositiveInt } from './args.js';
import type { GlobalOptions } from './runtime.js';
import { loadConfig } from './runtime.js';

export async function loadAudit(path: string, selection: AuditSelection = {}): Promise<AuditData> {
  const { entries, stats } = readAuditLog(await readAuditFile(path));
  return { entries: selectAuditEntries(entries, selection), stats };
}

export async function showAuditView(path: string, selection: AuditSelection = {}): Promise<void> {
  const { waitUntilExit } = render(
    React.createElement(AuditView, {
      load: () => loadAudit(path, selection),
      source: path,
      onExit: () => { /* teardown is Ink's */ },
    }),
  );
  await waitUntilExit();
}

interface AuditOptions {
  session?: string;
  limit?: string;
  json?: boolean;
  view?: boolean;
}

export const auditCommand = new Command('audit')
  .description('Show audit log entries')
  .option('--session <id>', 'Only entries from this session')
  .option('--limit <n>', 'Only the most recent n entries')
  .option('--json', 'Output entries and read statistics as JSON')
  .option('--view', 'Open the full-screen audit view')
  .action(async (options: AuditOptions, command: Command) => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const limit = options.limit === undefined ? undefined : parsePositiveInt(options.limit, '--limit');
    const selection: AuditSelection = { sessionId: options.session, limit };
    const { auditPath } = loadConfig(globals);

    if (options.view === true) {
      await showAuditView(auditPath, selection);
      return;
    }

    const { entries, stats } = await loadAudit(auditPath, selection);
    if (options.json === true) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({ path: auditPath, entries, stats }, null, 2));
      return;
    }
    process.stdout.write(formatAuditLog(entries, stats));
  });
