/**
 * bulwark history — Inspect recorded sessions and their actions
 *
 *   bulwark history                   → sessions under the home directory
 *   bulwark history --session <id>    → that session's persisted actions
 *
 * The persisted log is append-only: it lists every action a session
 * recorded, including ones later undone in that session.
 */

import { Command } from 'commander';
import type { Action } from '@bulwark/kernel';
import { statePaths } from '@bulwark/kernel';
import type { SessionRecord } from '@bulwark/runtime-host';
import {
  ACTIONS_LOG,
  FileStateIO,
  listSessions,
  readActionHistory,
  readSessionRecord,
  sessionDir,
} from '@bulwark/runtime-host';
import { formatActions } from '../tui/output/result.js';
import { sandboxColor, t } from '../tui/theme.js';
import type { GlobalOptions } from './runtime.js';
import { loadConfig } from './runtime.js';

/** Action summary without file bytes, for `--json`. */
export function actionSummary(action: Action) {
  return {
    id: action.id,
    command: action.command,
    timestamp: action.timestamp,
    reversible: action.reversible,
    description: action.description,
    kind: action.state_after.kind,
    paths: [...new Set([...statePaths(action.state_before), ...statePaths(action.state_after)])],
  };
}

export function formatSessions(sessions: ReadonlyArray<SessionRecord>): string {
  if (sessions.length === 0) return '\n  ' + t.muted('no sessions recorded') + '\n';
  let out = '\n';
  for (const session of sessions) {
    out +=
      '  ' + t.dim(session.started_at) + '  ' +
      t.white(session.session_id) + '  ' +
      sandboxColor(session.sandbox_level)(session.sandbox_level) + '  ' +
      t.muted(session.workspace_root) + '\n';
  }
  return out;
}

interface HistoryOptions {
  session?: string;
  json?: boolean;
}

export const historyCommand = new Command('history')
  .description('List recorded sessions, or the actions of one session')
  .option('--session <id>', 'Session whose actions to show')
  .option('--json', 'Output as JSON')
  .action((options: HistoryOptions, command: Command) => {
    const { home } = loadConfig(command.optsWithGlobals<GlobalOptions>());

    if (options.session === undefined) {
      const sessions = listSessions(home);
      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify(sessions, null, 2));
        return;
      }
      process.stdout.write(formatSessions(sessions));
      return;
    }

    const io = new FileStateIO(sessionDir(home, options.session));
    const record = readSessionRecord(io);
    if (record === null) {
      process.stderr.write(`[bulwark history] Session not found: ${options.session}\n`);
      process.exit(1);
    }
    const { actions, skipped } = readActionHistory(io.readLogRaw(ACTIONS_LOG));

    if (options.json === true) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({ session: record, actions: actions.map(actionSummary), skipped }, null, 2));
      return;
    }
    process.stdout.write(formatSessions([record]));
    process.stdout.write(formatActions(actions));
    if (skipped > 0) process.stdout.write('\n  ' + t.amber(`${skipped} unreadable line(s) skipped`) + '\n');
  });
