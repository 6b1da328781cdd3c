/**
 * Bulwark CLI — Approval Prompt Tests
 *
 *   CLI-U7: y/yes approve, d/details shows the preview and asks again,
 *           anything else denies
 *   CLI-U8: the request summary names operation, risk and reason
 *
 * The readline interface is replaced by a scripted questioner.
 */

import { describe, it, expect } from 'vitest';
import { stripVTControlCharacters } from 'node:util';
import type { ApprovalRequest } from '@bulwark/kernel';
import { RiskLevel } from '@bulwark/kernel';
import type { Questioner } from '../src/tui/approval.js';
import { ReadlinePrompter, formatApprovalRequest, parseApprovalAnswer } from '../src/tui/approval.js';

class ScriptedQuestioner implements Questioner {
  readonly queries: string[] = [];

  constructor(private readonly answers: string[]) {}

  async question(query: string): Promise<string> {
    this.queries.push(query);
    return this.answers.shift() ?? '';
  }
}

const request: ApprovalRequest = {
  id: 'req-1',
  command_id: 'write',
  operation: 'write notes.md',
  risk_level: RiskLevel.Moderate,
  description: 'WriteFile requires approval (--ask-for-approval)',
  details: ['--- notes.md', '+++ notes.md'],
  created_at: '2026-01-01T00:00:00.000Z',
};

function prompter(answers: string[]) {
  const rl = new ScriptedQuestioner(answers);
  const written: string[] = [];
  const instance = new ReadlinePrompter(rl, (text) => written.push(stripVTControlCharacters(text)));
  return { rl, written, instance };
}

describe('parseApprovalAnswer', () => {
  it('CLI-U7: maps answers', () => {
    expect(parseApprovalAnswer('y')).toBe('approve');
    expect(parseApprovalAnswer(' YES ')).toBe('approve');
    expect(parseApprovalAnswer('d')).toBe('details');
    expect(parseApprovalAnswer('details')).toBe('details');
    expect(parseApprovalAnswer('')).toBe('deny');
    expect(parseApprovalAnswer('n')).toBe('deny');
    expect(parseApprovalAnswer('sure')).toBe('deny');
  });
});

describe('ReadlinePrompter', () => {
  it('CLI-U7: y approves after one question', async () => {
    const { rl, instance } = prompter(['y']);

    await expect(instance.prompt(request, new AbortController().signal)).resolves.toBe(true);
    expect(rl.queries).toEqual(['  approve? [y/N/details] ']);
  });

  it('CLI-U7: an empty answer denies', async () => {
    const { instance } = prompter(['']);

    await expect(instance.prompt(request, new AbortController().signal)).resolves.toBe(false);
  });

  it('CLI-U7: details prints the preview, then asks again', async () => {
    const { rl, written, instance } = prompter(['details', 'n']);

    await expect(instance.prompt(request, new AbortController().signal)).resolves.toBe(false);
    expect(rl.queries).toHaveLength(2);
    expect(written[1]).toBe('    --- notes.md\n    +++ notes.md\n');
  });

  it('CLI-U8: the summary is written before the first question', async () => {
    const { written, instance } = prompter(['y']);

    await instance.prompt(request, new AbortController().signal);

    expect(written[0]).toBe(
      '\n  approval required  write notes.md\n' +
        '  risk    Moderate\n' +
        '  reason  WriteFile requires approval (--ask-for-approval)\n',
    );
    expect(stripVTControlCharacters(formatApprovalRequest(request))).toBe(written[0]);
  });
});
