import type { ApprovalPrompter, ApprovalRequest } from '@bulwark/kernel'
import { riskColor, t } from './theme.js'

/** The slice of a `readline/promises` Interface the prompter needs. */
export interface Questioner {
  question(query: string, options: { signal: AbortSignal }): Promise<string>
}

export type ApprovalAnswer = 'approve' | 'deny' | 'details'

/** Anything other than y/yes or d/details is a denial. */
export function parseApprovalAnswer(raw: string): ApprovalAnswer {
  const answer = raw.trim().toLowerCase()
  if (answer === 'y' || answer === 'yes') return 'approve'
  if (answer === 'd' || answer === 'details') return 'details'
  return 'deny'
}

export function formatApprovalRequest(request: ApprovalRequest): string {
  return (
    '\n  ' + t.amber('approval required') + '  ' + t.white(request.operation) + '\n' +
    '  ' + t.muted('risk    ') + riskColor(request.risk_level)(request.risk_level) + '\n' +
    '  ' + t.muted('reason  ') + t.text(request.description) + '\n'
  )
}

export function formatApprovalDetails(request: ApprovalRequest): string {
  if (request.details.length === 0) return '  ' + t.dim('(no preview available)') + '\n'
  return request.details.map(line => '    ' + t.text(line)).join('\n') + '\n'
}

/**
 * ReadlinePrompter — inline `[y/N/details]` approval prompt.
 *
 * `details` prints the preview and asks again. The request's abort signal
 * cancels the open question when the request settles some other way.
 */
export class ReadlinePrompter implements ApprovalPrompter {
  constructor(
    private readonly rl: Questioner,
    private readonly write: (text: string) => void,
  ) {}

  async prompt(request: ApprovalRequest, signal: AbortSignal): Promise<boolean> {
    this.write(formatApprovalRequest(request))
    for (;;) {
      const answer = parseApprovalAnswer(await this.rl.question('  approve? [y/N/details] ', { signal }))
      if (answer === 'details') {
        this.write(formatApprovalDetails(request))
        continue
      }
      return answer === 'approve'
    }
  }
}
