/**
 * Bulwark Runtime Host — Pattern Redactor
 *
 * Default Redactor for audit events. Built-in patterns cover credentials that
 * commonly leak through command text and output (cloud access keys, provider
 * API keys, GitHub and Slack tokens, PEM private-key headers, JWTs, bearer
 * tokens) plus `password=`-style assignments, where the key is kept and only
 * the value is replaced.
 *
 * Operators add patterns through `redact_patterns` in config.json.
 */

import type { Redactor } from '@bulwark/kernel';

export const REDACTED = '[REDACTED]';

interface RedactionRule {
  readonly pattern: RegExp;
  /** Replacement string; `$1` keeps a captured prefix. */
  readonly replacement: string;
}

const BUILTIN_RULES: ReadonlyArray<RedactionRule> = [
  { pattern: /\bAKIA[0-9A-Z]{16}\b/g, replacement: REDACTED },
  { pattern: /\bsk-[A-Za-z0-9_-]{20,}/g, replacement: REDACTED },
  { pattern: /\b(?:ghp|gho|ghu|ghs|ghr)_[A-Za-z0-9_]{36,}\b/g, replacement: REDACTED },
  { pattern: /\bgithub_pat_[A-Za-z0-9_]{22,}\b/g, replacement: REDACTED },
  { pattern: /\bxox[bpars]-[A-Za-z0-9-]{10,}\b/g, replacement: REDACTED },
  { pattern: /-----BEGIN (?:RSA |EC |DSA |OPENSSH )?PRIVATE KEY-----/g, replacement: REDACTED },
  { pattern: /\beyJ[A-Za-z0-9_-]{10,}\.eyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}/g, replacement: REDACTED },
  { pattern: /\b(Bearer\s+)[A-Za-z0-9._~+/-]+=*/gi, replacement: `$1${REDACTED}` },
  {
    pattern: /\b((?:password|passwd|secret|token|api[_-]?key)\s*[:=]\s*["']?)[^\s"'&]+/gi,
    replacement: `$1${REDACTED}`,
  },
];

/**
 * Compile operator-supplied patterns. Throws on the first pattern that is
 * not a valid regular expression.
 */
export function compileRedactPatterns(patterns: ReadonlyArray<string>): RedactionRule[] {
  return patterns.map((source) => {
    try {
      return { pattern: new RegExp(source, 'g'), replacement: REDACTED };
    } catch (err: unknown) {
      throw new Error(`invalid redact pattern '${source}': ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }
  });
}

export class PatternRedactor implements Redactor {
  private readonly rules: ReadonlyArray<RedactionRule>;

  constructor(extraPatterns: ReadonlyArray<string> = []) {
    this.rules = [...BUILTIN_RULES, ...compileRedactPatterns(extraPatterns)];
  }

  redact(text: string): string {
    let out = text;
    for (const rule of this.rules) {
      out = out.replace(rule.pattern, rule.replacement);
    }
    return out;
  }
}
