/**
 * Bulwark Kernel — Risk Classifier
 *
 * Pure classification of shell command text and target paths into a
 * RiskLevel. Rules are data: the runtime host loads them from
 * `rules/risk-rules.json` and hands the parsed document to `RiskClassifier`.
 *
 * Command classification:
 * 1. Blocked rules run over the whole normalized text, so a pipeline such as
 *    `curl … | sh` is caught across the `|`.
 * 2. The text is split into segments on `;`, `&&`, `||`, `|` and newlines.
 *    Each segment is Dangerous if a dangerous rule matches, else Moderate if
 *    a moderate rule matches, else Safe if allowlisted, else Moderate.
 * 3. Command substitution makes the result at least Moderate.
 * The result is the maximum over all of the above.
 *
 * Blocked is a hard stop; the pipeline turns it into Deny before approval.
 */

import { basename, extname, sep } from 'node:path';
import { z } from 'zod';
import type { ResolvedPath } from '../adapters/index.js';
import type { RiskAssessment } from '../types/risk.js';
import { RiskLevel, maxRisk } from '../types/risk.js';
import type { PathIntent } from './sandbox.js';

// ---------------------------------------------------------------------------
// Rule Document
// ---------------------------------------------------------------------------

const patternRuleSchema = z.object({
  id: z.string().min(1),
  pattern: z.string().min(1),
  description: z.string(),
});

export const riskRulesSchema = z.object({
  blocked: z.array(patternRuleSchema),
  dangerous: z.array(patternRuleSchema),
  moderate: z.array(patternRuleSchema),
  safe_commands: z.array(z.string().min(1)),
  blocked_paths: z.array(z.string().startsWith('/')),
  protected_names: z.array(z.string().min(1)),
  protected_extensions: z.array(z.string().startsWith('.')),
});

export type RiskRules = z.infer<typeof riskRulesSchema>;
export type PatternRule = z.infer<typeof patternRuleSchema>;

/**
 * Validate a rule document. Throws with the zod issue path on a malformed
 * document or an uncompilable pattern.
 */
export function parseRiskRules(raw: unknown): RiskRules {
  const result = riskRulesSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue !== undefined ? issue.path.join('.') : '(root)';
    throw new Error(`Invalid risk rules at ${where}: ${issue?.message ?? 'unknown error'}`);
  }
  for (const rule of [...result.data.blocked, ...result.data.dangerous, ...result.data.moderate]) {
    try {
      new RegExp(rule.pattern, 'i');
    } catch (err) {
      throw new Error(`Invalid risk rule ${rule.id}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Classifier
// ---------------------------------------------------------------------------

interface CompiledRule {
  readonly id: string;
  readonly regex: RegExp;
}

const SEGMENT_SEPARATOR = /\|\||&&|[;|\n]/;
const COMMAND_SUBSTITUTION = /\$\(|`/;

function compile(rules: ReadonlyArray<PatternRule>): CompiledRule[] {
  return rules.map((rule) => ({ id: rule.id, regex: new RegExp(rule.pattern, 'i') }));
}

function firstMatch(rules: ReadonlyArray<CompiledRule>, text: string): CompiledRule | undefined {
  return rules.find((rule) => rule.regex.test(text));
}

export class RiskClassifier {
  private readonly blocked: CompiledRule[];
  private readonly dangerous: CompiledRule[];
  private readonly moderate: CompiledRule[];
  private readonly safeCommands: ReadonlyArray<string>;
  private readonly blockedPaths: ReadonlyArray<string>;
  private readonly protectedNames: ReadonlySet<string>;
  private readonly protectedExtensions: ReadonlySet<string>;

  constructor(rules: RiskRules) {
    this.blocked = compile(rules.blocked);
    this.dangerous = compile(rules.dangerous);
    this.moderate = compile(rules.moderate);
    this.safeCommands = rules.safe_commands;
    this.blockedPaths = rules.blocked_paths;
    this.protectedNames = new Set(rules.protected_names);
    this.protectedExtensions = new Set(rules.protected_extensions);
  }

  classifyCommand(text: string): RiskAssessment {
    const normalized = text.replace(/[ \t]+/g, ' ').trim();
    if (normalized === '') return { level: RiskLevel.Safe, matched_rules: [] };

    const blocked = this.blocked.filter((rule) => rule.regex.test(normalized));
    if (blocked.length > 0) {
      return { level: RiskLevel.Blocked, matched_rules: blocked.map((rule) => rule.id) };
    }

    const levels: RiskLevel[] = [];
    const matched: string[] = [];

    if (COMMAND_SUBSTITUTION.test(normalized)) {
      levels.push(RiskLevel.Moderate);
      matched.push('command-substitution');
    }

    for (const raw of normalized.split(SEGMENT_SEPARATOR)) {
      const segment = raw.trim();
      if (segment === '') continue;

      const dangerous = firstMatch(this.dangerous, segment);
      if (dangerous !== undefined) {
        levels.push(RiskLevel.Dangerous);
        matched.push(dangerous.id);
        continue;
      }
      const moderate = firstMatch(this.moderate, segment);
      if (moderate !== undefined) {
        levels.push(RiskLevel.Moderate);
        matched.push(moderate.id);
        continue;
      }
      if (this.isAllowlisted(segment)) {
        levels.push(RiskLevel.Safe);
        continue;
      }
      levels.push(RiskLevel.Moderate);
      matched.push('unknown-command');
    }

    return { level: maxRisk(levels), matched_rules: matched };
  }

  classifyPath(resolved: ResolvedPath, intent: PathIntent): RiskAssessment {
    const target = resolved.canonical ?? resolved.absolute;

    if (target === sep) {
      return { level: RiskLevel.Blocked, matched_rules: ['filesystem-root'] };
    }
    const system = this.blockedPaths.find(
      (prefix) => target === prefix || target.startsWith(prefix + sep),
    );
    if (system !== undefined) {
      return { level: RiskLevel.Blocked, matched_rules: [`system-path:${system}`] };
    }

    if (intent === 'read') return { level: RiskLevel.Safe, matched_rules: [] };

    const protectedComponent = target
      .split(sep)
      .find((component) => this.protectedNames.has(component));
    if (protectedComponent !== undefined) {
      return { level: RiskLevel.Dangerous, matched_rules: [`protected-name:${protectedComponent}`] };
    }
    const extension = extname(basename(target)).toLowerCase();
    if (this.protectedExtensions.has(extension)) {
      return { level: RiskLevel.Dangerous, matched_rules: [`protected-extension:${extension}`] };
    }

    if (resolved.exists) {
      return { level: RiskLevel.Moderate, matched_rules: ['overwrite-existing'] };
    }
    return { level: RiskLevel.Safe, matched_rules: [] };
  }

  private isAllowlisted(segment: string): boolean {
    const lower = segment.toLowerCase();
    return this.safeCommands.some((safe) => lower === safe || lower.startsWith(`${safe} `));
  }
}
