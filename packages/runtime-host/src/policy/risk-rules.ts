/**
 * Bulwark Runtime Host — Risk Rule Loader
 *
 * Reads a risk-rule document from disk and validates it with the kernel's
 * schema. The bundled rules ship in `rules/risk-rules.json` beside this
 * package's sources; `risk_rules_path` in config.json replaces them.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { RiskRules } from '@bulwark/kernel';
import { CommandError, ErrorKind, parseRiskRules } from '@bulwark/kernel';

export const DEFAULT_RISK_RULES_PATH = fileURLToPath(new URL('../../rules/risk-rules.json', import.meta.url));

export function loadRiskRules(path: string = DEFAULT_RISK_RULES_PATH): RiskRules {
  const raw = readFileSync(path, 'utf-8');
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CommandError(ErrorKind.InvalidArguments, `${path} is not valid JSON: ${message}`, { cause: err });
  }
  try {
    return parseRiskRules(document);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CommandError(ErrorKind.InvalidArguments, `${path}: ${message}`, { cause: err });
  }
}
