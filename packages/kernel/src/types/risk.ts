/**
 * Bulwark Kernel — Risk Types
 *
 * Danger classification of a concrete operation (shell text or target path),
 * independent of the sandbox level. Ephemeral: computed per pipeline run.
 */

export enum RiskLevel {
  Safe = 'Safe',
  Moderate = 'Moderate',
  Dangerous = 'Dangerous',
  /** Hard stop. Forces Deny regardless of sandbox level or approval. */
  Blocked = 'Blocked',
}

export const RISK_LEVEL_ORDER: Readonly<Record<RiskLevel, number>> = {
  [RiskLevel.Safe]: 0,
  [RiskLevel.Moderate]: 1,
  [RiskLevel.Dangerous]: 2,
  [RiskLevel.Blocked]: 3,
} as const;

/** The most severe of the given levels; Safe for an empty list. */
export function maxRisk(levels: ReadonlyArray<RiskLevel>): RiskLevel {
  let worst = RiskLevel.Safe;
  for (const level of levels) {
    if (RISK_LEVEL_ORDER[level] > RISK_LEVEL_ORDER[worst]) worst = level;
  }
  return worst;
}

/** Result of a classification, with the ids of the rules that fired. */
export interface RiskAssessment {
  readonly level: RiskLevel;
  readonly matched_rules: ReadonlyArray<string>;
}
