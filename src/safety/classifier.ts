// ═══════════════════════════════════════════════════════════
// TERMSAGE — Risk Classifier
// (command, safety level) → Safe | Warn(reasons)
// ═══════════════════════════════════════════════════════════

import type { RiskVerdict, SafetyLevel } from '../core/types.js';
import { getDefaultRuleTable, rulesForLevel } from './rules.js';
import type { CompiledRuleTable } from './rules.js';

/**
 * Classify a sanitized command against the rule table.
 *
 * Every applicable rule is evaluated so the verdict lists all concerns, in
 * table order and without duplicate reasons. This is advisory pattern
 * matching: it misses obfuscated commands and flags harmless mentions.
 */
export function classify(
  command: string,
  level: SafetyLevel,
  table: CompiledRuleTable = getDefaultRuleTable(),
): RiskVerdict {
  const reasons: string[] = [];

  for (const rule of rulesForLevel(table, level)) {
    if (rule.test(command) && !reasons.includes(rule.reason)) {
      reasons.push(rule.reason);
    }
  }

  return reasons.length === 0 ? { kind: 'safe' } : { kind: 'warn', reasons };
}

export function isWarn(verdict: RiskVerdict): verdict is { kind: 'warn'; reasons: string[] } {
  return verdict.kind === 'warn';
}
