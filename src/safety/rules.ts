// ═══════════════════════════════════════════════════════════
// TERMSAGE — Danger Rule Table
// Versioned, ordered data; loaded once and validated
// ═══════════════════════════════════════════════════════════

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { RuleTableError } from '../core/errors.js';
import { SAFETY_LEVELS, SAFETY_RANK } from '../core/types.js';
import type { DangerRule, RuleTable, SafetyLevel } from '../core/types.js';

/** rules/ sits at the package root, two levels above both src/safety and dist/safety */
export const DEFAULT_RULES_PATH = fileURLToPath(new URL('../../rules/danger-rules.json', import.meta.url));

const ruleSchema = z.object({
  id: z.string().min(1),
  pattern: z.string().min(1),
  match: z.enum(['substring', 'regex']),
  level: z.enum(SAFETY_LEVELS),
  reason: z.string().min(1),
});

const tableSchema = z.object({
  version: z.string().min(1),
  rules: z.array(ruleSchema),
});

/** A rule with its matcher prepared */
export interface CompiledRule extends DangerRule {
  test(command: string): boolean;
}

function compileRule(rule: DangerRule): CompiledRule {
  if (rule.match === 'substring') {
    return { ...rule, test: command => command.includes(rule.pattern) };
  }

  let regex: RegExp;
  try {
    // No flags: matching is case-sensitive and stateless
    regex = new RegExp(rule.pattern);
  } catch (error) {
    throw new RuleTableError(`Rule '${rule.id}' has an invalid pattern`, { cause: error });
  }
  return { ...rule, test: command => regex.test(command) };
}

export interface CompiledRuleTable {
  version: string;
  rules: CompiledRule[];
}

/** Validate raw JSON and compile every pattern */
export function parseRuleTable(raw: unknown): CompiledRuleTable {
  const parsed = tableSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new RuleTableError(`Malformed rule table: ${detail}`);
  }

  const table: RuleTable = parsed.data;
  const seen = new Set<string>();
  for (const rule of table.rules) {
    if (seen.has(rule.id)) {
      throw new RuleTableError(`Duplicate rule id '${rule.id}'`);
    }
    seen.add(rule.id);
  }

  return {
    version: table.version,
    rules: table.rules.map(compileRule),
  };
}

export function loadRuleTable(path: string = DEFAULT_RULES_PATH): CompiledRuleTable {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new RuleTableError(`Cannot read rule table at ${path}`, { cause: error });
  }
  return parseRuleTable(raw);
}

let defaultTable: CompiledRuleTable | null = null;

/** The bundled table, loaded on first use */
export function getDefaultRuleTable(): CompiledRuleTable {
  if (!defaultTable) defaultTable = loadRuleTable();
  return defaultTable;
}

/** Rules that apply at `level`, in table order */
export function rulesForLevel(table: CompiledRuleTable, level: SafetyLevel): CompiledRule[] {
  return table.rules.filter(rule => SAFETY_RANK[rule.level] <= SAFETY_RANK[level]);
}

/** One-line summary of what each level flags */
export const SAFETY_DESCRIPTIONS: Record<SafetyLevel, string> = {
  low: 'Low safety: only flags extremely dangerous commands (e.g. rm -rf /, fork bombs)',
  medium: 'Medium safety: also flags destructive file operations, system file changes and remote code execution',
  high: 'High safety: also flags sudo, account changes, services, disks, firewalls and key tools',
};
