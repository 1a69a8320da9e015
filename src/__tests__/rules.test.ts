import { describe, it, expect } from 'vitest';
import {
  DEFAULT_RULES_PATH,
  getDefaultRuleTable,
  loadRuleTable,
  parseRuleTable,
  rulesForLevel,
} from '../safety/rules.js';
import { RuleTableError } from '../core/errors.js';

describe('shipped rule table', () => {
  const table = getDefaultRuleTable();

  it('should load with a version and rules in every tier', () => {
    expect(table.version).not.toBe('');
    expect(rulesForLevel(table, 'low').length).toBeGreaterThan(0);
    expect(rulesForLevel(table, 'medium').length).toBeGreaterThan(rulesForLevel(table, 'low').length);
    expect(rulesForLevel(table, 'high').length).toBe(table.rules.length);
  });

  it('should nest the rule sets: high ⊇ medium ⊇ low', () => {
    const ids = (level: 'low' | 'medium' | 'high') => new Set(rulesForLevel(table, level).map(r => r.id));
    const low = ids('low');
    const medium = ids('medium');
    const high = ids('high');

    for (const id of low) expect(medium.has(id)).toBe(true);
    for (const id of medium) expect(high.has(id)).toBe(true);
  });

  it('should keep table order inside each level', () => {
    const order = table.rules.map(r => r.id);
    const mediumOrder = rulesForLevel(table, 'medium').map(r => r.id);
    expect(mediumOrder).toEqual(order.filter(id => mediumOrder.includes(id)));
  });

  it('should carry the required always-on rules', () => {
    const lowIds = rulesForLevel(table, 'low').map(r => r.id);
    expect(lowIds).toEqual(expect.arrayContaining([
      'rm-root', 'rm-home', 'block-device-redirect', 'mkfs', 'fork-bomb', 'power-state',
    ]));
  });

  it('should load the same table from the default path', () => {
    expect(loadRuleTable(DEFAULT_RULES_PATH).rules.map(r => r.id)).toEqual(table.rules.map(r => r.id));
  });
});

describe('parseRuleTable', () => {
  it('should reject an unknown level', () => {
    expect(() => parseRuleTable({
      version: '1',
      rules: [{ id: 'x', pattern: 'x', match: 'substring', level: 'extreme', reason: 'x' }],
    })).toThrow(RuleTableError);
  });

  it('should reject an invalid regular expression', () => {
    expect(() => parseRuleTable({
      version: '1',
      rules: [{ id: 'broken', pattern: '(', match: 'regex', level: 'low', reason: 'x' }],
    })).toThrow("Rule 'broken' has an invalid pattern");
  });

  it('should reject duplicate ids', () => {
    const rule = { id: 'dup', pattern: 'x', match: 'substring', level: 'low', reason: 'x' };
    expect(() => parseRuleTable({ version: '1', rules: [rule, rule] })).toThrow("Duplicate rule id 'dup'");
  });

  it('should report a missing file', () => {
    expect(() => loadRuleTable('/nonexistent/rules.json')).toThrow(RuleTableError);
  });
});
