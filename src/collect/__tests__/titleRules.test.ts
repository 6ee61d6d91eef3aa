import { describe, it, expect } from 'vitest';
import { pickTitleMatch, type TitleRuleConfig } from '../titleRules.js';

const LAWS = [
  { id: 'L4', title: '民事訴訟規則' },
  { id: 'L1', title: '民法' },
  { id: 'L2', title: '民法施行法' },
  { id: 'L3', title: '民事訴訟法' },
];

const NONE: TitleRuleConfig = { exact_allow: [], prefix_allow: [], include_suffixes: [], exclude_phrases: [] };

describe('pickTitleMatch', () => {
  it('prefers an exact title', () => {
    const match = pickTitleMatch(LAWS, '民法', NONE);
    expect(match?.candidate.id).toBe('L1');
    expect(match?.rule).toBe('exact');
  });

  it('uses the allowlist before prefix matching', () => {
    const match = pickTitleMatch(LAWS, '民事', { ...NONE, exact_allow: ['民事訴訟規則'] });
    expect(match?.candidate.id).toBe('L4');
    expect(match?.rule).toBe('allowlist');
  });

  it('matches allowlisted prefixes', () => {
    const match = pickTitleMatch(LAWS, '刑法', { ...NONE, prefix_allow: ['民法施'] });
    expect(match?.candidate.id).toBe('L2');
    expect(match?.rule).toBe('allowlist');
  });

  it('requires a configured suffix for prefix matches', () => {
    const match = pickTitleMatch(LAWS, '民事', { ...NONE, include_suffixes: ['法'] });
    expect(match?.candidate.id).toBe('L3');
    expect(match?.rule).toBe('prefix');
  });

  it('drops titles with excluded phrases and keeps the shortest', () => {
    const match = pickTitleMatch(LAWS, '民', { ...NONE, exclude_phrases: ['施行'] });
    expect(match?.candidate.id).toBe('L1');
    expect(match?.rule).toBe('prefix');
  });

  it('breaks length ties by id', () => {
    const match = pickTitleMatch(
      [
        { id: 'b', title: '会社法A' },
        { id: 'a', title: '会社法B' },
      ],
      '会社法',
      NONE,
    );
    expect(match?.candidate.id).toBe('a');
  });

  it('returns null when nothing matches', () => {
    expect(pickTitleMatch(LAWS, '刑法', NONE)).toBeNull();
  });
});
