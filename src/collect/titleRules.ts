export interface TitleCandidate {
  id: string;
  title: string;
}

export interface TitleRuleConfig {
  exact_allow: readonly string[];
  prefix_allow: readonly string[];
  include_suffixes: readonly string[];
  exclude_phrases: readonly string[];
}

export interface TitleRule {
  name: 'exact' | 'allowlist' | 'prefix';
  matches(title: string, keyword: string, config: TitleRuleConfig): boolean;
}

export interface TitleMatch<T extends TitleCandidate> {
  candidate: T;
  rule: TitleRule['name'];
}

export const exactRule: TitleRule = {
  name: 'exact',
  matches: (title, keyword) => title === keyword,
};

export const allowlistRule: TitleRule = {
  name: 'allowlist',
  matches: (title, _keyword, config) =>
    config.exact_allow.includes(title) || config.prefix_allow.some((p) => p.length > 0 && title.startsWith(p)),
};

export const prefixRule: TitleRule = {
  name: 'prefix',
  matches: (title, keyword, config) => {
    if (!title.startsWith(keyword)) return false;
    if (config.exclude_phrases.some((p) => p.length > 0 && title.includes(p))) return false;
    if (config.include_suffixes.length === 0) return true;
    return config.include_suffixes.some((s) => title.endsWith(s));
  },
};

/** Evaluated in order; the first rule with any match decides. */
export const TITLE_RULES: readonly TitleRule[] = [exactRule, allowlistRule, prefixRule];

function byShortestTitle(a: TitleCandidate, b: TitleCandidate): number {
  if (a.title.length !== b.title.length) return a.title.length - b.title.length;
  if (a.id < b.id) return -1;
  return a.id > b.id ? 1 : 0;
}

/**
 * Pick the candidate that best matches `keyword`. Within the winning rule the
 * shortest title wins, then the smallest id.
 */
export function pickTitleMatch<T extends TitleCandidate>(
  candidates: readonly T[],
  keyword: string,
  config: TitleRuleConfig,
  rules: readonly TitleRule[] = TITLE_RULES,
): TitleMatch<T> | null {
  for (const rule of rules) {
    const hits = candidates.filter((c) => rule.matches(c.title, keyword, config));
    if (hits.length > 0) {
      const [best] = [...hits].sort(byShortestTitle);
      return { candidate: best, rule: rule.name };
    }
  }
  return null;
}
