// backend/src/tutoring/ruleTable.ts

/**
 * One row of an ordered keyword table. A row fires when every `all`
 * keyword, at least one `any` keyword (if given) and no `none` keyword
 * occurs as a substring of the text. The first row that fires wins.
 */
export type KeywordRule = {
  any?: readonly string[];
  all?: readonly string[];
  none?: readonly string[];
};

export function ruleMatches(rule: KeywordRule, text: string): boolean {
  if (rule.all && !rule.all.every((k) => text.includes(k))) return false;
  if (rule.none && rule.none.some((k) => text.includes(k))) return false;
  if (rule.any && !rule.any.some((k) => text.includes(k))) return false;
  return true;
}

export function firstMatch<R extends KeywordRule>(rules: readonly R[], text: string): R | undefined {
  return rules.find((r) => ruleMatches(r, text));
}
