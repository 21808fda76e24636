import { cleanText } from './text';

export interface BlockRule {
  pattern: string | RegExp;
  label: string;
}

/**
 * Evaluated top to bottom; the first rule that matches decides the label.
 * String patterns are lower-case substrings of the normalised page text.
 */
export const DEFAULT_BLOCK_RULES: readonly BlockRule[] = [
  { pattern: 'access denied', label: 'access-denied' },
  { pattern: 'request blocked', label: 'request-blocked' },
  { pattern: 'temporarily unavailable', label: 'temporarily-unavailable' },
  { pattern: 'captcha', label: 'captcha' },
  { pattern: 'are you human', label: 'human-check' },
  { pattern: 'akamai', label: 'akamai' },
  { pattern: /checking your browser|attention required!? \| cloudflare/, label: 'cloudflare-challenge' },
  { pattern: 'cloudflare', label: 'cloudflare' },
];

export function buildBlockRules(extraPatterns: readonly string[] = []): BlockRule[] {
  const extra = extraPatterns.map(pattern => ({ pattern: pattern.toLowerCase(), label: `custom:${pattern}` }));
  return [...DEFAULT_BLOCK_RULES, ...extra];
}

function matches(rule: BlockRule, haystack: string): boolean {
  if (typeof rule.pattern === 'string') {
    return haystack.includes(rule.pattern);
  }
  // global/sticky expressions keep a cursor between calls
  rule.pattern.lastIndex = 0;
  return rule.pattern.test(haystack);
}

/**
 * Returns the first rule matching the page title and visible text, or null.
 * Pure: the same input always yields the same rule.
 */
export function classifyBlock(text: string, title: string, rules: readonly BlockRule[]): BlockRule | null {
  const haystack = cleanText(`${title} ${text}`).toLowerCase();
  for (const rule of rules) {
    if (matches(rule, haystack)) return rule;
  }
  return null;
}
