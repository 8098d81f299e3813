/**
 * Case conventions accepted by `$rename-all`.
 */
export const RENAME_RULES = [
  'lowercase',
  'UPPERCASE',
  'PascalCase',
  'camelCase',
  'snake_case',
  'SCREAMING_SNAKE_CASE',
  'kebab-case',
  'SCREAMING-KEBAB-CASE',
] as const;

export type RenameRule = (typeof RENAME_RULES)[number];

export function isRenameRule(text: string): text is RenameRule {
  return (RENAME_RULES as readonly string[]).includes(text);
}

/**
 * Splits an identifier into lowercase words at `_`, `-`, whitespace and
 * lower-to-upper case transitions.
 *
 * @example
 * ```typescript
 * splitWords('maxRetryCount'); // ['max', 'retry', 'count']
 * splitWords('HTTP_PORT');     // ['http', 'port']
 * ```
 */
export function splitWords(name: string): string[] {
  return name
    .replace(/([\p{Ll}\p{N}])(\p{Lu})/gu, '$1 $2')
    .replace(/(\p{Lu})(\p{Lu}\p{Ll})/gu, '$1 $2')
    .split(/[\s_-]+/)
    .filter((w) => w !== '')
    .map((w) => w.toLowerCase());
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/**
 * Renames a field or variant name according to `rule`.
 */
export function applyRenameRule(name: string, rule: RenameRule): string {
  const words = splitWords(name);
  switch (rule) {
    case 'lowercase':
      return words.join('');
    case 'UPPERCASE':
      return words.join('').toUpperCase();
    case 'PascalCase':
      return words.map(capitalize).join('');
    case 'camelCase':
      return words.map((w, i) => (i === 0 ? w : capitalize(w))).join('');
    case 'snake_case':
      return words.join('_');
    case 'SCREAMING_SNAKE_CASE':
      return words.join('_').toUpperCase();
    case 'kebab-case':
      return words.join('-');
    case 'SCREAMING-KEBAB-CASE':
      return words.join('-').toUpperCase();
  }
}
