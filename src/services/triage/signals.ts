// Symptom text normalization and keyword detection
// Whole-token matching only: "ear" never matches "early"

const NON_WORD_REGEX = /[^\p{L}\p{M}\p{N}\s]+/gu;
const WHITESPACE_REGEX = /\s+/;

export function tokenize(text: unknown): string[] {
  if (typeof text !== 'string') return [];

  // NFC so composed and decomposed accents produce the same tokens
  return text
    .normalize('NFC')
    .toLowerCase()
    .replace(NON_WORD_REGEX, ' ')
    .split(WHITESPACE_REGEX)
    .filter(Boolean);
}

export function normalizeKeyword(keyword: string): string {
  return tokenize(keyword).join(' ');
}

function containsRun(tokens: readonly string[], phrase: readonly string[]): boolean {
  const last = tokens.length - phrase.length;
  for (let start = 0; start <= last; start++) {
    let matched = true;
    for (let offset = 0; offset < phrase.length; offset++) {
      if (tokens[start + offset] !== phrase[offset]) {
        matched = false;
        break;
      }
    }
    if (matched) return true;
  }
  return false;
}

/**
 * Returns the keywords found in the token sequence, in keyword declaration order.
 * Single words are looked up in a set; phrases must appear as a consecutive run.
 */
export function detectKeywords(
  tokens: readonly string[],
  tokenSet: ReadonlySet<string>,
  keywords: readonly string[],
): string[] {
  const found: string[] = [];

  for (const keyword of keywords) {
    const parts = keyword.split(' ');
    const hit = parts.length === 1
      ? tokenSet.has(keyword)
      : containsRun(tokens, parts);
    if (hit) found.push(keyword);
  }

  return found;
}
