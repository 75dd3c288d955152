// src/matching/normalize_text.ts

// Already in normalized form (no accents, lower case). Tokens of length <= 2 are dropped anyway.
const STOPWORDS = new Set([
  'the', 'and', 'les', 'des', 'une', 'aux', 'avec', 'pour', 'sur', 'dans', 'par',
  'feat', 'with',
  'live', 'tour', 'concert', 'concerts', 'show', 'tournee',
  'presents', 'presente', 'artist', 'artiste', 'guest', 'guests', 'special',
  'sold', 'out', 'complet',
]);

// Multi-value separators seen on bills: "A, B & C", "A / B", "A feat. B", "A x B", "A - B"
const SEPARATOR_RE = /[,/&+@–—-]|\b(?:feat|ft|with|x)\b\.?/gi;

export function isStopword(token: string): boolean {
  return STOPWORDS.has(token);
}

/** Lower case, no diacritics, punctuation runs collapsed to one space. */
export function normalizeText(text: string | null | undefined): string {
  if (!text) return '';
  return text
    .normalize('NFKD')
    .toLowerCase()
    .normalize('NFKD')
    .replace(/\p{M}+/gu, '')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

/** Normalized words in their original order, stopwords removed. Used for exact keys. */
export function canonicalName(text: string | null | undefined): string {
  return normalizeText(text)
    .split(' ')
    .filter(word => word.length > 0 && !isStopword(word))
    .join(' ');
}

/** Normalized names on a multi-artist bill ("Daft Punk, Justice & SebastiAn" -> 3 entries). */
export function splitBill(text: string | null | undefined): string[] {
  if (!text) return [];
  const parts = text
    .split(SEPARATOR_RE)
    .map(part => canonicalName(part))
    .filter(part => part.length > 0);
  return Array.from(new Set(parts));
}

export function tokenize(...fields: Array<string | null | undefined>): Set<string> {
  const tokens = new Set<string>();
  for (const field of fields) {
    if (!field) continue;
    for (const part of field.split(SEPARATOR_RE)) {
      for (const word of normalizeText(part).split(' ')) {
        if (word.length <= 2 || isStopword(word)) continue;
        tokens.add(word);
      }
    }
  }
  return tokens;
}

export function sharedCount(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let shared = 0;
  for (const token of small) {
    if (large.has(token)) shared++;
  }
  return shared;
}

/** |A ∩ B| / min(|A|, |B|): a partial bill still scores fully on the shared artist. */
export function overlapCoefficient(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  return sharedCount(a, b) / Math.min(a.size, b.size);
}

/** Whole-word containment of one normalized string in another. */
export function containsWords(haystack: string, needle: string): boolean {
  if (!haystack || !needle) return false;
  return ` ${haystack} `.includes(` ${needle} `);
}
