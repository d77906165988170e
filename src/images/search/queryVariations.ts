/**
 * Query rewriting for destination image search. A literal destination
 * name often yields too few usable landscape shots, so the search widens
 * through progressively more generic variations.
 */

export const PEOPLE_FOCUS_KEYWORDS: readonly string[] = ['selfie', 'portrait', 'headshot'];

export const EXCLUSION_MARKER = '-';

export const MAX_QUERY_VARIATIONS = 5;

function tokenize(query: string): string[] {
  return query.toLowerCase().split(/\s+/).filter(Boolean);
}

/**
 * Lower-cases the query and drops people-focus words and `-excluded` tokens.
 */
export function sanitizeQuery(query: string): string {
  const kept = tokenize(query).filter(
    word => !PEOPLE_FOCUS_KEYWORDS.includes(word) && !word.startsWith(EXCLUSION_MARKER)
  );
  return kept.length > 0 ? kept.join(' ') : query.trim().toLowerCase();
}

/** First word of the sanitized query, used as the destination name. */
export function primaryTerm(query: string): string {
  const sanitized = sanitizeQuery(query);
  return sanitized.split(' ')[0] || sanitized;
}

function mentionsIndia(words: string[]): boolean {
  return words.includes('india') || words.includes('indian');
}

export function buildQueryVariations(query: string): string[] {
  const base = sanitizeQuery(query);
  const words = base.split(' ').filter(Boolean);
  const primary = words[0] ?? base;
  const multiWord = words.length > 1;
  const india = mentionsIndia(words);

  const variations = [
    base,
    multiWord ? `${primary} landmark` : base,
    multiWord ? `${primary} cityscape` : `${base} city`,
    india ? 'india rajasthan heritage' : `${primary} architecture`,
    india ? 'india tourist attraction beautiful' : `${base} travel destination`,
  ];

  return Array.from(new Set(variations.filter(Boolean))).slice(0, MAX_QUERY_VARIATIONS);
}

/**
 * True when any people-focus word appears in the candidate's tags, alt
 * text or description.
 */
export function isPeopleFocused(text: string): boolean {
  const lower = text.toLowerCase();
  return PEOPLE_FOCUS_KEYWORDS.some(keyword => lower.includes(keyword));
}
