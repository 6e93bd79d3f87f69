/**
 * Whole-word hints that mark a venue name as club-like.
 * Multi-word hints match with any run of whitespace between the words.
 */
export const clubHints: readonly string[] = [
  'club',
  'nightclub',
  'discotheque',
  'warehouse',
  'lounge',
  'basement',
  'side room',
  'room',
  'terrace',
  'bar',
]

/**
 * Build the case-insensitive matcher for a list of venue hints.
 * Word edges are Unicode aware, so "Barça" does not contain "bar".
 * @param hints The hints to match as whole words
 */
export const buildVenueMatcher = (hints: readonly string[]): RegExp => {
  const patterns = hints.map(
    (hint) =>
      `(?<![\\p{L}\\p{N}_])${hint
        .split(/\s+/)
        .map((word) => word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'))
        .join('\\s+')}(?![\\p{L}\\p{N}_])`
  )
  return new RegExp(patterns.join('|'), 'iu')
}
