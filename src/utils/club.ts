import { buildVenueMatcher, clubHints } from '../config/venues'

const clubMatcher = buildVenueMatcher(clubHints)

/**
 * Whether a venue name carries one of the club hints as a whole word
 * @param venueName - The venue name, may be missing
 */
export const looksLikeClub = (venueName?: string | null): boolean =>
  clubMatcher.test(venueName ?? '')
