import type { Matcher, MatcherFamily } from './types.js';
import { PatternTableError } from '../../utils/errors.js';

const HAN_SCRIPT = /\p{Script=Han}/u;
const WORD_BOUNDARY_ESCAPE = /(?<!\\)(?:\\\\)*\\[bB]/;

class RegexMatcher implements Matcher {
  constructor(
    readonly family: MatcherFamily,
    readonly source: string,
    private readonly regex: RegExp
  ) {}

  match(text: string): string | null {
    const m = this.regex.exec(text);
    return m ? m[0] : null;
  }
}

function compile(source: string, flags: string, category: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    throw new PatternTableError(
      `Invalid pattern for ${category}: /${source}/ (${error instanceof Error ? error.message : String(error)})`,
      category,
      { cause: error }
    );
  }
}

/**
 * Boundary-sensitive matcher for whitespace-delimited scripts.
 * Han characters are rejected: `\b` never fires between them.
 */
export function wordMatcher(source: string, category: string): Matcher {
  if (HAN_SCRIPT.test(source)) {
    throw new PatternTableError(
      `Word pattern for ${category} contains Han characters; declare it as a sequence pattern: /${source}/`,
      category
    );
  }
  return new RegexMatcher('word', source, compile(source, 'i', category));
}

/** Boundary-free matcher for contiguous logographic sequences. */
export function sequenceMatcher(source: string, category: string): Matcher {
  if (WORD_BOUNDARY_ESCAPE.test(source)) {
    throw new PatternTableError(
      `Sequence pattern for ${category} uses a word boundary: /${source}/`,
      category
    );
  }
  return new RegexMatcher('sequence', source, compile(source, 'iu', category));
}

export function createMatcher(family: MatcherFamily, source: string, category: string): Matcher {
  return family === 'word' ? wordMatcher(source, category) : sequenceMatcher(source, category);
}
