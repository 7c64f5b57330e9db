/**
 * Name Normalizer — Entity Name → Matching Key
 * Layer: Domain
 *
 * "Pelican Bay Foundation, Inc." and "PELICAN BAY FOUNDATION INC" should meet
 * at the same key. The rule:
 *
 *   1. ASCII upper-case (no locale rules; registry names are ASCII);
 *   2. collapse whitespace runs to one space and trim;
 *   3. strip a trailing suffix token, longest token first, and repeat until
 *      no token applies (re-collapsing after each strip).
 *
 * Because step 3 runs to a fixpoint on already-collapsed text, the output is
 * a fixpoint of the whole rule: normalize(normalize(x)) === normalize(x).
 *
 * A token that starts with a letter or digit only matches on a word boundary
 * ("ZINC" keeps its "INC"), and a strip never empties the name.
 */
export interface NameNormalizerOptions {
  /** Suffix tokens such as ", INC." or " LLC". Case is ignored. */
  suffixes: readonly string[];
}

const WORD_CHAR = /[A-Z0-9]/;

export function asciiUpperCase(value: string): string {
  return value.replace(/[a-z]+/g, (run) => run.toUpperCase());
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export class NameNormalizer {
  readonly suffixes: readonly string[];

  constructor(options: NameNormalizerOptions) {
    const tokens = options.suffixes.map(asciiUpperCase).filter((token) => token.trim().length > 0);
    // Stable sort: equal-length tokens keep their configured order.
    this.suffixes = Object.freeze([...new Set(tokens)].sort((a, b) => b.length - a.length));
  }

  normalize(name: string): string {
    let key = collapseWhitespace(asciiUpperCase(name));
    let stripped = true;

    while (stripped) {
      stripped = false;
      for (const token of this.suffixes) {
        const rest = this.stripSuffix(key, token);
        if (rest !== null) {
          key = rest;
          stripped = true;
          break;
        }
      }
    }

    return key;
  }

  private stripSuffix(key: string, token: string): string | null {
    if (!key.endsWith(token)) return null;

    const cut = key.length - token.length;
    if (WORD_CHAR.test(token.charAt(0)) && cut > 0 && WORD_CHAR.test(key.charAt(cut - 1))) {
      return null;
    }

    const rest = collapseWhitespace(key.slice(0, cut));
    return rest.length > 0 ? rest : null;
  }
}
