/**
 * Output tokens and keyword lookup tables for the printer.
 *
 * @module token
 */

import keywords from "./keywords.json";

/** Discriminator for every token the printer can emit. */
export enum TokenKind {
  Ident = "Ident",
  Keyword = "Keyword",
  Literal = "Literal",
  Lifetime = "Lifetime",
  Punct = "Punct",
  /** Spaced binary operator such as `+` or `==` in an expression. */
  Operator = "Operator",
  /** List separator that a layout pass may drop when it ends a list. */
  Separator = "Separator",
}

export interface Token {
  kind: TokenKind;
  text: string;
}

const KEYWORDS: ReadonlySet<string> = new Set([...keywords.strict, ...keywords.reserved]);

/** Keywords that name a path root and can never be written as raw identifiers. */
const PATH_SEGMENT_KEYWORDS: ReadonlySet<string> = new Set(keywords.pathSegment);

/** Returns `true` if `word` is a strict or reserved keyword. */
export function isKeyword(word: string): boolean {
  return KEYWORDS.has(word);
}

/** Returns `true` for `crate`, `self`, `Self` and `super`. */
export function isPathSegmentKeyword(word: string): boolean {
  return PATH_SEGMENT_KEYWORDS.has(word);
}
