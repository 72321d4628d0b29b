/**
 * Single-line layout of a printer token stream.
 *
 * The path printer ends every argument and bound with a separator. Layout
 * drops a separator that is followed by another separator, a closing
 * delimiter, or the end of the stream, then joins tokens with the spacing
 * conventional for the surface syntax.
 */

import type { Token } from "./token.ts";
import { TokenKind } from "./token.ts";

export interface RenderOptions {
  /** `"keep"` leaves every separator in place. Defaults to `"strip"`. */
  trailingSeparators?: "strip" | "keep";
}

const CLOSERS: ReadonlySet<string> = new Set([">", ")", "]", "}"]);

/** Punctuation that binds to the token after it. */
const NO_SPACE_AFTER: ReadonlySet<string> = new Set(["<", "::", "(", "[", "{", "&", "*", "!", "?", "-", "."]);

/** Punctuation that binds to the token before it. */
const NO_SPACE_BEFORE: ReadonlySet<string> = new Set([">", ",", ":", ";", ")", "]", "}", "."]);

/** Keywords directly followed by `<` (`for<'a>`) or `(` (`fn(u8)`). */
const GLUED_KEYWORDS: ReadonlySet<string> = new Set(["for", "fn"]);

export function render(tokens: ReadonlyArray<Token>, options: RenderOptions = {}): string {
  const kept = options.trailingSeparators === "keep" ? tokens : stripTrailingSeparators(tokens);
  let out = "";
  let prev: Token | undefined;
  for (const token of kept) {
    if (prev !== undefined && needsSpace(prev, token)) {
      out += " ";
    }
    out += token.text;
    prev = token;
  }
  return out;
}

export function stripTrailingSeparators(tokens: ReadonlyArray<Token>): Token[] {
  const out: Token[] = [];
  for (const token of tokens) {
    if (token.kind === TokenKind.Separator || isCloser(token)) {
      popSeparators(out);
    }
    out.push(token);
  }
  popSeparators(out);
  return out;
}

function popSeparators(out: Token[]): void {
  while (out.length > 0 && out[out.length - 1]?.kind === TokenKind.Separator) {
    out.pop();
  }
}

function isCloser(token: Token): boolean {
  return token.kind === TokenKind.Punct && CLOSERS.has(token.text);
}

function isPunct(token: Token, text: string): boolean {
  return token.kind === TokenKind.Punct && token.text === text;
}

function needsSpace(prev: Token, next: Token): boolean {
  if (prev.kind === TokenKind.Punct && NO_SPACE_AFTER.has(prev.text)) return false;
  if ((next.kind === TokenKind.Punct || next.kind === TokenKind.Separator) && NO_SPACE_BEFORE.has(next.text)) {
    return false;
  }
  if (isPunct(next, "::")) {
    // a rooted path keeps its space: `as ::core::ops::Add`, `Item = ::std::io::Error`
    return !(prev.kind === TokenKind.Ident || isPunct(prev, ">") || isPunct(prev, ")"));
  }
  const gluedKeyword = prev.kind === TokenKind.Keyword && GLUED_KEYWORDS.has(prev.text);
  if (isPunct(next, "<")) {
    return !(prev.kind === TokenKind.Ident || gluedKeyword);
  }
  if (isPunct(next, "(")) {
    // callee or callable-type name: `Fn(`, `f::<T>(`, `fn(`
    return !(prev.kind === TokenKind.Ident || isPunct(prev, ">") || isPunct(prev, ")") || gluedKeyword);
  }
  return true;
}
