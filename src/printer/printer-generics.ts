/**
 * Lifetime, bound and return type printing methods for Printer.
 */

import type { Lifetime, ReturnType, TraitBound, TypeParamBound } from "../ast/nodes.ts";
import type { Printer } from "./printer.ts";
import { TokenKind } from "./token.ts";

export function lifetime(this: Printer, lifetime: Lifetime): void {
  this.emit(TokenKind.Lifetime, `'${lifetime.ident}`);
}

export function typeParamBound(this: Printer, bound: TypeParamBound): void {
  if (bound.kind === "Lifetime") {
    this.lifetime(bound);
  } else {
    this.traitBound(bound);
  }
}

/** `Clone`, `?Sized`, `for<'a> Fn(&'a T)`. */
export function traitBound(this: Printer, bound: TraitBound): void {
  if (bound.lifetimes.length > 0) {
    this.word("for");
    this.word("<");
    bound.lifetimes.forEach((lt, i) => {
      if (i > 0) this.word(",");
      this.lifetime(lt);
    });
    this.word(">");
  }
  if (bound.modifier === "maybe") {
    this.word("?");
  }
  this.path(bound.path);
}

/** Prints `-> T`; an omitted return type prints nothing. */
export function returnType(this: Printer, output: ReturnType): void {
  if (output.kind === "TypeReturn") {
    this.word("->");
    this.ty(output.ty);
  }
}
