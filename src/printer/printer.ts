/**
 * Token-stream printer for paths, types and the expressions that appear
 * inside generic arguments.
 *
 * The printing methods are split across modules by syntax category:
 *   - printer-path.ts      (paths, segments, generic argument lists, qualified paths)
 *   - printer-types.ts     (type expressions)
 *   - printer-generics.ts  (lifetimes, bounds, return types)
 *   - printer-expr.ts      (literals, blocks and other expressions)
 *
 * Each module defines `this: Printer` functions that are attached to the
 * prototype below. A Printer owns its token buffer for the duration of one
 * print; nested paths inside types re-enter the same instance.
 */

import * as exprMethods from "./printer-expr.ts";
import * as genericsMethods from "./printer-generics.ts";
import * as pathMethods from "./printer-path.ts";
import * as typeMethods from "./printer-types.ts";
import type { Token } from "./token.ts";
import { isKeyword, isPathSegmentKeyword, TokenKind } from "./token.ts";

const KEYWORD_WORD = /^[A-Za-z]/;

export class Printer {
  private out: Token[] = [];

  // ─── Output primitives ─────────────────────────────────────────────────

  /** Appends a token of an explicit kind. */
  emit(kind: TokenKind, text: string): void {
    this.out.push({ kind, text });
  }

  /** Appends punctuation, or a keyword when `text` is alphabetic. */
  word(text: string): void {
    this.emit(KEYWORD_WORD.test(text) ? TokenKind.Keyword : TokenKind.Punct, text);
  }

  /** Appends an identifier, writing keywords as raw identifiers (`r#type`). */
  ident(name: string): void {
    if (isKeyword(name) && !isPathSegmentKeyword(name)) {
      this.emit(TokenKind.Ident, `r#${name}`);
      return;
    }
    this.emit(TokenKind.Ident, name);
  }

  /** Appends a list separator. Always emitted, even after the last element. */
  separator(text: string): void {
    this.emit(TokenKind.Separator, text);
  }

  operator(text: string): void {
    this.emit(TokenKind.Operator, text);
  }

  literal(text: string): void {
    this.emit(TokenKind.Literal, text);
  }

  tokens(): ReadonlyArray<Token> {
    return this.out;
  }

  // ─── Path methods (from printer-path.ts) ───────────────────────────────
  declare path: typeof pathMethods.path;
  declare pathSegment: typeof pathMethods.pathSegment;
  declare pathArguments: typeof pathMethods.pathArguments;
  declare genericArgument: typeof pathMethods.genericArgument;
  declare constArgument: typeof pathMethods.constArgument;
  declare angleBracketedGenericArguments: typeof pathMethods.angleBracketedGenericArguments;
  declare binding: typeof pathMethods.binding;
  declare constraint: typeof pathMethods.constraint;
  declare parenthesizedGenericArguments: typeof pathMethods.parenthesizedGenericArguments;
  declare qpath: typeof pathMethods.qpath;

  // ─── Type methods (from printer-types.ts) ──────────────────────────────
  declare ty: typeof typeMethods.ty;
  declare typeList: typeof typeMethods.typeList;
  declare boundList: typeof typeMethods.boundList;

  // ─── Generics methods (from printer-generics.ts) ───────────────────────
  declare lifetime: typeof genericsMethods.lifetime;
  declare typeParamBound: typeof genericsMethods.typeParamBound;
  declare traitBound: typeof genericsMethods.traitBound;
  declare returnType: typeof genericsMethods.returnType;

  // ─── Expression methods (from printer-expr.ts) ─────────────────────────
  declare expr: typeof exprMethods.expr;
  declare exprLit: typeof exprMethods.exprLit;
  declare exprBlock: typeof exprMethods.exprBlock;
  declare exprList: typeof exprMethods.exprList;
}

// Path methods
Printer.prototype.path = pathMethods.path;
Printer.prototype.pathSegment = pathMethods.pathSegment;
Printer.prototype.pathArguments = pathMethods.pathArguments;
Printer.prototype.genericArgument = pathMethods.genericArgument;
Printer.prototype.constArgument = pathMethods.constArgument;
Printer.prototype.angleBracketedGenericArguments = pathMethods.angleBracketedGenericArguments;
Printer.prototype.binding = pathMethods.binding;
Printer.prototype.constraint = pathMethods.constraint;
Printer.prototype.parenthesizedGenericArguments = pathMethods.parenthesizedGenericArguments;
Printer.prototype.qpath = pathMethods.qpath;

// Type methods
Printer.prototype.ty = typeMethods.ty;
Printer.prototype.typeList = typeMethods.typeList;
Printer.prototype.boundList = typeMethods.boundList;

// Generics methods
Printer.prototype.lifetime = genericsMethods.lifetime;
Printer.prototype.typeParamBound = genericsMethods.typeParamBound;
Printer.prototype.traitBound = genericsMethods.traitBound;
Printer.prototype.returnType = genericsMethods.returnType;

// Expression methods
Printer.prototype.expr = exprMethods.expr;
Printer.prototype.exprLit = exprMethods.exprLit;
Printer.prototype.exprBlock = exprMethods.exprBlock;
Printer.prototype.exprList = exprMethods.exprList;
