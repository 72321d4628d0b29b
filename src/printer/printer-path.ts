/**
 * Path printing methods for Printer: plain and rooted paths, segments,
 * angle-bracketed and parenthesized generic arguments, and qualified paths.
 *
 * A printed path must re-parse to the same tree, so generic arguments are
 * emitted in grammar order and const arguments are braced when needed.
 */

import type {
  AngleBracketedArguments,
  Binding,
  Constraint,
  Expression,
  GenericArgument,
  ParenthesizedArguments,
  Path,
  PathArguments,
  PathSegment,
  QSelf,
} from "../ast/nodes.ts";
import { assertNever } from "../utils/unreachable.ts";
import { delimited } from "./iter.ts";
import type { Printer } from "./printer.ts";

// ─── Paths ───────────────────────────────────────────────────────────────

export function path(this: Printer, path: Path): void {
  for (const segment of delimited(path.segments)) {
    if (!segment.isFirst || path.leadingColon) {
      this.word("::");
    }
    this.pathSegment(segment.value);
  }
}

export function pathSegment(this: Printer, segment: PathSegment): void {
  this.ident(segment.ident);
  this.pathArguments(segment.arguments);
}

export function pathArguments(this: Printer, args: PathArguments): void {
  switch (args.kind) {
    case "NoArguments":
      return;
    case "AngleBracketed":
      this.angleBracketedGenericArguments(args);
      return;
    case "Parenthesized":
      this.parenthesizedGenericArguments(args);
      return;
    default:
      assertNever(args, "path arguments");
  }
}

// ─── Generic arguments ───────────────────────────────────────────────────

/**
 * Returns `args` in the order the grammar accepts them: lifetimes, then
 * types and consts, then associated type bindings and constraints. Each
 * group keeps its input order; types and consts are not reordered relative
 * to each other.
 */
export function orderGenericArguments(args: readonly GenericArgument[]): GenericArgument[] {
  const lifetimes: GenericArgument[] = [];
  const typesAndConsts: GenericArgument[] = [];
  const associated: GenericArgument[] = [];
  for (const arg of args) {
    switch (arg.kind) {
      case "LifetimeArg":
        lifetimes.push(arg);
        break;
      case "TypeArg":
      case "ConstArg":
        typesAndConsts.push(arg);
        break;
      case "Binding":
      case "Constraint":
        associated.push(arg);
        break;
      default:
        assertNever(arg, "generic argument");
    }
  }
  return [...lifetimes, ...typesAndConsts, ...associated];
}

export function angleBracketedGenericArguments(this: Printer, generic: AngleBracketedArguments): void {
  if (generic.colon2) {
    this.word("::");
  }
  this.word("<");
  for (const arg of orderGenericArguments(generic.args)) {
    this.genericArgument(arg);
    this.separator(",");
  }
  this.word(">");
}

export function genericArgument(this: Printer, arg: GenericArgument): void {
  switch (arg.kind) {
    case "LifetimeArg":
      this.lifetime(arg.lifetime);
      return;
    case "TypeArg":
      this.ty(arg.ty);
      return;
    case "Binding":
      this.binding(arg);
      return;
    case "Constraint":
      this.constraint(arg);
      return;
    case "ConstArg":
      this.constArgument(arg.expr);
      return;
    default:
      assertNever(arg, "generic argument");
  }
}

/**
 * Literals and blocks are self-delimiting. Any other expression is wrapped
 * in braces, otherwise it may not parse back as a single argument.
 */
export function constArgument(this: Printer, expr: Expression): void {
  switch (expr.kind) {
    case "LitExpr":
      this.exprLit(expr);
      return;
    case "BlockExpr":
      this.exprBlock(expr);
      return;
    default:
      this.word("{");
      this.expr(expr);
      this.word("}");
  }
}

export function binding(this: Printer, binding: Binding): void {
  this.ident(binding.ident);
  this.word("=");
  this.ty(binding.ty);
}

export function constraint(this: Printer, constraint: Constraint): void {
  this.ident(constraint.ident);
  this.word(":");
  for (const bound of constraint.bounds) {
    this.typeParamBound(bound);
    this.separator("+");
  }
}

export function parenthesizedGenericArguments(this: Printer, args: ParenthesizedArguments): void {
  this.word("(");
  for (const input of args.inputs) {
    this.ty(input);
    this.separator(",");
  }
  this.word(")");
  this.returnType(args.output);
}

// ─── Qualified paths ─────────────────────────────────────────────────────

/**
 * Prints `<Type as Trait>::rest`, or `<Type>::rest` when the qself position
 * is 0. An out-of-range position is clamped to the segment count.
 */
export function qpath(this: Printer, qself: QSelf | null, path: Path): void {
  if (qself === null) {
    this.path(path);
    return;
  }

  this.word("<");
  this.ty(qself.ty);

  const pos = Math.max(0, Math.min(qself.position, path.segments.length));
  if (pos > 0) {
    this.word("as");
    for (const segment of delimited(path.segments.slice(0, pos))) {
      if (!segment.isFirst || path.leadingColon) {
        this.word("::");
      }
      this.pathSegment(segment.value);
      if (segment.isLast) {
        this.word(">");
      }
    }
  } else {
    this.word(">");
  }

  for (const segment of path.segments.slice(pos)) {
    this.word("::");
    this.pathSegment(segment);
  }
}
