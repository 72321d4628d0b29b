/**
 * Tree builders shared by the printer, decoder and CLI tests.
 */

import type {
  AngleBracketedArguments,
  Binding,
  BlockExpr,
  ConstArg,
  Constraint,
  Expression,
  ExprStmt,
  GenericArgument,
  Lifetime,
  LifetimeArg,
  LitExpr,
  ParenthesizedArguments,
  Path,
  PathArguments,
  PathExpr,
  PathSegment,
  PathType,
  QSelf,
  TraitBound,
  TypeArg,
  TypeNode,
  TypeParamBound,
} from "../src/ast/nodes.ts";

export function seg(ident: string, args: PathArguments = { kind: "NoArguments" }): PathSegment {
  return { kind: "PathSegment", ident, arguments: args };
}

function toSegment(s: string | PathSegment): PathSegment {
  return typeof s === "string" ? seg(s) : s;
}

/** Unrooted path: `path("std", "vec", "Vec")` is `std::vec::Vec`. */
export function path(...segments: Array<string | PathSegment>): Path {
  return { kind: "Path", leadingColon: false, segments: segments.map(toSegment) };
}

/** Path written with a leading `::`. */
export function rooted(...segments: Array<string | PathSegment>): Path {
  return { kind: "Path", leadingColon: true, segments: segments.map(toSegment) };
}

export function angle(...args: GenericArgument[]): AngleBracketedArguments {
  return { kind: "AngleBracketed", colon2: false, args };
}

export function turbofish(...args: GenericArgument[]): AngleBracketedArguments {
  return { kind: "AngleBracketed", colon2: true, args };
}

export function paren(inputs: TypeNode[], output?: TypeNode): ParenthesizedArguments {
  return {
    kind: "Parenthesized",
    inputs,
    output: output === undefined ? { kind: "DefaultReturn" } : { kind: "TypeReturn", ty: output },
  };
}

/** Single-segment path type, e.g. `named("Vec", tyArg("u8"))` is `Vec<u8>`. */
export function named(name: string, ...args: GenericArgument[]): PathType {
  return {
    kind: "PathType",
    qself: null,
    path: path(args.length > 0 ? seg(name, angle(...args)) : seg(name)),
  };
}

export function pathType(p: Path, qself: QSelf | null = null): PathType {
  return { kind: "PathType", qself, path: p };
}

export function qself(ty: TypeNode | string, position: number): QSelf {
  return { kind: "QSelf", ty: typeof ty === "string" ? named(ty) : ty, position };
}

export function lt(ident: string): Lifetime {
  return { kind: "Lifetime", ident };
}

export function ltArg(ident: string): LifetimeArg {
  return { kind: "LifetimeArg", lifetime: lt(ident) };
}

export function tyArg(ty: TypeNode | string): TypeArg {
  return { kind: "TypeArg", ty: typeof ty === "string" ? named(ty) : ty };
}

export function binding(ident: string, ty: TypeNode | string): Binding {
  return { kind: "Binding", ident, ty: typeof ty === "string" ? named(ty) : ty };
}

export function constraint(ident: string, ...bounds: TypeParamBound[]): Constraint {
  return { kind: "Constraint", ident, bounds };
}

export function constArg(expr: Expression): ConstArg {
  return { kind: "ConstArg", expr };
}

export function bound(p: Path | string, lifetimes: Lifetime[] = []): TraitBound {
  return {
    kind: "TraitBound",
    modifier: "none",
    lifetimes,
    path: typeof p === "string" ? path(p) : p,
  };
}

export function maybeBound(name: string): TraitBound {
  return { kind: "TraitBound", modifier: "maybe", lifetimes: [], path: path(name) };
}

export function int(value: string): LitExpr {
  return { kind: "LitExpr", lit: { kind: "IntLit", value } };
}

export function pathExpr(...segments: Array<string | PathSegment>): PathExpr {
  return { kind: "PathExpr", qself: null, path: path(...segments) };
}

export function binary(left: Expression, operator: string, right: Expression): Expression {
  return { kind: "BinaryExpr", left, operator, right };
}

/** Block whose statements all end in `;` except the last. */
export function block(...exprs: Expression[]): BlockExpr {
  return {
    kind: "BlockExpr",
    stmts: exprs.map((expr, i): ExprStmt => ({ kind: "ExprStmt", expr, semi: i < exprs.length - 1 })),
  };
}
