import type { BaseNode } from "./base.ts";
import type { Expression } from "./expressions.ts";
import type { Lifetime, ReturnType, TypeNode, TypeParamBound } from "./types.ts";

export enum PathArgumentsKind {
  None = "NoArguments",
  AngleBracketed = "AngleBracketed",
  Parenthesized = "Parenthesized",
}

export enum GenericArgumentKind {
  Lifetime = "LifetimeArg",
  Type = "TypeArg",
  Binding = "Binding",
  Constraint = "Constraint",
  Const = "ConstArg",
}

/** A path such as `std::vec::Vec<T>`, or `::core::mem` when rooted. */
export interface Path extends BaseNode {
  kind: "Path";
  /** Written with a leading `::`. */
  leadingColon: boolean;
  segments: PathSegment[];
}

/** One name component of a path plus its optional arguments. */
export interface PathSegment extends BaseNode {
  kind: "PathSegment";
  ident: string;
  arguments: PathArguments;
}

/** Segment without arguments. */
export interface NoArguments extends BaseNode {
  kind: "NoArguments";
}

/** `<'a, T, Item = U>`, or the turbofish `::<T>` when `colon2` is set. */
export interface AngleBracketedArguments extends BaseNode {
  kind: "AngleBracketed";
  colon2: boolean;
  args: GenericArgument[];
}

/** Callable-type shorthand: `Fn(A, B) -> C`. */
export interface ParenthesizedArguments extends BaseNode {
  kind: "Parenthesized";
  inputs: TypeNode[];
  output: ReturnType;
}

export type PathArguments = NoArguments | AngleBracketedArguments | ParenthesizedArguments;

/** Lifetime argument, e.g. the `'a` in `Cow<'a, str>`. */
export interface LifetimeArg extends BaseNode {
  kind: "LifetimeArg";
  lifetime: Lifetime;
}

/** Type argument, e.g. the `T` in `Vec<T>`. */
export interface TypeArg extends BaseNode {
  kind: "TypeArg";
  ty: TypeNode;
}

/** Associated type equality: `Item = u8`. */
export interface Binding extends BaseNode {
  kind: "Binding";
  ident: string;
  ty: TypeNode;
}

/** Associated type bound: `Item: Clone + Send`. */
export interface Constraint extends BaseNode {
  kind: "Constraint";
  ident: string;
  bounds: TypeParamBound[];
}

/** Const generic argument: `3`, `{ N }`, or any other expression. */
export interface ConstArg extends BaseNode {
  kind: "ConstArg";
  expr: Expression;
}

export type GenericArgument = LifetimeArg | TypeArg | Binding | Constraint | ConstArg;

/**
 * The `<Type as Trait>` prefix of a qualified path.
 *
 * `position` counts the leading path segments that name the trait. With
 * position 0 the prefix is just `<Type>`.
 */
export interface QSelf extends BaseNode {
  kind: "QSelf";
  ty: TypeNode;
  position: number;
}

/** A path with an optional qualified-self prefix. */
export interface QualifiedPath extends BaseNode {
  kind: "QualifiedPath";
  qself: QSelf | null;
  path: Path;
}
