import type { BaseNode } from "./base.ts";
import type { Expression } from "./expressions.ts";
import type { Path, QSelf } from "./path.ts";

export enum TypeNodeKind {
  Path = "PathType",
  Reference = "ReferenceType",
  Ptr = "PtrType",
  Slice = "SliceType",
  Array = "ArrayType",
  Tuple = "TupleType",
  TraitObject = "TraitObjectType",
  ImplTrait = "ImplTraitType",
  BareFn = "BareFnType",
  Never = "NeverType",
  Infer = "InferType",
  Paren = "ParenType",
}

/** A lifetime such as `'a` or `'static`. `ident` excludes the apostrophe. */
export interface Lifetime extends BaseNode {
  kind: "Lifetime";
  ident: string;
}

/** Named type, optionally qualified: `Vec<T>`, `<T as Iterator>::Item`. */
export interface PathType extends BaseNode {
  kind: "PathType";
  qself: QSelf | null;
  path: Path;
}

/** `&'a mut T` */
export interface ReferenceType extends BaseNode {
  kind: "ReferenceType";
  lifetime: Lifetime | null;
  mutable: boolean;
  elem: TypeNode;
}

/** `*const T` / `*mut T` */
export interface PtrType extends BaseNode {
  kind: "PtrType";
  mutable: boolean;
  elem: TypeNode;
}

/** `[T]` */
export interface SliceType extends BaseNode {
  kind: "SliceType";
  elem: TypeNode;
}

/** `[T; N]` */
export interface ArrayType extends BaseNode {
  kind: "ArrayType";
  elem: TypeNode;
  len: Expression;
}

/** `(A, B)`; a single element prints as `(A,)`. */
export interface TupleType extends BaseNode {
  kind: "TupleType";
  elems: TypeNode[];
}

/** `dyn Trait + Send`; `dyn` may be omitted in older code. */
export interface TraitObjectType extends BaseNode {
  kind: "TraitObjectType";
  dyn: boolean;
  bounds: TypeParamBound[];
}

/** `impl Iterator<Item = u8>` */
export interface ImplTraitType extends BaseNode {
  kind: "ImplTraitType";
  bounds: TypeParamBound[];
}

/** `fn(A, B) -> C` */
export interface BareFnType extends BaseNode {
  kind: "BareFnType";
  inputs: TypeNode[];
  output: ReturnType;
}

/** `!` */
export interface NeverType extends BaseNode {
  kind: "NeverType";
}

/** `_` */
export interface InferType extends BaseNode {
  kind: "InferType";
}

/** `(T)` */
export interface ParenType extends BaseNode {
  kind: "ParenType";
  elem: TypeNode;
}

/** Any type expression. */
export type TypeNode =
  | PathType
  | ReferenceType
  | PtrType
  | SliceType
  | ArrayType
  | TupleType
  | TraitObjectType
  | ImplTraitType
  | BareFnType
  | NeverType
  | InferType
  | ParenType;

/** Trait bound: `Clone`, `?Sized`, `for<'a> Fn(&'a T)`. */
export interface TraitBound extends BaseNode {
  kind: "TraitBound";
  /** `"maybe"` prints the `?` of `?Sized`. */
  modifier: "none" | "maybe";
  /** Higher-ranked lifetimes introduced by `for<...>`. */
  lifetimes: Lifetime[];
  path: Path;
}

export type TypeParamBound = TraitBound | Lifetime;

/** Omitted return type (implicit unit). */
export interface DefaultReturn extends BaseNode {
  kind: "DefaultReturn";
}

/** `-> T` */
export interface TypeReturn extends BaseNode {
  kind: "TypeReturn";
  ty: TypeNode;
}

export type ReturnType = DefaultReturn | TypeReturn;
