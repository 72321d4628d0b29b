export type { BaseNode } from "./base.ts";

export { GenericArgumentKind, PathArgumentsKind } from "./path.ts";
export type {
  AngleBracketedArguments,
  Binding,
  ConstArg,
  Constraint,
  GenericArgument,
  LifetimeArg,
  NoArguments,
  ParenthesizedArguments,
  Path,
  PathArguments,
  PathSegment,
  QSelf,
  QualifiedPath,
  TypeArg,
} from "./path.ts";

export { TypeNodeKind } from "./types.ts";
export type {
  ArrayType,
  BareFnType,
  DefaultReturn,
  ImplTraitType,
  InferType,
  Lifetime,
  NeverType,
  ParenType,
  PathType,
  PtrType,
  ReferenceType,
  ReturnType,
  SliceType,
  TraitBound,
  TraitObjectType,
  TupleType,
  TypeNode,
  TypeParamBound,
  TypeReturn,
} from "./types.ts";

export { ExprKind } from "./expressions.ts";
export type {
  BinaryExpr,
  BlockExpr,
  BoolLit,
  CallExpr,
  CharLit,
  Expression,
  ExprStmt,
  FloatLit,
  IntLit,
  LitExpr,
  Literal,
  MethodCallExpr,
  ParenExpr,
  PathExpr,
  Statement,
  StrLit,
  UnaryExpr,
} from "./expressions.ts";
