import type { BaseNode } from "./base.ts";
import type { AngleBracketedArguments, Path, QSelf } from "./path.ts";

export enum ExprKind {
  Lit = "LitExpr",
  Block = "BlockExpr",
  Path = "PathExpr",
  Binary = "BinaryExpr",
  Unary = "UnaryExpr",
  Paren = "ParenExpr",
  Call = "CallExpr",
  MethodCall = "MethodCallExpr",
}

/** Integer literal; `value` keeps the source digits so suffixes and radix survive (`0xFFu8`). */
export interface IntLit extends BaseNode {
  kind: "IntLit";
  value: string;
}

/** Floating-point literal (`1.5`, `2e10f64`). */
export interface FloatLit extends BaseNode {
  kind: "FloatLit";
  value: string;
}

export interface BoolLit extends BaseNode {
  kind: "BoolLit";
  value: boolean;
}

/** String literal; `value` is the unescaped contents. */
export interface StrLit extends BaseNode {
  kind: "StrLit";
  value: string;
}

/** Character literal; `value` is a single unescaped character. */
export interface CharLit extends BaseNode {
  kind: "CharLit";
  value: string;
}

export type Literal = IntLit | FloatLit | BoolLit | StrLit | CharLit;

/** A literal in expression position. */
export interface LitExpr extends BaseNode {
  kind: "LitExpr";
  lit: Literal;
}

/** Expression statement inside a block; `semi` records a trailing `;`. */
export interface ExprStmt extends BaseNode {
  kind: "ExprStmt";
  expr: Expression;
  semi: boolean;
}

export type Statement = ExprStmt;

/** `{ stmts }` */
export interface BlockExpr extends BaseNode {
  kind: "BlockExpr";
  stmts: Statement[];
}

/** Path in expression position: `N`, `Vec::<u8>::new`, `<T as Default>::default`. */
export interface PathExpr extends BaseNode {
  kind: "PathExpr";
  qself: QSelf | null;
  path: Path;
}

/** Binary operation (`a + b`, `x == y`). */
export interface BinaryExpr extends BaseNode {
  kind: "BinaryExpr";
  left: Expression;
  operator: string;
  right: Expression;
}

/** Unary prefix operation (`-x`, `!flag`). */
export interface UnaryExpr extends BaseNode {
  kind: "UnaryExpr";
  operator: string;
  operand: Expression;
}

/** `(expr)` */
export interface ParenExpr extends BaseNode {
  kind: "ParenExpr";
  expr: Expression;
}

/** `callee(args)` */
export interface CallExpr extends BaseNode {
  kind: "CallExpr";
  callee: Expression;
  args: Expression[];
}

/** `receiver.method::<T>(args)` */
export interface MethodCallExpr extends BaseNode {
  kind: "MethodCallExpr";
  receiver: Expression;
  method: string;
  turbofish: AngleBracketedArguments | null;
  args: Expression[];
}

export type Expression =
  | LitExpr
  | BlockExpr
  | PathExpr
  | BinaryExpr
  | UnaryExpr
  | ParenExpr
  | CallExpr
  | MethodCallExpr;
