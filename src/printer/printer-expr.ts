/**
 * Expression printing methods for Printer.
 *
 * Only the expression forms that show up inside const generic arguments and
 * array lengths are covered; paths in expression position re-enter qpath.
 */

import type { BlockExpr, Expression, LitExpr, Literal } from "../ast/nodes.ts";
import { assertNever } from "../utils/unreachable.ts";
import type { Printer } from "./printer.ts";

// ─── Expressions ─────────────────────────────────────────────────────────

export function expr(this: Printer, expr: Expression): void {
  switch (expr.kind) {
    case "LitExpr":
      this.exprLit(expr);
      return;
    case "BlockExpr":
      this.exprBlock(expr);
      return;
    case "PathExpr":
      this.qpath(expr.qself, expr.path);
      return;
    case "BinaryExpr":
      this.expr(expr.left);
      this.operator(expr.operator);
      this.expr(expr.right);
      return;
    case "UnaryExpr":
      this.word(expr.operator);
      this.expr(expr.operand);
      return;
    case "ParenExpr":
      this.word("(");
      this.expr(expr.expr);
      this.word(")");
      return;
    case "CallExpr":
      this.expr(expr.callee);
      this.word("(");
      this.exprList(expr.args);
      this.word(")");
      return;
    case "MethodCallExpr":
      this.expr(expr.receiver);
      this.word(".");
      this.ident(expr.method);
      if (expr.turbofish !== null) {
        // method generics are only accepted in turbofish form
        if (!expr.turbofish.colon2) this.word("::");
        this.angleBracketedGenericArguments(expr.turbofish);
      }
      this.word("(");
      this.exprList(expr.args);
      this.word(")");
      return;
    default:
      assertNever(expr, "expression");
  }
}

export function exprList(this: Printer, exprs: readonly Expression[]): void {
  exprs.forEach((e, i) => {
    if (i > 0) this.word(",");
    this.expr(e);
  });
}

export function exprLit(this: Printer, expr: LitExpr): void {
  this.literal(literalText(expr.lit));
}

export function exprBlock(this: Printer, expr: BlockExpr): void {
  this.word("{");
  for (const stmt of expr.stmts) {
    this.expr(stmt.expr);
    if (stmt.semi) this.word(";");
  }
  this.word("}");
}

// ─── Literals ────────────────────────────────────────────────────────────

export function literalText(lit: Literal): string {
  switch (lit.kind) {
    case "IntLit":
    case "FloatLit":
      return lit.value;
    case "BoolLit":
      return lit.value ? "true" : "false";
    case "StrLit":
      return `"${escapeChars(lit.value, '"')}"`;
    case "CharLit":
      return `'${escapeChars(lit.value, "'")}'`;
    default:
      return assertNever(lit, "literal");
  }
}

/** Escapes `s` for use between `quote` characters. */
export function escapeChars(s: string, quote: '"' | "'"): string {
  let out = "";
  for (const ch of s) {
    const code = ch.codePointAt(0) ?? 0;
    switch (ch) {
      case quote: out += `\\${quote}`; break;
      case "\\": out += "\\\\"; break;
      case "\n": out += "\\n"; break;
      case "\r": out += "\\r"; break;
      case "\t": out += "\\t"; break;
      case "\0": out += "\\0"; break;
      default:
        if (code < 0x20 || code === 0x7f) {
          out += `\\u{${code.toString(16)}}`;
        } else {
          out += ch;
        }
    }
  }
  return out;
}
