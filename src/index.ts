/**
 * Public entry points: print a syntax tree to its single-line source form.
 */

import type { PrintableNode } from "./ast/decode.ts";
import type { Expression, Path, QSelf, TypeNode } from "./ast/nodes.ts";
import { Printer } from "./printer/printer.ts";
import type { RenderOptions } from "./printer/render.ts";
import { render } from "./printer/render.ts";
import type { Token } from "./printer/token.ts";

export * from "./ast/nodes.ts";
export { TreeDecoder } from "./ast/decode.ts";
export type { PrintableNode } from "./ast/decode.ts";
export { formatDiagnostic, Severity } from "./errors/index.ts";
export type { Diagnostic, NodeLocation } from "./errors/index.ts";
export { delimited } from "./printer/iter.ts";
export type { Delimited } from "./printer/iter.ts";
export { orderGenericArguments } from "./printer/printer-path.ts";
export { Printer } from "./printer/printer.ts";
export { render, stripTrailingSeparators } from "./printer/render.ts";
export type { RenderOptions } from "./printer/render.ts";
export { TokenKind } from "./printer/token.ts";
export type { Token } from "./printer/token.ts";

export function printPath(path: Path, options?: RenderOptions): string {
  const printer = new Printer();
  printer.path(path);
  return render(printer.tokens(), options);
}

export function printQPath(qself: QSelf | null, path: Path, options?: RenderOptions): string {
  const printer = new Printer();
  printer.qpath(qself, path);
  return render(printer.tokens(), options);
}

export function printType(ty: TypeNode, options?: RenderOptions): string {
  const printer = new Printer();
  printer.ty(ty);
  return render(printer.tokens(), options);
}

export function printExpr(expr: Expression, options?: RenderOptions): string {
  const printer = new Printer();
  printer.expr(expr);
  return render(printer.tokens(), options);
}

/** Raw token stream for any printable node, before layout. */
export function tokenize(node: PrintableNode): ReadonlyArray<Token> {
  const printer = new Printer();
  switch (node.kind) {
    case "QualifiedPath":
      printer.qpath(node.qself, node.path);
      break;
    case "Path":
      printer.path(node);
      break;
    case "LitExpr":
    case "BlockExpr":
    case "PathExpr":
    case "BinaryExpr":
    case "UnaryExpr":
    case "ParenExpr":
    case "CallExpr":
    case "MethodCallExpr":
      printer.expr(node);
      break;
    default:
      printer.ty(node);
  }
  return printer.tokens();
}

export function print(node: PrintableNode, options?: RenderOptions): string {
  return render(tokenize(node), options);
}
