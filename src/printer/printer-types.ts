/**
 * Type expression printing methods for Printer.
 */

import type { TypeNode, TypeParamBound } from "../ast/nodes.ts";
import { assertNever } from "../utils/unreachable.ts";
import type { Printer } from "./printer.ts";

export function ty(this: Printer, ty: TypeNode): void {
  switch (ty.kind) {
    case "PathType":
      this.qpath(ty.qself, ty.path);
      return;
    case "ReferenceType":
      this.word("&");
      if (ty.lifetime !== null) {
        this.lifetime(ty.lifetime);
      }
      if (ty.mutable) {
        this.word("mut");
      }
      this.ty(ty.elem);
      return;
    case "PtrType":
      this.word("*");
      this.word(ty.mutable ? "mut" : "const");
      this.ty(ty.elem);
      return;
    case "SliceType":
      this.word("[");
      this.ty(ty.elem);
      this.word("]");
      return;
    case "ArrayType":
      this.word("[");
      this.ty(ty.elem);
      this.word(";");
      this.expr(ty.len);
      this.word("]");
      return;
    case "TupleType":
      this.word("(");
      this.typeList(ty.elems);
      // `(T,)` is a tuple, `(T)` is a parenthesized type
      if (ty.elems.length === 1) {
        this.word(",");
      }
      this.word(")");
      return;
    case "TraitObjectType":
      if (ty.dyn) {
        this.word("dyn");
      }
      this.boundList(ty.bounds);
      return;
    case "ImplTraitType":
      this.word("impl");
      this.boundList(ty.bounds);
      return;
    case "BareFnType":
      this.word("fn");
      this.word("(");
      this.typeList(ty.inputs);
      this.word(")");
      this.returnType(ty.output);
      return;
    case "NeverType":
      this.word("!");
      return;
    case "InferType":
      this.word("_");
      return;
    case "ParenType":
      this.word("(");
      this.ty(ty.elem);
      this.word(")");
      return;
    default:
      assertNever(ty, "type");
  }
}

/** Comma-separated types with no trailing comma. */
export function typeList(this: Printer, types: readonly TypeNode[]): void {
  types.forEach((elem, i) => {
    if (i > 0) this.word(",");
    this.ty(elem);
  });
}

/** `+`-separated bounds with no trailing `+`. */
export function boundList(this: Printer, bounds: readonly TypeParamBound[]): void {
  bounds.forEach((bound, i) => {
    if (i > 0) this.word("+");
    this.typeParamBound(bound);
  });
}
