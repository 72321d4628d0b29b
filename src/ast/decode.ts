/**
 * Builds syntax trees from their JSON form, validating every node.
 *
 * The JSON form mirrors the node interfaces in nodes/: every node is an
 * object with a `kind` field. A few fields may be omitted:
 *   - `leadingColon`, `colon2`, `dyn`, `mutable`, `semi` default to false
 *   - `arguments` defaults to `{ "kind": "NoArguments" }`
 *   - `output` defaults to `{ "kind": "DefaultReturn" }`
 *   - `qself`, `lifetime`, `turbofish` default to null
 *   - `modifier` defaults to "none", `lifetimes` to []
 *
 * Leaf strings are printed as single tokens, so each is checked against
 * its lexical class (identifier, lifetime name, numeric literal, operator).
 *
 * Problems are reported as diagnostics; decoding stops at the first one.
 */

import type { Diagnostic } from "../errors/diagnostic.ts";
import { Severity } from "../errors/diagnostic.ts";
import type {
  AngleBracketedArguments,
  Expression,
  GenericArgument,
  Lifetime,
  Literal,
  Path,
  PathArguments,
  PathSegment,
  QSelf,
  QualifiedPath,
  ReturnType,
  Statement,
  TraitBound,
  TypeNode,
  TypeParamBound,
} from "./nodes.ts";
import { ExprKind, GenericArgumentKind, PathArgumentsKind, TypeNodeKind } from "./nodes.ts";

/** Any node the printer can print on its own. */
export type PrintableNode = QualifiedPath | Path | TypeNode | Expression;

type Fields = Map<string, unknown>;
type ItemDecoder<T> = (value: unknown, pointer: string) => T;

const IDENT_BODY = String.raw`[\p{XID_Start}_]\p{XID_Continue}*`;
const DEC = String.raw`[0-9][0-9_]*`;
const EXP = String.raw`[eE][+-]?[0-9_]*[0-9][0-9_]*`;

const LEXICAL = {
  identifier: new RegExp(`^(?:r#)?${IDENT_BODY}$`, "u"),
  "lifetime name": new RegExp(`^${IDENT_BODY}$`, "u"),
  "integer literal": new RegExp(
    `^(?:${DEC}|0x[0-9a-fA-F_]*[0-9a-fA-F][0-9a-fA-F_]*|0o[0-7_]*[0-7][0-7_]*|0b[01_]*[01][01_]*)` +
      "(?:[ui](?:8|16|32|64|128|size))?$",
    "u",
  ),
  "float literal": new RegExp(`^${DEC}(?:\\.${DEC}(?:${EXP})?(?:f32|f64)?|${EXP}(?:f32|f64)?|f32|f64)$`, "u"),
} satisfies Record<string, RegExp>;

type LexicalClass = keyof typeof LEXICAL;

const BINARY_OPERATORS: ReadonlySet<string> = new Set([
  "+", "-", "*", "/", "%", "&&", "||", "&", "|", "^", "<<", ">>", "==", "!=", "<", "<=", ">", ">=",
]);
const UNARY_OPERATORS: ReadonlySet<string> = new Set(["-", "!", "*"]);

const UNPAIRED_SURROGATE = /\p{Cs}/u;

const TYPE_KINDS: ReadonlySet<string> = new Set<string>(Object.values(TypeNodeKind));
const EXPR_KINDS: ReadonlySet<string> = new Set<string>(Object.values(ExprKind));

export class TreeDecoder {
  private readonly file: string;
  private diagnostics: Diagnostic[];

  constructor(file = "") {
    this.file = file;
    this.diagnostics = [];
  }

  getDiagnostics(): ReadonlyArray<Diagnostic> {
    return this.diagnostics;
  }

  /** Decodes a document whose root is any printable node. */
  decode(value: unknown): PrintableNode | null {
    return this.run(() => this.printable(value, ""));
  }

  decodeQualifiedPath(value: unknown): QualifiedPath | null {
    return this.run(() => this.qualifiedPath(value, ""));
  }

  private run<T>(decode: () => T): T | null {
    try {
      return decode();
    } catch (err) {
      if (err instanceof DecodeError) return null;
      throw err;
    }
  }

  // ─── Roots ───────────────────────────────────────────────────────────────

  private printable(value: unknown, pointer: string): PrintableNode {
    const kind = this.kindOf(this.fields(value, pointer), pointer);
    if (kind === "QualifiedPath") return this.qualifiedPath(value, pointer);
    if (kind === "Path") return this.path(value, pointer);
    if (TYPE_KINDS.has(kind)) return this.type(value, pointer);
    if (EXPR_KINDS.has(kind)) return this.expr(value, pointer);
    return this.fail(`'${kind}' cannot be printed on its own`, pointer);
  }

  // ─── Paths ───────────────────────────────────────────────────────────────

  private qualifiedPath = (value: unknown, pointer: string): QualifiedPath => {
    const fields = this.node(value, pointer, "QualifiedPath");
    return {
      kind: "QualifiedPath",
      qself: this.optional(fields, "qself", pointer, this.qself),
      path: this.child(fields, "path", pointer, this.path),
    };
  };

  private qself = (value: unknown, pointer: string): QSelf => {
    const fields = this.node(value, pointer, "QSelf");
    const position = this.field(fields, "position", pointer);
    if (typeof position !== "number" || !Number.isInteger(position) || position < 0) {
      return this.fail("'position' must be a non-negative integer", `${pointer}/position`);
    }
    return { kind: "QSelf", ty: this.child(fields, "ty", pointer, this.type), position };
  };

  private path = (value: unknown, pointer: string): Path => {
    const fields = this.node(value, pointer, "Path");
    return {
      kind: "Path",
      leadingColon: this.flag(fields, "leadingColon", pointer),
      segments: this.list(fields, "segments", pointer, this.segment),
    };
  };

  private segment = (value: unknown, pointer: string): PathSegment => {
    const fields = this.node(value, pointer, "PathSegment");
    const args = fields.has("arguments")
      ? this.child(fields, "arguments", pointer, this.pathArguments)
      : { kind: "NoArguments" as const };
    return { kind: "PathSegment", ident: this.name(fields, "ident", pointer, "identifier"), arguments: args };
  };

  private pathArguments = (value: unknown, pointer: string): PathArguments => {
    const fields = this.fields(value, pointer);
    const kind = this.kindOf(fields, pointer);
    switch (kind) {
      case PathArgumentsKind.None:
        return { kind: "NoArguments" };
      case PathArgumentsKind.AngleBracketed:
        return this.angleBracketed(value, pointer);
      case PathArgumentsKind.Parenthesized:
        return {
          kind: "Parenthesized",
          inputs: this.list(fields, "inputs", pointer, this.type),
          output: this.returnTypeField(fields, pointer),
        };
      default:
        return this.fail(`unknown path arguments kind '${kind}'`, `${pointer}/kind`);
    }
  };

  private angleBracketed = (value: unknown, pointer: string): AngleBracketedArguments => {
    const fields = this.node(value, pointer, "AngleBracketed");
    return {
      kind: "AngleBracketed",
      colon2: this.flag(fields, "colon2", pointer),
      args: this.list(fields, "args", pointer, this.genericArgument),
    };
  };

  private genericArgument = (value: unknown, pointer: string): GenericArgument => {
    const fields = this.fields(value, pointer);
    const kind = this.kindOf(fields, pointer);
    switch (kind) {
      case GenericArgumentKind.Lifetime:
        return { kind: "LifetimeArg", lifetime: this.child(fields, "lifetime", pointer, this.lifetime) };
      case GenericArgumentKind.Type:
        return { kind: "TypeArg", ty: this.child(fields, "ty", pointer, this.type) };
      case GenericArgumentKind.Binding:
        return {
          kind: "Binding",
          ident: this.name(fields, "ident", pointer, "identifier"),
          ty: this.child(fields, "ty", pointer, this.type),
        };
      case GenericArgumentKind.Constraint:
        return {
          kind: "Constraint",
          ident: this.name(fields, "ident", pointer, "identifier"),
          bounds: this.list(fields, "bounds", pointer, this.bound),
        };
      case GenericArgumentKind.Const:
        return { kind: "ConstArg", expr: this.child(fields, "expr", pointer, this.expr) };
      default:
        return this.fail(`unknown generic argument kind '${kind}'`, `${pointer}/kind`);
    }
  };

  // ─── Types ───────────────────────────────────────────────────────────────

  private type = (value: unknown, pointer: string): TypeNode => {
    const fields = this.fields(value, pointer);
    const kind = this.kindOf(fields, pointer);
    switch (kind) {
      case "PathType":
        return {
          kind: "PathType",
          qself: this.optional(fields, "qself", pointer, this.qself),
          path: this.child(fields, "path", pointer, this.path),
        };
      case "ReferenceType":
        return {
          kind: "ReferenceType",
          lifetime: this.optional(fields, "lifetime", pointer, this.lifetime),
          mutable: this.flag(fields, "mutable", pointer),
          elem: this.child(fields, "elem", pointer, this.type),
        };
      case "PtrType":
        return {
          kind: "PtrType",
          mutable: this.flag(fields, "mutable", pointer),
          elem: this.child(fields, "elem", pointer, this.type),
        };
      case "SliceType":
        return { kind: "SliceType", elem: this.child(fields, "elem", pointer, this.type) };
      case "ArrayType":
        return {
          kind: "ArrayType",
          elem: this.child(fields, "elem", pointer, this.type),
          len: this.child(fields, "len", pointer, this.expr),
        };
      case "TupleType":
        return { kind: "TupleType", elems: this.list(fields, "elems", pointer, this.type) };
      case "TraitObjectType":
        return {
          kind: "TraitObjectType",
          dyn: this.flag(fields, "dyn", pointer),
          bounds: this.list(fields, "bounds", pointer, this.bound),
        };
      case "ImplTraitType":
        return { kind: "ImplTraitType", bounds: this.list(fields, "bounds", pointer, this.bound) };
      case "BareFnType":
        return {
          kind: "BareFnType",
          inputs: this.list(fields, "inputs", pointer, this.type),
          output: this.returnTypeField(fields, pointer),
        };
      case "NeverType":
        return { kind: "NeverType" };
      case "InferType":
        return { kind: "InferType" };
      case "ParenType":
        return { kind: "ParenType", elem: this.child(fields, "elem", pointer, this.type) };
      default:
        return this.fail(`unknown type kind '${kind}'`, `${pointer}/kind`);
    }
  };

  private lifetime = (value: unknown, pointer: string): Lifetime => {
    const fields = this.node(value, pointer, "Lifetime");
    return { kind: "Lifetime", ident: this.name(fields, "ident", pointer, "lifetime name") };
  };

  private bound = (value: unknown, pointer: string): TypeParamBound => {
    const kind = this.kindOf(this.fields(value, pointer), pointer);
    if (kind === "Lifetime") return this.lifetime(value, pointer);
    if (kind === "TraitBound") return this.traitBound(value, pointer);
    return this.fail(`unknown bound kind '${kind}'`, `${pointer}/kind`);
  };

  private traitBound = (value: unknown, pointer: string): TraitBound => {
    const fields = this.node(value, pointer, "TraitBound");
    const modifier = fields.get("modifier") ?? "none";
    if (modifier !== "none" && modifier !== "maybe") {
      return this.fail("'modifier' must be \"none\" or \"maybe\"", `${pointer}/modifier`);
    }
    return {
      kind: "TraitBound",
      modifier: modifier === "maybe" ? "maybe" : "none",
      lifetimes: fields.has("lifetimes") ? this.list(fields, "lifetimes", pointer, this.lifetime) : [],
      path: this.child(fields, "path", pointer, this.path),
    };
  };

  private returnTypeField(fields: Fields, pointer: string): ReturnType {
    if (!fields.has("output")) return { kind: "DefaultReturn" };
    return this.child(fields, "output", pointer, this.returnType);
  }

  private returnType = (value: unknown, pointer: string): ReturnType => {
    const fields = this.fields(value, pointer);
    const kind = this.kindOf(fields, pointer);
    if (kind === "DefaultReturn") return { kind: "DefaultReturn" };
    if (kind === "TypeReturn") return { kind: "TypeReturn", ty: this.child(fields, "ty", pointer, this.type) };
    return this.fail(`unknown return type kind '${kind}'`, `${pointer}/kind`);
  };

  // ─── Expressions ─────────────────────────────────────────────────────────

  private expr = (value: unknown, pointer: string): Expression => {
    const fields = this.fields(value, pointer);
    const kind = this.kindOf(fields, pointer);
    switch (kind) {
      case "LitExpr":
        return { kind: "LitExpr", lit: this.child(fields, "lit", pointer, this.literal) };
      case "BlockExpr":
        return { kind: "BlockExpr", stmts: this.list(fields, "stmts", pointer, this.stmt) };
      case "PathExpr":
        return {
          kind: "PathExpr",
          qself: this.optional(fields, "qself", pointer, this.qself),
          path: this.child(fields, "path", pointer, this.path),
        };
      case "BinaryExpr":
        return {
          kind: "BinaryExpr",
          left: this.child(fields, "left", pointer, this.expr),
          operator: this.operatorName(fields, pointer, BINARY_OPERATORS, "binary"),
          right: this.child(fields, "right", pointer, this.expr),
        };
      case "UnaryExpr":
        return {
          kind: "UnaryExpr",
          operator: this.operatorName(fields, pointer, UNARY_OPERATORS, "unary"),
          operand: this.child(fields, "operand", pointer, this.expr),
        };
      case "ParenExpr":
        return { kind: "ParenExpr", expr: this.child(fields, "expr", pointer, this.expr) };
      case "CallExpr":
        return {
          kind: "CallExpr",
          callee: this.child(fields, "callee", pointer, this.expr),
          args: this.list(fields, "args", pointer, this.expr),
        };
      case "MethodCallExpr":
        return {
          kind: "MethodCallExpr",
          receiver: this.child(fields, "receiver", pointer, this.expr),
          method: this.name(fields, "method", pointer, "identifier"),
          turbofish: this.optional(fields, "turbofish", pointer, this.angleBracketed),
          args: this.list(fields, "args", pointer, this.expr),
        };
      default:
        return this.fail(`unknown expression kind '${kind}'`, `${pointer}/kind`);
    }
  };

  private stmt = (value: unknown, pointer: string): Statement => {
    const fields = this.node(value, pointer, "ExprStmt");
    return {
      kind: "ExprStmt",
      expr: this.child(fields, "expr", pointer, this.expr),
      semi: this.flag(fields, "semi", pointer),
    };
  };

  private literal = (value: unknown, pointer: string): Literal => {
    const fields = this.fields(value, pointer);
    const kind = this.kindOf(fields, pointer);
    switch (kind) {
      case "IntLit":
        return { kind: "IntLit", value: this.name(fields, "value", pointer, "integer literal") };
      case "FloatLit":
        return { kind: "FloatLit", value: this.name(fields, "value", pointer, "float literal") };
      case "BoolLit": {
        const flag = fields.get("value");
        if (typeof flag !== "boolean") return this.fail("'value' must be a boolean", `${pointer}/value`);
        return { kind: "BoolLit", value: flag };
      }
      case "StrLit":
        return { kind: "StrLit", value: this.string(fields, "value", pointer) };
      case "CharLit": {
        const ch = this.string(fields, "value", pointer);
        if ([...ch].length !== 1) return this.fail("'value' must be a single character", `${pointer}/value`);
        return { kind: "CharLit", value: ch };
      }
      default:
        return this.fail(`unknown literal kind '${kind}'`, `${pointer}/kind`);
    }
  };

  // ─── Field helpers ───────────────────────────────────────────────────────

  private fail(message: string, pointer: string): never {
    this.diagnostics.push({
      severity: Severity.Error,
      message,
      location: { file: this.file, pointer },
    });
    throw new DecodeError();
  }

  private fields(value: unknown, pointer: string): Fields {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
      return this.fail("expected an object", pointer);
    }
    return new Map<string, unknown>(Object.entries(value));
  }

  private kindOf(fields: Fields, pointer: string): string {
    const kind = fields.get("kind");
    if (typeof kind !== "string") return this.fail("missing 'kind'", pointer);
    return kind;
  }

  /** Reads an object that must be a node of the given kind. */
  private node(value: unknown, pointer: string, kind: string): Fields {
    const fields = this.fields(value, pointer);
    const actual = this.kindOf(fields, pointer);
    if (actual !== kind) return this.fail(`expected '${kind}' but found '${actual}'`, `${pointer}/kind`);
    return fields;
  }

  private field(fields: Fields, key: string, pointer: string): unknown {
    if (!fields.has(key)) return this.fail(`missing '${key}'`, pointer);
    return fields.get(key);
  }

  private string(fields: Fields, key: string, pointer: string): string {
    const value = this.field(fields, key, pointer);
    if (typeof value !== "string") return this.fail(`'${key}' must be a string`, `${pointer}/${key}`);
    if (UNPAIRED_SURROGATE.test(value)) {
      return this.fail(`'${key}' contains an unpaired surrogate`, `${pointer}/${key}`);
    }
    return value;
  }

  /** A non-empty string field that must be a single token of `lexical` class. */
  private name(fields: Fields, key: string, pointer: string, lexical: LexicalClass): string {
    const value = this.string(fields, key, pointer);
    if (value.length === 0) return this.fail(`'${key}' must not be empty`, `${pointer}/${key}`);
    if (!LEXICAL[lexical].test(value)) {
      return this.fail(`'${key}' is not a valid ${lexical}`, `${pointer}/${key}`);
    }
    return value;
  }

  private operatorName(fields: Fields, pointer: string, allowed: ReadonlySet<string>, arity: string): string {
    const value = this.string(fields, "operator", pointer);
    if (!allowed.has(value)) return this.fail(`'operator' is not a ${arity} operator`, `${pointer}/operator`);
    return value;
  }

  private flag(fields: Fields, key: string, pointer: string): boolean {
    const value = fields.get(key) ?? false;
    if (typeof value !== "boolean") return this.fail(`'${key}' must be a boolean`, `${pointer}/${key}`);
    return value;
  }

  private child<T>(fields: Fields, key: string, pointer: string, decode: ItemDecoder<T>): T {
    return decode(this.field(fields, key, pointer), `${pointer}/${key}`);
  }

  private optional<T>(fields: Fields, key: string, pointer: string, decode: ItemDecoder<T>): T | null {
    const value = fields.get(key);
    if (value === undefined || value === null) return null;
    return decode(value, `${pointer}/${key}`);
  }

  private list<T>(fields: Fields, key: string, pointer: string, decode: ItemDecoder<T>): T[] {
    const value = this.field(fields, key, pointer);
    if (!Array.isArray(value)) return this.fail(`'${key}' must be an array`, `${pointer}/${key}`);
    return value.map((item: unknown, i) => decode(item, `${pointer}/${key}/${i}`));
  }
}

class DecodeError extends Error {
  constructor() {
    super("Decode error");
  }
}
