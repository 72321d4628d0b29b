import { describe, expect, test } from "vitest";
import { TreeDecoder } from "../../src/ast/decode.ts";
import { formatDiagnostic, Severity } from "../../src/errors/index.ts";
import { print, printQPath } from "../../src/index.ts";
import { angle, ltArg, path, qself, seg, tyArg } from "../helpers.ts";

const segment = (ident: string) => ({ kind: "PathSegment", ident });

function decodeErrors(value: unknown): Array<{ message: string; pointer: string }> {
  const decoder = new TreeDecoder("input.json");
  expect(decoder.decode(value)).toBeNull();
  return decoder.getDiagnostics().map((d) => ({ message: d.message, pointer: d.location.pointer }));
}

describe("TreeDecoder — valid documents", () => {
  test("qualified path", () => {
    const doc = {
      kind: "QualifiedPath",
      qself: {
        kind: "QSelf",
        ty: { kind: "PathType", path: { kind: "Path", segments: [segment("T")] } },
        position: 1,
      },
      path: { kind: "Path", segments: [segment("Interface"), segment("Member")] },
    };
    const decoder = new TreeDecoder();
    const node = decoder.decodeQualifiedPath(doc);
    expect(decoder.getDiagnostics()).toEqual([]);
    expect(node).toEqual({
      kind: "QualifiedPath",
      qself: qself("T", 1),
      path: path("Interface", "Member"),
    });
  });

  test("fills in omitted optional fields", () => {
    const node = new TreeDecoder().decode({ kind: "Path", segments: [segment("A")] });
    expect(node).toEqual(path("A"));
  });

  test("generic arguments of every kind", () => {
    const doc = {
      kind: "Path",
      segments: [
        {
          kind: "PathSegment",
          ident: "Foo",
          arguments: {
            kind: "AngleBracketed",
            args: [
              { kind: "ConstArg", expr: { kind: "LitExpr", lit: { kind: "IntLit", value: "1" } } },
              { kind: "LifetimeArg", lifetime: { kind: "Lifetime", ident: "a" } },
              { kind: "TypeArg", ty: { kind: "PathType", path: { kind: "Path", segments: [segment("T")] } } },
              {
                kind: "Binding",
                ident: "Item",
                ty: { kind: "PathType", path: { kind: "Path", segments: [segment("U")] } },
              },
              {
                kind: "Constraint",
                ident: "Out",
                bounds: [
                  { kind: "TraitBound", modifier: "maybe", path: { kind: "Path", segments: [segment("Sized")] } },
                  { kind: "Lifetime", ident: "b" },
                ],
              },
            ],
          },
        },
      ],
    };
    const node = new TreeDecoder().decode(doc);
    expect(node).not.toBeNull();
    if (node === null) return;
    expect(print(node)).toBe("Foo<'a, 1, T, Item = U, Out: ?Sized + 'b>");
  });

  test("type root", () => {
    const doc = {
      kind: "ReferenceType",
      lifetime: { kind: "Lifetime", ident: "a" },
      elem: { kind: "SliceType", elem: { kind: "PathType", path: { kind: "Path", segments: [segment("u8")] } } },
    };
    const node = new TreeDecoder().decode(doc);
    expect(node === null ? null : print(node)).toBe("&'a [u8]");
  });

  test("expression root", () => {
    const doc = {
      kind: "BlockExpr",
      stmts: [{ kind: "ExprStmt", expr: { kind: "LitExpr", lit: { kind: "CharLit", value: "x" } } }],
    };
    const node = new TreeDecoder().decode(doc);
    expect(node === null ? null : print(node)).toBe("{'x'}");
  });

  test("position past the end is accepted and clamped when printing", () => {
    const doc = {
      kind: "QualifiedPath",
      qself: { kind: "QSelf", ty: { kind: "InferType" }, position: 9 },
      path: { kind: "Path", segments: [segment("Tr")] },
    };
    const node = new TreeDecoder().decodeQualifiedPath(doc);
    expect(node?.qself?.position).toBe(9);
    expect(node === null ? null : printQPath(node.qself, node.path)).toBe("<_ as Tr>");
  });

  test("decoding the JSON form of a tree yields the same tree and output", () => {
    const tree = {
      kind: "QualifiedPath" as const,
      qself: qself("T", 1),
      path: path(seg("Tr", angle(ltArg("a"), tyArg("U"))), "Out"),
    };
    const decoded = new TreeDecoder().decode(JSON.parse(JSON.stringify(tree)));
    expect(decoded).toEqual(tree);
    expect(decoded === null ? null : print(decoded)).toBe(print(tree));
    expect(print(tree)).toBe("<T as Tr<'a, U>>::Out");
  });
});

describe("TreeDecoder — lexical checks", () => {
  const lit = (kind: string, value: string) => ({ kind: "LitExpr", lit: { kind, value } });

  test("raw and non-ASCII identifiers are accepted", () => {
    const node = new TreeDecoder().decode({ kind: "Path", segments: [segment("r#match"), segment("über")] });
    expect(node === null ? null : print(node)).toBe("r#match::über");
  });

  test("numeric literals with suffixes and separators are accepted", () => {
    for (const [kind, value] of [
      ["IntLit", "1_000usize"],
      ["IntLit", "0x1F_u8"],
      ["IntLit", "0b1010"],
      ["FloatLit", "2.5e-3f64"],
      ["FloatLit", "1f32"],
      ["FloatLit", "3.0"],
    ] as const) {
      const node = new TreeDecoder().decode(lit(kind, value));
      expect(node === null ? null : print(node)).toBe(value);
    }
  });

  test("identifier holding punctuation or spaces", () => {
    expect(decodeErrors({ kind: "Path", segments: [segment("Vec<u8>")] })).toEqual([
      { message: "'ident' is not a valid identifier", pointer: "/segments/0/ident" },
    ]);
    expect(decodeErrors({ kind: "Path", segments: [segment("a b")] })).toEqual([
      { message: "'ident' is not a valid identifier", pointer: "/segments/0/ident" },
    ]);
    expect(decodeErrors({ kind: "Path", segments: [segment("a::b")] })).toEqual([
      { message: "'ident' is not a valid identifier", pointer: "/segments/0/ident" },
    ]);
  });

  test("binding and constraint names", () => {
    const ty = { kind: "InferType" };
    const args = (arg: unknown) => ({
      kind: "Path",
      segments: [{ kind: "PathSegment", ident: "I", arguments: { kind: "AngleBracketed", args: [arg] } }],
    });
    expect(decodeErrors(args({ kind: "Binding", ident: "Item=", ty }))).toEqual([
      { message: "'ident' is not a valid identifier", pointer: "/segments/0/arguments/args/0/ident" },
    ]);
    expect(decodeErrors(args({ kind: "Constraint", ident: "1x", bounds: [] }))).toEqual([
      { message: "'ident' is not a valid identifier", pointer: "/segments/0/arguments/args/0/ident" },
    ]);
  });

  test("method name", () => {
    const doc = { kind: "MethodCallExpr", receiver: lit("IntLit", "1"), method: "f()", args: [] };
    expect(decodeErrors(doc)).toEqual([{ message: "'method' is not a valid identifier", pointer: "/method" }]);
  });

  test("lifetime name written with its apostrophe", () => {
    const doc = { kind: "ReferenceType", lifetime: { kind: "Lifetime", ident: "'a" }, elem: { kind: "InferType" } };
    expect(decodeErrors(doc)).toEqual([
      { message: "'ident' is not a valid lifetime name", pointer: "/lifetime/ident" },
    ]);
  });

  test("integer literal holding an expression", () => {
    expect(decodeErrors(lit("IntLit", "N > 1"))).toEqual([
      { message: "'value' is not a valid integer literal", pointer: "/lit/value" },
    ]);
  });

  test("float literal without fraction, exponent or suffix", () => {
    expect(decodeErrors(lit("FloatLit", "1"))).toEqual([
      { message: "'value' is not a valid float literal", pointer: "/lit/value" },
    ]);
  });

  test("operators outside the operator sets", () => {
    const doc = { kind: "BinaryExpr", left: lit("IntLit", "1"), operator: ") + (", right: lit("IntLit", "2") };
    expect(decodeErrors(doc)).toEqual([{ message: "'operator' is not a binary operator", pointer: "/operator" }]);
    expect(decodeErrors({ kind: "UnaryExpr", operator: "+", operand: lit("IntLit", "1") })).toEqual([
      { message: "'operator' is not a unary operator", pointer: "/operator" },
    ]);
  });

  test("unpaired surrogates", () => {
    expect(decodeErrors(lit("StrLit", "a\ud800"))).toEqual([
      { message: "'value' contains an unpaired surrogate", pointer: "/lit/value" },
    ]);
    const paired = new TreeDecoder().decode(lit("StrLit", "\u{1F600}"));
    expect(paired === null ? null : print(paired)).toBe('"\u{1F600}"');
  });
});

describe("TreeDecoder — diagnostics", () => {
  test("root must be an object", () => {
    expect(decodeErrors(42)).toEqual([{ message: "expected an object", pointer: "" }]);
    expect(decodeErrors([])).toEqual([{ message: "expected an object", pointer: "" }]);
  });

  test("missing kind", () => {
    expect(decodeErrors({ segments: [] })).toEqual([{ message: "missing 'kind'", pointer: "" }]);
  });

  test("node that cannot be printed on its own", () => {
    expect(decodeErrors({ kind: "Lifetime", ident: "a" })).toEqual([
      { message: "'Lifetime' cannot be printed on its own", pointer: "" },
    ]);
  });

  test("missing field", () => {
    expect(decodeErrors({ kind: "Path" })).toEqual([{ message: "missing 'segments'", pointer: "" }]);
  });

  test("unknown nested kind points at the node", () => {
    const doc = { kind: "Path", segments: [{ kind: "PathSegment", ident: "A", arguments: { kind: "Bogus" } }] };
    expect(decodeErrors(doc)).toEqual([
      { message: "unknown path arguments kind 'Bogus'", pointer: "/segments/0/arguments/kind" },
    ]);
  });

  test("wrong node kind for a field", () => {
    const doc = { kind: "QualifiedPath", path: { kind: "PathSegment", ident: "A" } };
    expect(decodeErrors(doc)).toEqual([
      { message: "expected 'Path' but found 'PathSegment'", pointer: "/path/kind" },
    ]);
  });

  test("negative qself position", () => {
    const doc = {
      kind: "QualifiedPath",
      qself: { kind: "QSelf", ty: { kind: "NeverType" }, position: -1 },
      path: { kind: "Path", segments: [] },
    };
    expect(decodeErrors(doc)).toEqual([
      { message: "'position' must be a non-negative integer", pointer: "/qself/position" },
    ]);
  });

  test("wrong primitive types", () => {
    expect(decodeErrors({ kind: "Path", leadingColon: "yes", segments: [] })).toEqual([
      { message: "'leadingColon' must be a boolean", pointer: "/leadingColon" },
    ]);
    expect(decodeErrors({ kind: "Path", segments: {} })).toEqual([
      { message: "'segments' must be an array", pointer: "/segments" },
    ]);
    expect(decodeErrors({ kind: "Path", segments: [{ kind: "PathSegment", ident: "" }] })).toEqual([
      { message: "'ident' must not be empty", pointer: "/segments/0/ident" },
    ]);
  });

  test("char literal must hold exactly one character", () => {
    const doc = { kind: "LitExpr", lit: { kind: "CharLit", value: "ab" } };
    expect(decodeErrors(doc)).toEqual([{ message: "'value' must be a single character", pointer: "/lit/value" }]);
  });

  test("bad bound modifier", () => {
    const doc = {
      kind: "ImplTraitType",
      bounds: [{ kind: "TraitBound", modifier: "const", path: { kind: "Path", segments: [segment("A")] } }],
    };
    expect(decodeErrors(doc)).toEqual([
      { message: "'modifier' must be \"none\" or \"maybe\"", pointer: "/bounds/0/modifier" },
    ]);
  });

  test("diagnostics carry the file name and format as file#pointer", () => {
    const decoder = new TreeDecoder("q.json");
    decoder.decode({ kind: "Path" });
    const [diag] = decoder.getDiagnostics();
    expect(diag?.severity).toBe(Severity.Error);
    expect(diag === undefined ? "" : formatDiagnostic(diag)).toBe("q.json#: error: missing 'segments'");
  });
});
