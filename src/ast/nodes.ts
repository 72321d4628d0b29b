/**
 * Syntax tree consumed by the printer.
 * Uses discriminated unions with a `kind` field.
 */

export * from "./nodes/index.ts";
