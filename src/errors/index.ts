export { formatDiagnostic, Severity } from "./diagnostic.ts";
export type { Diagnostic, NodeLocation } from "./diagnostic.ts";
