export enum Severity {
  Error = "error",
  Warning = "warning",
  Info = "info",
}

/** Position of a node inside a decoded document. */
export interface NodeLocation {
  file: string;
  /** JSON Pointer (RFC 6901) to the offending value, `""` for the root. */
  pointer: string;
}

export interface Diagnostic {
  severity: Severity;
  message: string;
  location: NodeLocation;
}

/** `file#/pointer: severity: message` */
export function formatDiagnostic(diag: Diagnostic): string {
  const file = diag.location.file || "<input>";
  return `${file}#${diag.location.pointer}: ${diag.severity}: ${diag.message}`;
}
