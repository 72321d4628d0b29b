/** Compile-time exhaustiveness check for `switch` over a discriminated union. */
export function assertNever(value: never, what: string): never {
  throw new Error(`Unhandled ${what}: ${JSON.stringify(value)}`);
}
