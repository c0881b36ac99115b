/**
 * Exhaustiveness guard for `_tag`/`kind` switches over closed unions.
 * Adding a union member without a matching `case` becomes a compile error.
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(x)}`);
}
