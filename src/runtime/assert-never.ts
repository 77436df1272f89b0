/**
 * Closes a `switch` over a tagged union; adding a `StrError` variant without a
 * case becomes a compile error at every call site.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
