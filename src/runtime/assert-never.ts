/**
 * Exhaustiveness helper for closed unions (values, builders, fragments, errors).
 * Put it in the `default` branch so adding a variant breaks the build.
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(x)}`);
}
