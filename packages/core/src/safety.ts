/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, message)` — Runtime assertion for programming errors
 * - `unreachable(value?)` — Mark impossible code paths
 *
 * @example
 * ```typescript
 * type Outcome = { ok: true } | { ok: false };
 * function describe(o: Outcome): string {
 *   switch (o.ok) {
 *     case true: return "matched";
 *     case false: return "failed";
 *     default: return unreachable(o);
 *   }
 * }
 * ```
 */

/** Thrown when an `invariant()` check fails. */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

/**
 * Runtime invariant check.
 *
 * @throws InvariantError if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new InvariantError(message ?? "Invariant violation");
  }
}

/**
 * Mark a code path as unreachable. Useful for exhaustiveness checking.
 *
 * @param _value - A value of type `never` (for type-level exhaustiveness)
 */
export function unreachable(_value?: never): never {
  throw new InvariantError("Unreachable code reached");
}
