import type { ParseOutcome } from "../types.js";

/** Flatten an outcome so assertions can compare the remaining text directly. */
export function view<T>(
  r: ParseOutcome<T>
): { ok: true; value: T; rest: string } | { ok: false; at: string; expected: string } {
  return r.ok
    ? { ok: true, value: r.value, rest: r.rest.rest }
    : { ok: false, at: r.at.rest, expected: r.expected };
}
