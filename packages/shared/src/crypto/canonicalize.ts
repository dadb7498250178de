import { canonicalize } from "json-canonicalize";

/**
 * Canonical JSON per RFC 8785 (JCS).
 * Audit events are canonicalized before chaining so their hashes do not
 * depend on property insertion order.
 */
export function canonicalJson(value: unknown): string {
  return canonicalize(value);
}
