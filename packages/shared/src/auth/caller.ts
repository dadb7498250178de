/** Identity of the account behind a request, attached by the signing transport. */
export const CALLER_HEADER = "x-caller-address";

function firstString(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) {
    const first = value.find((item) => typeof item === "string");
    return typeof first === "string" ? first : null;
  }
  return null;
}

export function parseCallerHeader(value: unknown): string | null {
  const raw = firstString(value);
  if (raw === null) return null;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function buildCallerHeaders(address: string): Record<string, string> {
  return { [CALLER_HEADER]: address };
}
