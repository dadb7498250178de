export type AuditEventName =
  | "assign_role"
  | "create_batch"
  | "approve_batch"
  | "certify_batch";

export interface AuditEvent {
  seq: number;
  name: AuditEventName;
  subjectHex: string;   // batch id or assigned account, lowercase hex
  callerHex: string;    // caller account, lowercase hex
  log: string;          // "<name>|<subjectHex>|<callerHex>"
  occurredAt: string;   // ISO date
  prevHash: string;
  eventHash: string;    // sha256Hex(canonicalJson(event without eventHash) + "\n" + prevHash)
}

export interface AuditEventFilter {
  name?: AuditEventName;
  subjectHex?: string;
  callerHex?: string;
}

export interface AuditChainVerification {
  valid: boolean;
  checked: number;
  firstBrokenSeq?: number;
}

export function isAuditEventName(value: unknown): value is AuditEventName {
  return (
    value === "assign_role" ||
    value === "create_batch" ||
    value === "approve_batch" ||
    value === "certify_batch"
  );
}
