import type { AuditEvent, AuditEventFilter } from "@cledger/shared";

export interface KeyValueReader {
  get(key: Uint8Array): Uint8Array | null;
}

export interface KeyValueWrite {
  key: Uint8Array;
  value: Uint8Array;
}

export interface LedgerChanges {
  writes: KeyValueWrite[];
  events: AuditEvent[];
}

/**
 * Durable storage for entity values and the audit event log. `commit` applies
 * every write and appends every event, or does nothing when it throws.
 */
export interface LedgerStore extends KeyValueReader {
  commit(changes: LedgerChanges): void;
  lastEvent(): AuditEvent | null;
  listEvents(filter?: AuditEventFilter): AuditEvent[];
  close(): void;
}

export class EventSequenceError extends Error {
  constructor(expected: number, received: number) {
    super(`Audit event sequence gap: expected ${expected}, received ${received}`);
    this.name = "EventSequenceError";
  }
}

export function matchesAuditFilter(event: AuditEvent, filter: AuditEventFilter = {}): boolean {
  if (filter.name !== undefined && event.name !== filter.name) return false;
  if (filter.subjectHex !== undefined && event.subjectHex !== filter.subjectHex) return false;
  if (filter.callerHex !== undefined && event.callerHex !== filter.callerHex) return false;
  return true;
}

/** Throws unless `events` continue the log right after `tip`, one seq at a time. */
export function assertEventsFollow(tip: AuditEvent | null, events: AuditEvent[]): void {
  let expected = (tip?.seq ?? 0) + 1;
  for (const event of events) {
    if (event.seq !== expected) {
      throw new EventSequenceError(expected, event.seq);
    }
    expected += 1;
  }
}
