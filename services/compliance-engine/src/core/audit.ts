import {
  type AuditChainVerification,
  type AuditEvent,
  type AuditEventName,
  canonicalJson,
  GENESIS_HASH,
  sha256Hex,
  toHex,
} from "@cledger/shared";

type UnhashedAuditEvent = Omit<AuditEvent, "eventHash">;

export function computeEventHash(event: UnhashedAuditEvent, prevHash: string): string {
  return sha256Hex(`${canonicalJson(event)}\n${prevHash}`);
}

export function formatAuditLine(name: AuditEventName, subjectHex: string, callerHex: string): string {
  return `${name}|${subjectHex}|${callerHex}`;
}

/**
 * Audit events emitted during one call. They continue the chain from the last
 * committed event and are appended to the log only when the call commits.
 */
export class StagedAuditLog {
  private readonly staged: AuditEvent[] = [];

  constructor(
    private readonly tip: AuditEvent | null,
    private readonly clock: () => Date,
  ) {}

  emit(name: AuditEventName, subject: Uint8Array, caller: Uint8Array): AuditEvent {
    const previous = this.staged[this.staged.length - 1] ?? this.tip;
    const subjectHex = toHex(subject);
    const callerHex = toHex(caller);
    const prevHash = previous?.eventHash ?? GENESIS_HASH;
    const unhashed: UnhashedAuditEvent = {
      seq: (previous?.seq ?? 0) + 1,
      name,
      subjectHex,
      callerHex,
      log: formatAuditLine(name, subjectHex, callerHex),
      occurredAt: this.clock().toISOString(),
      prevHash,
    };
    const event: AuditEvent = { ...unhashed, eventHash: computeEventHash(unhashed, prevHash) };
    this.staged.push(event);
    return event;
  }

  events(): AuditEvent[] {
    return [...this.staged];
  }
}

export function verifyAuditChain(events: AuditEvent[]): AuditChainVerification {
  let prevHash = GENESIS_HASH;
  let expectedSeq = 1;
  for (const event of events) {
    const { eventHash, ...unhashed } = event;
    const intact =
      event.seq === expectedSeq &&
      event.prevHash === prevHash &&
      event.log === formatAuditLine(event.name, event.subjectHex, event.callerHex) &&
      computeEventHash(unhashed, prevHash) === eventHash;
    if (!intact) {
      return { valid: false, checked: expectedSeq - 1, firstBrokenSeq: event.seq };
    }
    prevHash = eventHash;
    expectedSeq += 1;
  }
  return { valid: true, checked: events.length };
}
