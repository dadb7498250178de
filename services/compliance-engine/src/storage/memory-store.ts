import { bytesToHex } from "@noble/hashes/utils";
import type { AuditEvent, AuditEventFilter } from "@cledger/shared";
import {
  assertEventsFollow,
  type LedgerChanges,
  type LedgerStore,
  matchesAuditFilter,
} from "./ledger-store.js";

/** In-process store for tests and throwaway engines. */
export class MemoryLedgerStore implements LedgerStore {
  private readonly entries = new Map<string, Uint8Array>();
  private readonly events: AuditEvent[] = [];

  get(key: Uint8Array): Uint8Array | null {
    const value = this.entries.get(bytesToHex(key));
    return value ? value.slice() : null;
  }

  commit(changes: LedgerChanges): void {
    assertEventsFollow(this.lastEvent(), changes.events);
    for (const write of changes.writes) {
      this.entries.set(bytesToHex(write.key), write.value.slice());
    }
    for (const event of changes.events) {
      this.events.push({ ...event });
    }
  }

  lastEvent(): AuditEvent | null {
    const last = this.events[this.events.length - 1];
    return last ? { ...last } : null;
  }

  listEvents(filter?: AuditEventFilter): AuditEvent[] {
    return this.events
      .filter((event) => matchesAuditFilter(event, filter))
      .map((event) => ({ ...event }));
  }

  close(): void {
    this.entries.clear();
  }
}
