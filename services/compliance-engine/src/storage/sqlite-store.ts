import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type { AuditEvent, AuditEventFilter } from "@cledger/shared";
import {
  assertEventsFollow,
  type KeyValueWrite,
  type LedgerChanges,
  type LedgerStore,
} from "./ledger-store.js";

interface EntryRow {
  value: Buffer;
}

interface EventRow {
  event_json: string;
}

interface EventFilterParams {
  name: string | null;
  subject: string | null;
  caller: string | null;
}

export class SqliteLedgerStore implements LedgerStore {
  private readonly db: Database.Database;
  private readonly getEntryStmt: Database.Statement<[Buffer], EntryRow>;
  private readonly putEntryStmt: Database.Statement<[Buffer, Buffer]>;
  private readonly insertEventStmt: Database.Statement<[number, string, string, string, string]>;
  private readonly lastEventStmt: Database.Statement<[], EventRow>;
  private readonly listEventsStmt: Database.Statement<[EventFilterParams], EventRow>;
  private readonly commitTx: (changes: LedgerChanges) => void;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ledger_entries (
        entry_key BLOB PRIMARY KEY,
        entry_value BLOB NOT NULL
      );

      CREATE TABLE IF NOT EXISTS audit_events (
        seq INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        subject_hex TEXT NOT NULL,
        caller_hex TEXT NOT NULL,
        event_json TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_audit_events_subject
      ON audit_events(subject_hex, seq);
      CREATE INDEX IF NOT EXISTS idx_audit_events_caller
      ON audit_events(caller_hex, seq);
    `);

    this.getEntryStmt = this.db.prepare(`
      SELECT entry_value AS value
      FROM ledger_entries
      WHERE entry_key = ?
      LIMIT 1
    `) as Database.Statement<[Buffer], EntryRow>;

    this.putEntryStmt = this.db.prepare(`
      INSERT INTO ledger_entries (entry_key, entry_value)
      VALUES (?, ?)
      ON CONFLICT(entry_key) DO UPDATE SET
        entry_value = excluded.entry_value
    `);

    this.insertEventStmt = this.db.prepare(`
      INSERT INTO audit_events (seq, name, subject_hex, caller_hex, event_json)
      VALUES (?, ?, ?, ?, ?)
    `);

    this.lastEventStmt = this.db.prepare(`
      SELECT event_json
      FROM audit_events
      ORDER BY seq DESC
      LIMIT 1
    `) as Database.Statement<[], EventRow>;

    this.listEventsStmt = this.db.prepare(`
      SELECT event_json
      FROM audit_events
      WHERE (@name IS NULL OR name = @name)
        AND (@subject IS NULL OR subject_hex = @subject)
        AND (@caller IS NULL OR caller_hex = @caller)
      ORDER BY seq ASC
    `) as Database.Statement<[EventFilterParams], EventRow>;

    this.commitTx = this.db.transaction((changes: LedgerChanges) => {
      assertEventsFollow(this.lastEvent(), changes.events);
      for (const write of changes.writes) {
        this.putEntry(write);
      }
      for (const event of changes.events) {
        this.insertEventStmt.run(
          event.seq,
          event.name,
          event.subjectHex,
          event.callerHex,
          JSON.stringify(event),
        );
      }
    });
  }

  get(key: Uint8Array): Uint8Array | null {
    const row = this.getEntryStmt.get(Buffer.from(key));
    if (!row) return null;
    return new Uint8Array(row.value);
  }

  commit(changes: LedgerChanges): void {
    this.commitTx(changes);
  }

  lastEvent(): AuditEvent | null {
    const row = this.lastEventStmt.get();
    if (!row) return null;
    return JSON.parse(row.event_json) as AuditEvent;
  }

  listEvents(filter: AuditEventFilter = {}): AuditEvent[] {
    const rows = this.listEventsStmt.all({
      name: filter.name ?? null,
      subject: filter.subjectHex ?? null,
      caller: filter.callerHex ?? null,
    });
    return rows.map((row) => JSON.parse(row.event_json) as AuditEvent);
  }

  close(): void {
    this.db.close();
  }

  private putEntry(write: KeyValueWrite): void {
    this.putEntryStmt.run(Buffer.from(write.key), Buffer.from(write.value));
  }
}
