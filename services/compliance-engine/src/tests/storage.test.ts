import assert from "node:assert/strict";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import type { AuditEvent } from "@cledger/shared";
import { StagedAuditLog } from "../core/audit.js";
import {
  CorruptValueError,
  decodeUint64,
  decodeUtf8,
  encodeUint64,
  encodeUtf8,
} from "../storage/codec.js";
import { assetKey, batchKey, roleKey, vendorKey } from "../storage/keys.js";
import { EventSequenceError } from "../storage/ledger-store.js";
import { MemoryLedgerStore } from "../storage/memory-store.js";
import { SqliteLedgerStore } from "../storage/sqlite-store.js";
import { StagedStore } from "../storage/staged-store.js";

function createTempDbPath() {
  const dir = mkdtempSync(join(tmpdir(), "cledger-storage-"));
  return {
    dir,
    dbPath: join(dir, "ledger.db"),
  };
}

function stageEvents(tip: AuditEvent | null, count: number): AuditEvent[] {
  const log = new StagedAuditLog(tip, () => new Date("2026-03-03T00:00:00.000Z"));
  for (let i = 0; i < count; i += 1) {
    log.emit("create_batch", encodeUtf8(`B-${i}`), new Uint8Array(20).fill(0x22));
  }
  return log.events();
}

test("encodes integers as fixed 8-byte big-endian values", () => {
  assert.deepEqual([...encodeUint64(0)], [0, 0, 0, 0, 0, 0, 0, 0]);
  assert.deepEqual([...encodeUint64(2)], [0, 0, 0, 0, 0, 0, 0, 2]);
  assert.deepEqual([...encodeUint64(1001)], [0, 0, 0, 0, 0, 0, 0x03, 0xe9]);
  assert.equal(decodeUint64(encodeUint64(Number.MAX_SAFE_INTEGER)), Number.MAX_SAFE_INTEGER);
  assert.throws(() => encodeUint64(-1), RangeError);
  assert.throws(() => encodeUint64(1.5), RangeError);
  assert.throws(() => decodeUint64(new Uint8Array([1, 2])), CorruptValueError);
  assert.throws(() => decodeUint64(new Uint8Array(8).fill(0xff)), CorruptValueError);
  assert.throws(() => decodeUtf8(new Uint8Array([0xc3])), CorruptValueError);
});

test("builds disjoint prefixed keys", () => {
  const id = encodeUtf8("B-1");
  assert.equal(decodeUtf8(batchKey(id)), "batch:B-1");
  assert.equal(decodeUtf8(assetKey(id)), "asset:B-1");
  assert.equal(decodeUtf8(roleKey(id)), "role:B-1");
  assert.equal(decodeUtf8(vendorKey(id)), "vendor:B-1");
  assert.deepEqual(batchKey(id), batchKey(encodeUtf8("B-1")));
});

test("staged writes shadow the base store until committed", () => {
  const base = new MemoryLedgerStore();
  const key = encodeUtf8("batch:B-1");
  base.commit({ writes: [{ key, value: encodeUint64(0) }], events: [] });

  const staged = new StagedStore(base);
  staged.put(key, encodeUint64(1));
  staged.put(encodeUtf8("asset:B-1"), encodeUint64(1001));
  staged.put(key, encodeUint64(2));

  assert.equal(decodeUint64(staged.get(key) ?? new Uint8Array()), 2);
  assert.equal(decodeUint64(base.get(key) ?? new Uint8Array()), 0);
  assert.equal(staged.has(encodeUtf8("asset:B-1")), true);
  assert.equal(base.get(encodeUtf8("asset:B-1")), null);
  assert.deepEqual(
    staged.changes().map((write) => decodeUtf8(write.key)),
    ["batch:B-1", "asset:B-1"],
  );
});

test("memory store rejects events that do not continue the log", () => {
  const store = new MemoryLedgerStore();
  const [first, second] = stageEvents(null, 2);
  assert.ok(first && second);
  assert.throws(
    () => store.commit({ writes: [{ key: encodeUtf8("k"), value: encodeUtf8("v") }], events: [second] }),
    EventSequenceError,
  );
  assert.equal(store.get(encodeUtf8("k")), null);
  assert.equal(store.lastEvent(), null);
});

test("sqlite store persists entries and events across reopen", () => {
  const temp = createTempDbPath();
  try {
    const store = new SqliteLedgerStore(temp.dbPath);
    const events = stageEvents(null, 3);
    store.commit({
      writes: [
        { key: encodeUtf8("batch:B-0"), value: encodeUint64(0) },
        { key: encodeUtf8("vendor:v"), value: encodeUtf8("B-0|B-1") },
      ],
      events,
    });
    store.close();

    const reopened = new SqliteLedgerStore(temp.dbPath);
    try {
      assert.equal(decodeUint64(reopened.get(encodeUtf8("batch:B-0")) ?? new Uint8Array()), 0);
      assert.equal(decodeUtf8(reopened.get(encodeUtf8("vendor:v")) ?? new Uint8Array()), "B-0|B-1");
      assert.equal(reopened.get(encodeUtf8("batch:B-9")), null);
      assert.deepEqual(reopened.listEvents(), events);
      assert.equal(reopened.lastEvent()?.seq, 3);
      assert.deepEqual(
        reopened.listEvents({ subjectHex: events[1]?.subjectHex }).map((event) => event.seq),
        [2],
      );
      assert.deepEqual(reopened.listEvents({ name: "approve_batch" }), []);
    } finally {
      reopened.close();
    }
  } finally {
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("sqlite store commits all changes or none", () => {
  const temp = createTempDbPath();
  const store = new SqliteLedgerStore(temp.dbPath);
  try {
    const [first] = stageEvents(null, 1);
    assert.ok(first);
    store.commit({ writes: [], events: [first] });

    const key = encodeUtf8("batch:B-rollback");
    assert.throws(
      () => store.commit({ writes: [{ key, value: encodeUint64(0) }], events: [first] }),
      EventSequenceError,
    );
    assert.equal(store.get(key), null);
    assert.equal(store.listEvents().length, 1);

    store.commit({ writes: [{ key, value: encodeUint64(1) }], events: stageEvents(first, 1) });
    assert.equal(decodeUint64(store.get(key) ?? new Uint8Array()), 1);
    assert.equal(store.lastEvent()?.seq, 2);
  } finally {
    store.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});
