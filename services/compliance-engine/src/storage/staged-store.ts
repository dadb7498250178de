import { bytesToHex } from "@noble/hashes/utils";
import type { KeyValueReader, KeyValueWrite } from "./ledger-store.js";

/**
 * Write overlay for a single call. Reads see the call's own writes first;
 * nothing reaches the underlying store until the caller commits `changes()`.
 */
export class StagedStore implements KeyValueReader {
  private readonly writes = new Map<string, KeyValueWrite>();

  constructor(private readonly base: KeyValueReader) {}

  get(key: Uint8Array): Uint8Array | null {
    const staged = this.writes.get(bytesToHex(key));
    if (staged) return staged.value;
    return this.base.get(key);
  }

  has(key: Uint8Array): boolean {
    return this.get(key) !== null;
  }

  put(key: Uint8Array, value: Uint8Array): void {
    this.writes.set(bytesToHex(key), { key: key.slice(), value: value.slice() });
  }

  changes(): KeyValueWrite[] {
    return [...this.writes.values()];
  }
}
