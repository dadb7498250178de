import { BATCH_LIST_DELIMITER } from "@cledger/shared";
import { concatBytes } from "@noble/hashes/utils";
import { decodeUtf8, encodeUtf8 } from "../storage/codec.js";
import { vendorKey } from "../storage/keys.js";
import type { KeyValueReader } from "../storage/ledger-store.js";
import type { StagedStore } from "../storage/staged-store.js";
import type { Account } from "./account.js";

const DELIMITER_BYTES = encodeUtf8(BATCH_LIST_DELIMITER);

export function joinBatchList(batchIds: readonly string[]): string {
  return batchIds.join(BATCH_LIST_DELIMITER);
}

export function splitBatchList(joined: string): string[] {
  return joined.split(BATCH_LIST_DELIMITER).filter((batchId) => batchId.length > 0);
}

/**
 * Batches per vendor, in creation order. Only batch creation appends, so a
 * batch is listed exactly when its state entry exists.
 */
export class VendorRegistry {
  appendBatch(store: StagedStore, vendor: Account, batchId: Uint8Array): void {
    const key = vendorKey(vendor.bytes);
    const existing = store.get(key);
    store.put(key, existing ? concatBytes(existing, DELIMITER_BYTES, batchId) : batchId);
  }

  getVendorBatches(store: KeyValueReader, vendor: Account): string[] {
    const stored = store.get(vendorKey(vendor.bytes));
    if (!stored) return [];
    return splitBatchList(decodeUtf8(stored));
  }
}
