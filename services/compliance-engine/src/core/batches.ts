import {
  BATCH_LIST_DELIMITER,
  BATCH_NOT_FOUND,
  BATCH_STATUS,
  type BatchStatusCode,
  type BatchStatusReading,
  isBatchStatusCode,
  MAX_BATCH_ID_BYTES,
  NO_ASSET,
  ROLE,
} from "@cledger/shared";
import type { CertificateMinter } from "../minting/minter.js";
import { buildMintRequest, toTokenId } from "../minting/minter.js";
import { CorruptValueError, decodeUint64, encodeUint64, encodeUtf8 } from "../storage/codec.js";
import { assetKey, batchKey } from "../storage/keys.js";
import type { KeyValueReader } from "../storage/ledger-store.js";
import type { Account } from "./account.js";
import type { CallContext } from "./context.js";
import { fail, ok, type Result } from "./result.js";
import type { RoleRegistry } from "./roles.js";
import type { VendorRegistry } from "./vendors.js";

export interface CertifiedBatch {
  status: typeof BATCH_STATUS.CERTIFIED;
  assetId: number;
}

const LONE_SURROGATE = /\p{Surrogate}/u;

/** Key bytes for an id that could be stored, or null when no batch can ever have it. */
export function encodeBatchId(batchId: string): Uint8Array | null {
  // Lone surrogates would encode to U+FFFD and collide with other ids.
  if (batchId.length === 0 || LONE_SURROGATE.test(batchId)) return null;
  const bytes = encodeUtf8(batchId);
  return bytes.length <= MAX_BATCH_ID_BYTES ? bytes : null;
}

function readState(store: KeyValueReader, key: Uint8Array): BatchStatusCode | null {
  const stored = store.get(key);
  if (!stored) return null;
  const state = decodeUint64(stored);
  if (!isBatchStatusCode(state)) {
    throw new CorruptValueError(`Stored batch state ${state} is out of range`);
  }
  return state;
}

/**
 * Created -> Approved -> Certified. Each transition re-derives the caller's
 * role from the store; there is no session to trust between calls.
 */
export class BatchLifecycle {
  constructor(
    private readonly roles: RoleRegistry,
    private readonly vendors: VendorRegistry,
    private readonly minter: CertificateMinter,
    private readonly engine: Account,
  ) {}

  createBatch(call: CallContext, caller: Account, batchId: string): Result<typeof BATCH_STATUS.CREATED> {
    if (this.roles.getRole(call.store, caller) !== ROLE.VENDOR) {
      return fail("UNAUTHORIZED", "Only vendors can create batches");
    }

    const idBytes = encodeBatchId(batchId);
    if (!idBytes) {
      return fail(
        "INVALID_ARGUMENT",
        `Batch id must be 1 to ${MAX_BATCH_ID_BYTES} bytes of UTF-8`,
      );
    }
    if (batchId.includes(BATCH_LIST_DELIMITER)) {
      return fail("INVALID_ARGUMENT", `Batch id must not contain '${BATCH_LIST_DELIMITER}'`);
    }

    const stateKey = batchKey(idBytes);
    if (call.store.has(stateKey)) {
      return fail("ALREADY_EXISTS", `Batch '${batchId}' already exists`);
    }

    call.store.put(stateKey, encodeUint64(BATCH_STATUS.CREATED));
    this.vendors.appendBatch(call.store, caller, idBytes);
    call.audit.emit("create_batch", idBytes, caller.bytes);
    return ok(BATCH_STATUS.CREATED);
  }

  approveBatch(call: CallContext, caller: Account, batchId: string): Result<typeof BATCH_STATUS.APPROVED> {
    if (this.roles.getRole(call.store, caller) !== ROLE.INSPECTOR) {
      return fail("UNAUTHORIZED", "Only inspectors can approve batches");
    }

    const idBytes = encodeBatchId(batchId);
    const stateKey = idBytes ? batchKey(idBytes) : null;
    const state = stateKey ? readState(call.store, stateKey) : null;
    if (!idBytes || !stateKey || state === null) {
      return fail("NOT_FOUND", `Batch '${batchId}' does not exist`);
    }
    if (state !== BATCH_STATUS.CREATED) {
      return fail("INVALID_TRANSITION", `Batch '${batchId}' must be CREATED to be approved`);
    }

    call.store.put(stateKey, encodeUint64(BATCH_STATUS.APPROVED));
    call.audit.emit("approve_batch", idBytes, caller.bytes);
    return ok(BATCH_STATUS.APPROVED);
  }

  async certifyBatch(call: CallContext, caller: Account, batchId: string): Promise<Result<CertifiedBatch>> {
    if (
      !this.roles.isAdministrator(caller) &&
      this.roles.getRole(call.store, caller) !== ROLE.INSPECTOR
    ) {
      return fail("UNAUTHORIZED", "Only the administrator or inspectors can certify batches");
    }

    const idBytes = encodeBatchId(batchId);
    const stateKey = idBytes ? batchKey(idBytes) : null;
    const state = stateKey ? readState(call.store, stateKey) : null;
    if (!idBytes || !stateKey || state === null) {
      return fail("NOT_FOUND", `Batch '${batchId}' does not exist`);
    }
    if (state !== BATCH_STATUS.APPROVED) {
      return fail("INVALID_TRANSITION", `Batch '${batchId}' must be APPROVED to be certified`);
    }

    call.store.put(stateKey, encodeUint64(BATCH_STATUS.CERTIFIED));

    let assetId: number;
    try {
      assetId = toTokenId(
        await this.minter.mint(buildMintRequest(batchId, this.engine.address), call.store),
      );
    } catch (error) {
      return fail(
        "MINTING_FAILURE",
        `Certificate minting failed for batch '${batchId}': ${error instanceof Error ? error.message : "unknown_error"}`,
      );
    }

    call.store.put(assetKey(idBytes), encodeUint64(assetId));
    call.audit.emit("certify_batch", idBytes, caller.bytes);
    return ok({ status: BATCH_STATUS.CERTIFIED, assetId });
  }

  getBatchStatus(store: KeyValueReader, batchId: string): BatchStatusReading {
    const idBytes = encodeBatchId(batchId);
    if (!idBytes) return BATCH_NOT_FOUND;
    return readState(store, batchKey(idBytes)) ?? BATCH_NOT_FOUND;
  }

  getBatchAsset(store: KeyValueReader, batchId: string): number {
    const idBytes = encodeBatchId(batchId);
    if (!idBytes) return NO_ASSET;
    const stored = store.get(assetKey(idBytes));
    return stored ? decodeUint64(stored) : NO_ASSET;
  }
}
