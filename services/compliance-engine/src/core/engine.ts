import {
  type AuditChainVerification,
  type AuditEvent,
  type AuditEventFilter,
  type AssignableRole,
  BATCH_STATUS_LABELS,
  type BatchStatusCode,
  type BatchStatusLabel,
  type BatchStatusReading,
  type RoleCode,
} from "@cledger/shared";
import type { CertificateMinter } from "../minting/minter.js";
import type { LedgerStore } from "../storage/ledger-store.js";
import { StagedStore } from "../storage/staged-store.js";
import type { Account } from "./account.js";
import { StagedAuditLog, verifyAuditChain } from "./audit.js";
import { BatchLifecycle, type CertifiedBatch } from "./batches.js";
import type { CallContext } from "./context.js";
import { ok, type Result } from "./result.js";
import { RoleRegistry } from "./roles.js";
import { VendorRegistry } from "./vendors.js";

export interface ComplianceEngineOptions {
  store: LedgerStore;
  administrator: Account;
  engineAccount: Account;
  minter: CertificateMinter;
  clock?: () => Date;
}

/** Result of a committed call together with the audit events it appended. */
export interface CallReceipt<T> {
  value: T;
  events: AuditEvent[];
}

export interface BatchView {
  status: BatchStatusReading;
  statusLabel: BatchStatusLabel;
  assetId: number;
}

type Operation<T> = (call: CallContext) => Result<T> | Promise<Result<T>>;

/**
 * Entry points of the compliance ledger. State-changing calls run one at a
 * time; each stages its writes and audit events and commits them in a single
 * store transaction, or discards all of them on failure.
 */
export class ComplianceEngine {
  private readonly store: LedgerStore;
  private readonly clock: () => Date;
  private readonly roles: RoleRegistry;
  private readonly vendors: VendorRegistry;
  private readonly batches: BatchLifecycle;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: ComplianceEngineOptions) {
    this.store = options.store;
    this.clock = options.clock ?? (() => new Date());
    this.roles = new RoleRegistry(options.administrator);
    this.vendors = new VendorRegistry();
    this.batches = new BatchLifecycle(
      this.roles,
      this.vendors,
      options.minter,
      options.engineAccount,
    );
  }

  assignRole(
    caller: Account,
    account: Account,
    role: number,
  ): Promise<Result<CallReceipt<AssignableRole>>> {
    return this.execute((call) => this.roles.assignRole(call, caller, account, role));
  }

  createBatch(caller: Account, batchId: string): Promise<Result<CallReceipt<BatchStatusCode>>> {
    return this.execute((call) => this.batches.createBatch(call, caller, batchId));
  }

  approveBatch(caller: Account, batchId: string): Promise<Result<CallReceipt<BatchStatusCode>>> {
    return this.execute((call) => this.batches.approveBatch(call, caller, batchId));
  }

  certifyBatch(caller: Account, batchId: string): Promise<Result<CallReceipt<CertifiedBatch>>> {
    return this.execute((call) => this.batches.certifyBatch(call, caller, batchId));
  }

  getRole(account: Account): RoleCode {
    return this.roles.getRole(this.store, account);
  }

  getBatchStatus(batchId: string): BatchStatusReading {
    return this.batches.getBatchStatus(this.store, batchId);
  }

  getBatchAsset(batchId: string): number {
    return this.batches.getBatchAsset(this.store, batchId);
  }

  getBatch(batchId: string): BatchView {
    const status = this.getBatchStatus(batchId);
    return {
      status,
      statusLabel: BATCH_STATUS_LABELS[status],
      assetId: this.getBatchAsset(batchId),
    };
  }

  getVendorBatches(vendor: Account): string[] {
    return this.vendors.getVendorBatches(this.store, vendor);
  }

  listAuditEvents(filter?: AuditEventFilter): AuditEvent[] {
    return this.store.listEvents(filter);
  }

  verifyAuditChain(): AuditChainVerification {
    return verifyAuditChain(this.store.listEvents());
  }

  private execute<T>(operation: Operation<T>): Promise<Result<CallReceipt<T>>> {
    return this.serialize(async () => {
      const call: CallContext = {
        store: new StagedStore(this.store),
        audit: new StagedAuditLog(this.store.lastEvent(), this.clock),
      };
      const outcome = await operation(call);
      if (!outcome.ok) return outcome;

      const events = call.audit.events();
      this.store.commit({ writes: call.store.changes(), events });
      return ok({ value: outcome.value, events });
    });
  }

  private serialize<T>(work: () => Promise<T>): Promise<T> {
    const run = this.tail.then(work);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
