import type { StagedStore } from "../storage/staged-store.js";
import type { StagedAuditLog } from "./audit.js";

/** Everything a state-changing operation may touch during one call. */
export interface CallContext {
  readonly store: StagedStore;
  readonly audit: StagedAuditLog;
}
