import type { AuditChainVerification, AuditEvent } from "./audit.js";
import type {
  BatchStatusCode,
  BatchStatusLabel,
  BatchStatusReading,
} from "./batch.js";
import type { AssignableRole, RoleCode, RoleLabel } from "./roles.js";

export interface AssignRoleRequest {
  account: string;
  role: number;
}

export interface AssignRoleResponse {
  account: string;
  role: AssignableRole;
  roleLabel: RoleLabel;
  events: AuditEvent[];
}

export interface GetRoleResponse {
  account: string;
  role: RoleCode;
  roleLabel: RoleLabel;
}

export interface BatchRequest {
  batchId: string;
}

export interface BatchTransitionResponse {
  batchId: string;
  status: BatchStatusCode;
  statusLabel: BatchStatusLabel;
  events: AuditEvent[];
}

export interface CertifyBatchResponse extends BatchTransitionResponse {
  assetId: number;
}

export interface GetBatchResponse {
  batchId: string;
  status: BatchStatusReading;
  statusLabel: BatchStatusLabel;
  assetId: number;
}

export interface GetBatchStatusResponse {
  batchId: string;
  status: BatchStatusReading;
}

export interface GetBatchAssetResponse {
  batchId: string;
  assetId: number;
}

export interface GetVendorBatchesResponse {
  vendor: string;
  batches: string[];
  joined: string;
}

export interface ListAuditEventsResponse {
  events: AuditEvent[];
}

export type VerifyAuditChainResponse = AuditChainVerification;

export type ComplianceErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_ARGUMENT"
  | "ALREADY_EXISTS"
  | "NOT_FOUND"
  | "INVALID_TRANSITION"
  | "MINTING_FAILURE";

export interface ErrorResponse {
  error: string;
  message?: string;
}
