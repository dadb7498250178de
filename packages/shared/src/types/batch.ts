export type BatchStatusCode = 0 | 1 | 2;

/** Reported for a batch identifier that has never been created. */
export const BATCH_NOT_FOUND = 99;

export type BatchStatusReading = BatchStatusCode | typeof BATCH_NOT_FOUND;

export const BATCH_STATUS = {
  CREATED: 0,
  APPROVED: 1,
  CERTIFIED: 2,
} as const satisfies Record<string, BatchStatusCode>;

export type BatchStatusLabel = "CREATED" | "APPROVED" | "CERTIFIED" | "NOT_FOUND";

export const BATCH_STATUS_LABELS: Record<BatchStatusReading, BatchStatusLabel> = {
  0: "CREATED",
  1: "APPROVED",
  2: "CERTIFIED",
  99: "NOT_FOUND",
};

/** Asset id reported for a batch that has not been certified. */
export const NO_ASSET = 0;

export const BATCH_LIST_DELIMITER = "|";

// 64-byte key ceiling minus the 6-byte "batch:" / "asset:" prefix.
export const MAX_BATCH_ID_BYTES = 58;

export const CERTIFICATE_NAME_PREFIX = "CERT-";
export const CERTIFICATE_UNIT_NAME = "CERT";

export function isBatchStatusCode(value: number): value is BatchStatusCode {
  return value === 0 || value === 1 || value === 2;
}
