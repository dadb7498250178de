import type { ComplianceErrorCode } from "@cledger/shared";

export interface ComplianceFailure {
  code: ComplianceErrorCode;
  message: string;
}

export interface Success<T> {
  ok: true;
  value: T;
}

export interface Failure {
  ok: false;
  error: ComplianceFailure;
}

export type Result<T> = Success<T> | Failure;

export function ok<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function fail(code: ComplianceErrorCode, message: string): Failure {
  return { ok: false, error: { code, message } };
}
