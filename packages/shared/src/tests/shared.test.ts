import assert from "node:assert/strict";
import test from "node:test";
import {
  BATCH_STATUS_LABELS,
  buildCallerHeaders,
  buildServiceAuthHeaders,
  canonicalJson,
  isAssignableRole,
  isAuditEventName,
  isBatchStatusCode,
  isServiceAuthAuthorized,
  parseCallerHeader,
  ROLE_LABELS,
  sha256Hex,
  toHex,
} from "../index.js";

test("parses the caller header from string or array values", () => {
  assert.equal(parseCallerHeader("  0xabc  "), "0xabc");
  assert.equal(parseCallerHeader(["0xdef", "0x123"]), "0xdef");
  assert.equal(parseCallerHeader("   "), null);
  assert.equal(parseCallerHeader(undefined), null);
  assert.equal(parseCallerHeader([42]), null);
  assert.deepEqual(buildCallerHeaders("0xabc"), { "x-caller-address": "0xabc" });
});

test("service auth is open without a token and exact with one", () => {
  assert.equal(isServiceAuthAuthorized(undefined, undefined), true);
  assert.equal(isServiceAuthAuthorized(undefined, "  "), true);
  assert.equal(isServiceAuthAuthorized("test-secret", " test-secret "), true);
  assert.equal(isServiceAuthAuthorized(["other", "test-secret"], "test-secret"), true);
  assert.equal(isServiceAuthAuthorized("wrong", "test-secret"), false);
  assert.deepEqual(buildServiceAuthHeaders(" test-secret "), { "x-service-token": "test-secret" });
  assert.deepEqual(buildServiceAuthHeaders(null), {});
});

test("labels every status and role code", () => {
  assert.deepEqual(BATCH_STATUS_LABELS, {
    0: "CREATED",
    1: "APPROVED",
    2: "CERTIFIED",
    99: "NOT_FOUND",
  });
  assert.deepEqual(ROLE_LABELS, { 0: "ADMIN", 1: "VENDOR", 2: "INSPECTOR", 99: "NONE" });
  assert.equal(isBatchStatusCode(2), true);
  assert.equal(isBatchStatusCode(99), false);
  assert.equal(isAssignableRole(1), true);
  assert.equal(isAssignableRole(0), false);
  assert.equal(isAssignableRole("2"), false);
  assert.equal(isAuditEventName("certify_batch"), true);
  assert.equal(isAuditEventName("delete_batch"), false);
});

test("canonical JSON and hashes are stable across key order", () => {
  assert.equal(canonicalJson({ b: 1, a: "x" }), '{"a":"x","b":1}');
  assert.equal(sha256Hex(canonicalJson({ b: 1, a: "x" })), sha256Hex(canonicalJson({ a: "x", b: 1 })));
  assert.equal(
    sha256Hex(""),
    "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
  );
  assert.equal(toHex(new Uint8Array([0x42, 0x2d, 0x00])), "422d00");
});
