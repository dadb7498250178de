import { concatBytes } from "@noble/hashes/utils";
import { encodeUint64, encodeUtf8 } from "./codec.js";

const ROLE_PREFIX = encodeUtf8("role:");
const BATCH_PREFIX = encodeUtf8("batch:");
const ASSET_PREFIX = encodeUtf8("asset:");
const VENDOR_PREFIX = encodeUtf8("vendor:");
const TOKEN_PREFIX = encodeUtf8("token:");

export const NEXT_TOKEN_ID_KEY = encodeUtf8("meta:next-token-id");

export function roleKey(account: Uint8Array): Uint8Array {
  return concatBytes(ROLE_PREFIX, account);
}

export function batchKey(batchId: Uint8Array): Uint8Array {
  return concatBytes(BATCH_PREFIX, batchId);
}

export function assetKey(batchId: Uint8Array): Uint8Array {
  return concatBytes(ASSET_PREFIX, batchId);
}

export function vendorKey(vendor: Uint8Array): Uint8Array {
  return concatBytes(VENDOR_PREFIX, vendor);
}

export function tokenKey(tokenId: number): Uint8Array {
  return concatBytes(TOKEN_PREFIX, encodeUint64(tokenId));
}
