import { getAddress, getBytes, id, isAddress } from "ethers";

export interface Account {
  address: string;      // EIP-55 checksummed
  bytes: Uint8Array;    // 20 raw bytes, used for storage keys and audit hex
}

export function parseAccount(value: unknown): Account | null {
  if (typeof value !== "string" || !isAddress(value)) return null;
  const address = getAddress(value);
  return { address, bytes: getBytes(address) };
}

export function requireAccount(value: string, label: string): Account {
  const account = parseAccount(value);
  if (!account) {
    throw new Error(`${label} must be a 20-byte hex address, got '${value}'`);
  }
  return account;
}

/** Address the engine mints under when no explicit one is configured. */
export function deriveEngineAccount(admin: Account): Account {
  const hashed = id(`compliance-engine:${admin.address}`);
  return requireAccount(`0x${hashed.slice(-40)}`, "Derived engine address");
}

export function sameAccount(left: Account, right: Account): boolean {
  return left.address === right.address;
}
