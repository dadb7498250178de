import {
  CERTIFICATE_NAME_PREFIX,
  CERTIFICATE_UNIT_NAME,
} from "@cledger/shared";
import { ZeroAddress } from "ethers";
import type { StagedStore } from "../storage/staged-store.js";

/**
 * Parameters of the single-unit certificate asset minted for a batch. The
 * engine manages and holds the asset; nobody can freeze or claw it back.
 */
export interface CertificateMintRequest {
  batchId: string;
  assetName: string;
  unitName: typeof CERTIFICATE_UNIT_NAME;
  total: 1;
  decimals: 0;
  defaultFrozen: false;
  manager: string;
  reserve: string;
  freeze: string;
  clawback: string;
}

export interface CertificateMinter {
  /**
   * Creates the asset and returns its new token id. Writes go through `store`
   * so they commit or roll back with the rest of the call.
   */
  mint(request: CertificateMintRequest, store: StagedStore): Promise<number>;
}

export class MintingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MintingError";
  }
}

export function buildMintRequest(batchId: string, engineAddress: string): CertificateMintRequest {
  return {
    batchId,
    assetName: `${CERTIFICATE_NAME_PREFIX}${batchId}`,
    unitName: CERTIFICATE_UNIT_NAME,
    total: 1,
    decimals: 0,
    defaultFrozen: false,
    manager: engineAddress,
    reserve: engineAddress,
    freeze: ZeroAddress,
    clawback: ZeroAddress,
  };
}

export function toTokenId(value: unknown): number {
  const asNumber =
    typeof value === "bigint" && value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(value)
      : value;
  if (typeof asNumber !== "number" || !Number.isSafeInteger(asNumber) || asNumber <= 0) {
    throw new MintingError(`Minter returned an invalid token id: ${String(value)}`);
  }
  return asNumber;
}
