import { canonicalJson } from "@cledger/shared";
import { decodeUint64, encodeUint64, encodeUtf8 } from "../storage/codec.js";
import { NEXT_TOKEN_ID_KEY, tokenKey } from "../storage/keys.js";
import type { StagedStore } from "../storage/staged-store.js";
import { type CertificateMintRequest, type CertificateMinter, MintingError } from "./minter.js";

export const FIRST_LOCAL_TOKEN_ID = 1001;

export interface LocalTokenRecord extends CertificateMintRequest {
  tokenId: number;
}

/** Allocates token ids from a counter kept in the ledger store itself. */
export class LocalCertificateMinter implements CertificateMinter {
  async mint(request: CertificateMintRequest, store: StagedStore): Promise<number> {
    const stored = store.get(NEXT_TOKEN_ID_KEY);
    const tokenId = stored ? decodeUint64(stored) : FIRST_LOCAL_TOKEN_ID;
    if (store.has(tokenKey(tokenId))) {
      throw new MintingError(`Token id ${tokenId} is already taken`);
    }

    const record: LocalTokenRecord = { ...request, tokenId };
    store.put(tokenKey(tokenId), encodeUtf8(canonicalJson(record)));
    store.put(NEXT_TOKEN_ID_KEY, encodeUint64(tokenId + 1));
    return tokenId;
  }
}
