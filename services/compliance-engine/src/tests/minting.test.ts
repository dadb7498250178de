import assert from "node:assert/strict";
import test from "node:test";
import { decodeUint64, decodeUtf8 } from "../storage/codec.js";
import { NEXT_TOKEN_ID_KEY, tokenKey } from "../storage/keys.js";
import { MemoryLedgerStore } from "../storage/memory-store.js";
import { StagedStore } from "../storage/staged-store.js";
import { buildChainMinterFromEnv } from "../minting/chain-minter.js";
import { FIRST_LOCAL_TOKEN_ID, LocalCertificateMinter } from "../minting/local-minter.js";
import { buildMintRequest, MintingError, toTokenId } from "../minting/minter.js";

const ENGINE_ADDRESS = "0x9000000000000000000000000000000000000009";

test("builds a single-unit certificate request named after the batch", () => {
  assert.deepEqual(buildMintRequest("B-100", ENGINE_ADDRESS), {
    batchId: "B-100",
    assetName: "CERT-B-100",
    unitName: "CERT",
    total: 1,
    decimals: 0,
    defaultFrozen: false,
    manager: ENGINE_ADDRESS,
    reserve: ENGINE_ADDRESS,
    freeze: "0x0000000000000000000000000000000000000000",
    clawback: "0x0000000000000000000000000000000000000000",
  });
});

test("local minter allocates increasing ids and records each token", async () => {
  const store = new StagedStore(new MemoryLedgerStore());
  const minter = new LocalCertificateMinter();

  const first = await minter.mint(buildMintRequest("B-1", ENGINE_ADDRESS), store);
  const second = await minter.mint(buildMintRequest("B-2", ENGINE_ADDRESS), store);
  assert.equal(first, FIRST_LOCAL_TOKEN_ID);
  assert.equal(second, FIRST_LOCAL_TOKEN_ID + 1);

  const counter = store.get(NEXT_TOKEN_ID_KEY);
  assert.ok(counter);
  assert.equal(decodeUint64(counter), 1003);

  const record = store.get(tokenKey(second));
  assert.ok(record);
  const parsed = JSON.parse(decodeUtf8(record)) as { tokenId: number; assetName: string; total: number };
  assert.equal(parsed.tokenId, 1002);
  assert.equal(parsed.assetName, "CERT-B-2");
  assert.equal(parsed.total, 1);
});

test("local minter refuses to reuse a taken token id", async () => {
  const store = new StagedStore(new MemoryLedgerStore());
  store.put(tokenKey(FIRST_LOCAL_TOKEN_ID), new Uint8Array([1]));
  await assert.rejects(
    new LocalCertificateMinter().mint(buildMintRequest("B-1", ENGINE_ADDRESS), store),
    MintingError,
  );
});

test("accepts only positive safe token ids", () => {
  assert.equal(toTokenId(42), 42);
  assert.equal(toTokenId(7n), 7);
  assert.throws(() => toTokenId(0), MintingError);
  assert.throws(() => toTokenId(-3n), MintingError);
  assert.throws(() => toTokenId(2n ** 64n), MintingError);
  assert.throws(() => toTokenId(1.5), MintingError);
  assert.throws(() => toTokenId("1001"), MintingError);
});

test("chain minter stays off without a registry address", () => {
  assert.equal(buildChainMinterFromEnv({}), null);
  assert.equal(buildChainMinterFromEnv({ CHAIN_RPC_URL: "http://127.0.0.1:8545" }), null);
});

test("chain minter requires an rpc url and a signing key once a registry is set", () => {
  const registry = { CERT_REGISTRY_ADDRESS: "0x7000000000000000000000000000000000000007" };
  const expected = /CHAIN_RPC_URL and CHAIN_PRIVATE_KEY are required when CERT_REGISTRY_ADDRESS is set/;

  assert.throws(() => buildChainMinterFromEnv(registry), expected);
  assert.throws(
    () => buildChainMinterFromEnv({ ...registry, CHAIN_RPC_URL: "http://127.0.0.1:8545" }),
    expected,
  );
  assert.throws(
    () => buildChainMinterFromEnv({ ...registry, CHAIN_PRIVATE_KEY: "test-secret" }),
    expected,
  );
});
