import {
  Contract,
  JsonRpcProvider,
  Wallet,
  type ContractTransactionReceipt,
} from "ethers";
import {
  type CertificateMintRequest,
  type CertificateMinter,
  MintingError,
  toTokenId,
} from "./minter.js";

const CERTIFICATE_REGISTRY_ABI = [
  "function mintCertificate(string assetName, string unitName, uint64 total, uint8 decimals, bool defaultFrozen, address manager, address reserve) returns (uint64)",
  "event CertificateMinted(uint64 indexed assetId, string assetName)",
] as const;

const MINTED_EVENT = "CertificateMinted";

export interface ChainMinterStatus {
  configured: boolean;
  rpcUrl?: string;
  registryAddress?: string;
  latestBlock?: number;
  signerAddress?: string;
  error?: string;
}

/** Mints certificates on a registry contract and reads the new id from the receipt. */
export class ChainCertificateMinter implements CertificateMinter {
  private readonly rpcUrl: string;
  private readonly registryAddress: string;
  private readonly provider: JsonRpcProvider;
  private readonly wallet: Wallet;
  private readonly contract: Contract;

  constructor(rpcUrl: string, privateKey: string, registryAddress: string) {
    this.rpcUrl = rpcUrl;
    this.registryAddress = registryAddress;
    this.provider = new JsonRpcProvider(rpcUrl);
    this.wallet = new Wallet(privateKey, this.provider);
    this.contract = new Contract(registryAddress, CERTIFICATE_REGISTRY_ABI, this.wallet);
  }

  async mint(request: CertificateMintRequest): Promise<number> {
    const tx: { hash: string; wait: () => Promise<ContractTransactionReceipt | null> } =
      await this.contract.mintCertificate(
        request.assetName,
        request.unitName,
        request.total,
        request.decimals,
        request.defaultFrozen,
        request.manager,
        request.reserve,
      );

    const receipt = await tx.wait();
    if (!receipt) {
      throw new MintingError(`Mint transaction ${tx.hash} has no receipt`);
    }

    for (const log of receipt.logs) {
      const parsed = this.contract.interface.parseLog(log);
      if (parsed?.name === MINTED_EVENT) {
        return toTokenId(parsed.args[0]);
      }
    }
    throw new MintingError(`Mint transaction ${receipt.hash} emitted no ${MINTED_EVENT} event`);
  }

  async status(): Promise<ChainMinterStatus> {
    try {
      const blockNumber = await this.provider.getBlockNumber();
      return {
        configured: true,
        rpcUrl: this.rpcUrl,
        registryAddress: this.registryAddress,
        signerAddress: await this.wallet.getAddress(),
        latestBlock: blockNumber,
      };
    } catch (error) {
      return {
        configured: true,
        rpcUrl: this.rpcUrl,
        registryAddress: this.registryAddress,
        signerAddress: await this.wallet.getAddress(),
        error: error instanceof Error ? error.message : "unknown_error",
      };
    }
  }
}

export function buildChainMinterFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): ChainCertificateMinter | null {
  const registryAddress = env.CERT_REGISTRY_ADDRESS;
  if (!registryAddress) return null;

  const rpcUrl = env.CHAIN_RPC_URL;
  const privateKey = env.CHAIN_PRIVATE_KEY;
  if (!rpcUrl || !privateKey) {
    throw new Error(
      "CHAIN_RPC_URL and CHAIN_PRIVATE_KEY are required when CERT_REGISTRY_ADDRESS is set",
    );
  }
  return new ChainCertificateMinter(rpcUrl, privateKey, registryAddress);
}
