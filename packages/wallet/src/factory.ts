/**
 * Wallet Factory — instancing service for wallets.
 *
 * Deploys independent wallet instances onto a {@link LocalNetwork} and
 * keeps an enumerable registry of them.
 *
 * Addresses:
 * - With a salt: CREATE2-style, keccak256(0xff ++ factory ++ salt ++
 *   keccak256(abi.encode(signers))), so the address is known in advance
 * - Without: CREATE-style from the factory's deployment counter
 *
 * The factory is itself a contract, so an executed proposal can deploy
 * wallets too.
 */

import {
  decodeFunctionData,
  encodeAbiParameters,
  encodeFunctionResult,
  getContractAddress,
  getCreate2Address,
  keccak256,
  size,
} from "viem";
import type { Address, Hex } from "@quorumsafe/types";
import { FACTORY_ABI } from "./abi.js";
import { normalizeAddress } from "./address.js";
import { MultisigWallet } from "./wallet.js";
import type { WalletSettings } from "./wallet.js";
import type { LocalNetwork } from "./network/local-network.js";
import type { CallContext, Contract } from "./network/types.js";

// =============================================================================
// Error
// =============================================================================

export class FactoryError extends Error {
  public readonly code: FactoryErrorCode;
  constructor(code: FactoryErrorCode, message: string) {
    super(message);
    this.name = "FactoryError";
    this.code = code;
  }
}

export type FactoryErrorCode =
  | "ADDRESS_IN_USE"
  | "INVALID_SALT"
  | "INVALID_PAGE"
  | "UNSUPPORTED_CALL";

// =============================================================================
// Factory
// =============================================================================

export const DEFAULT_FACTORY_ADDRESS: Address = "0x000000000000000000000000000000000000fac7";

export interface WalletFactoryConfig {
  /** Where the factory itself lives. Default: {@link DEFAULT_FACTORY_ADDRESS} */
  readonly address?: Address;

  /** Settings applied to every wallet this factory deploys */
  readonly defaults?: WalletSettings;
}

export interface DeployOptions {
  /** 32-byte salt for a deterministic address */
  readonly salt?: Hex;
}

export class WalletFactory implements Contract {
  readonly address: Address;
  private readonly defaults: WalletSettings;
  private wallets: MultisigWallet[] = [];
  private deployments = 0n;

  constructor(
    private readonly network: LocalNetwork,
    config: WalletFactoryConfig = {},
  ) {
    this.address = normalizeAddress(config.address ?? DEFAULT_FACTORY_ADDRESS, "Factory address");
    this.defaults = config.defaults ?? {};
    network.deploy(this.address, this);
  }

  /**
   * Deploy a wallet with `signers` as its genesis signer set.
   *
   * @throws ValidationError if the signer list is invalid
   * @throws FactoryError ADDRESS_IN_USE if the target address is taken
   */
  deploy(signers: readonly string[], options: DeployOptions = {}): MultisigWallet {
    const normalized = signers.map((s) => normalizeAddress(s, "Signer"));
    const address =
      options.salt !== undefined
        ? this.predictAddress(normalized, options.salt)
        : getContractAddress({ from: this.address, nonce: this.deployments });

    if (this.network.hasCode(address)) {
      throw new FactoryError("ADDRESS_IN_USE", `A contract already exists at ${address}`);
    }

    const wallet = new MultisigWallet({
      ...this.defaults,
      address,
      network: this.network,
      signers: normalized,
    });
    this.wallets.push(wallet);
    this.deployments += 1n;

    return wallet;
  }

  /**
   * Address `deploy(signers, { salt })` would use.
   */
  predictAddress(signers: readonly string[], salt: Hex): Address {
    if (size(salt) !== 32) {
      throw new FactoryError("INVALID_SALT", `Salt must be 32 bytes, got ${size(salt)}`);
    }
    const normalized = signers.map((s) => normalizeAddress(s, "Signer"));
    return getCreate2Address({
      from: this.address,
      salt,
      bytecodeHash: keccak256(encodeAbiParameters([{ type: "address[]" }], [normalized])),
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Registry
  // ───────────────────────────────────────────────────────────────────────

  isWallet(address: string): boolean {
    return this.getWallet(address) !== undefined;
  }

  getWallet(address: string): MultisigWallet | undefined {
    const key = normalizeAddress(address, "Wallet address");
    return this.wallets.find((w) => w.address === key);
  }

  get walletCount(): number {
    return this.wallets.length;
  }

  /**
   * Page through deployed wallets in deployment order.
   */
  getWallets(offset: number, limit: number): readonly Address[] {
    if (!Number.isSafeInteger(offset) || offset < 0) {
      throw new FactoryError("INVALID_PAGE", `Invalid offset: ${offset}`);
    }
    if (!Number.isSafeInteger(limit) || limit < 1) {
      throw new FactoryError("INVALID_PAGE", `Invalid limit: ${limit}`);
    }
    return this.wallets.slice(offset, offset + limit).map((w) => w.address);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Contract
  // ───────────────────────────────────────────────────────────────────────

  call(ctx: CallContext): Hex {
    const decoded = decodeFactoryCall(ctx.data);

    if (decoded.functionName === "deployDeterministic") {
      const [signers, salt] = decoded.args;
      return encodeFunctionResult({
        abi: FACTORY_ABI,
        functionName: "deployDeterministic",
        result: this.deploy(signers, { salt }).address,
      });
    }

    return encodeFunctionResult({
      abi: FACTORY_ABI,
      functionName: "deploy",
      result: this.deploy(decoded.args[0]).address,
    });
  }

  checkpoint(): () => void {
    const wallets = [...this.wallets];
    const deployments = this.deployments;
    return () => {
      this.wallets = wallets;
      this.deployments = deployments;
    };
  }
}

function decodeFactoryCall(data: Hex) {
  try {
    return decodeFunctionData({ abi: FACTORY_ABI, data });
  } catch (err) {
    const reason = err instanceof Error ? err.message.split("\n")[0] : String(err);
    throw new FactoryError("UNSUPPORTED_CALL", `Unrecognized factory call: ${reason}`);
  }
}
