/**
 * Shared fixtures for wallet tests.
 *
 * Keys are sequential placeholders (0x…01, 0x…02, …), never real ones.
 */

import { encodeFunctionData, numberToHex } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import type { PrivateKeyAccount } from "viem/accounts";
import type { Address, Hex, Operation } from "@quorumsafe/types";
import { WALLET_ABI } from "../src/abi.js";
import { ERC1271_MAGIC_VALUE } from "../src/signature-authorizer.js";
import { LocalNetwork } from "../src/network/local-network.js";
import type { CallContext, Contract } from "../src/network/types.js";
import { MultisigWallet } from "../src/wallet.js";
import type { WalletSettings } from "../src/wallet.js";

export const T0 = 1_700_000_000;
export const HOUR = 3600;
export const WALLET_ADDRESS: Address = "0x000000000000000000000000000000000000a11e";
export const OUTSIDER: Address = "0x0000000000000000000000000000000000000099";

export function testAccount(n: number): PrivateKeyAccount {
  return privateKeyToAccount(numberToHex(n, { size: 32 }));
}

export interface WalletFixture {
  readonly network: LocalNetwork;
  readonly wallet: MultisigWallet;
  readonly accounts: readonly PrivateKeyAccount[];
  readonly signers: readonly Address[];
}

/**
 * A wallet at {@link WALLET_ADDRESS} whose genesis signers are test
 * accounts 1..count, on a network whose clock reads {@link T0}.
 */
export function createWallet(count = 3, settings: WalletSettings = {}): WalletFixture {
  const network = new LocalNetwork({ timestamp: T0 });
  const accounts = Array.from({ length: count }, (_, i) => testAccount(i + 1));
  const signers = accounts.map((a) => a.address);
  const wallet = new MultisigWallet({
    ...settings,
    address: WALLET_ADDRESS,
    network,
    signers,
  });
  return { network, wallet, accounts, signers };
}

export function transferOp(target: Address, value: bigint): Operation {
  return { target, value, data: "0x" };
}

export function addSignerOp(wallet: Address, signer: Address): Operation {
  return {
    target: wallet,
    value: 0n,
    data: encodeFunctionData({ abi: WALLET_ABI, functionName: "addSigner", args: [signer] }),
  };
}

export function removeSignerOp(wallet: Address, signer: Address): Operation {
  return {
    target: wallet,
    value: 0n,
    data: encodeFunctionData({ abi: WALLET_ABI, functionName: "removeSigner", args: [signer] }),
  };
}

export function cancelProposalOp(wallet: Address, proposalId: number): Operation {
  return {
    target: wallet,
    value: 0n,
    data: encodeFunctionData({
      abi: WALLET_ABI,
      functionName: "cancelProposal",
      args: [BigInt(proposalId)],
    }),
  };
}

export function executeOp(wallet: Address, proposalId: number): Operation {
  return {
    target: wallet,
    value: 0n,
    data: encodeFunctionData({
      abi: WALLET_ABI,
      functionName: "execute",
      args: [BigInt(proposalId)],
    }),
  };
}

// =============================================================================
// Test contracts
// =============================================================================

/** Counts the calls it receives. State is checkpointed. */
export class CounterContract implements Contract {
  calls = 0;
  lastSender: Address | null = null;

  call(ctx: CallContext): Hex {
    this.calls += 1;
    this.lastSender = ctx.from;
    return numberToHex(this.calls, { size: 32 });
  }

  checkpoint(): () => void {
    const calls = this.calls;
    const lastSender = this.lastSender;
    return () => {
      this.calls = calls;
      this.lastSender = lastSender;
    };
  }
}

/** Rejects every call. */
export class RevertingContract implements Contract {
  constructor(private readonly reason = "reverted by target") {}

  call(): Hex {
    throw new Error(this.reason);
  }

  checkpoint(): () => void {
    return () => {};
  }
}

export type ValidatorMode = "accept" | "reject" | "throw" | "garbage";

/**
 * A contract signer: accepts exactly `accepted` as a signature over any
 * hash. Touches its own state while validating so tests can check the
 * view-call rollback.
 */
export class ContractSigner implements Contract {
  mode: ValidatorMode = "accept";
  validations = 0;

  constructor(private readonly accepted: Hex) {}

  call(): Hex {
    return "0x";
  }

  isValidSignature(_hash: Hex, signature: Hex): Hex {
    this.validations += 1;
    switch (this.mode) {
      case "throw":
        throw new Error("validator exploded");
      case "garbage":
        return "0xdeadbeef";
      case "reject":
        return "0xffffffff";
      case "accept":
        return signature === this.accepted ? ERC1271_MAGIC_VALUE : "0xffffffff";
    }
  }

  checkpoint(): () => void {
    const validations = this.validations;
    return () => {
      this.validations = validations;
    };
  }
}

/** Calls `execute(proposalId)` on a wallet when called. */
export class ReentrantContract implements Contract {
  constructor(
    private readonly wallet: Address,
    private readonly proposalId: number,
  ) {}

  call(ctx: CallContext): Hex {
    return ctx.network.call({
      from: ctx.to,
      to: this.wallet,
      value: 0n,
      data: encodeFunctionData({
        abi: WALLET_ABI,
        functionName: "execute",
        args: [BigInt(this.proposalId)],
      }),
    });
  }

  checkpoint(): () => void {
    return () => {};
  }
}
