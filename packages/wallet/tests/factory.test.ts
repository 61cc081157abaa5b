import { describe, it, expect } from "vitest";
import { decodeFunctionResult, encodeFunctionData, getContractAddress } from "viem";
import type { Hex } from "@quorumsafe/types";
import { FACTORY_ABI } from "../src/abi.js";
import { DEFAULT_FACTORY_ADDRESS, FactoryError, WalletFactory } from "../src/factory.js";
import { LocalNetwork } from "../src/network/local-network.js";
import { NetworkError } from "../src/network/types.js";
import { OUTSIDER, T0, testAccount } from "./fixtures.js";

const SALT: Hex = `0x${"11".repeat(32)}`;
const SIGNERS = [testAccount(1).address, testAccount(2).address];

function createFactory() {
  const network = new LocalNetwork({ timestamp: T0 });
  const factory = new WalletFactory(network);
  return { network, factory };
}

describe("WalletFactory", () => {
  it("deploys itself at the default address", () => {
    const { network, factory } = createFactory();
    expect(factory.address.toLowerCase()).toBe(DEFAULT_FACTORY_ADDRESS);
    expect(network.contractAt(factory.address)).toBe(factory);
  });

  it("refuses a second factory at the same address", () => {
    const { network } = createFactory();
    expect(() => new WalletFactory(network)).toThrow(NetworkError);
  });

  describe("deploy", () => {
    it("derives CREATE addresses from the deployment counter", () => {
      const { factory } = createFactory();

      const first = factory.deploy(SIGNERS);
      const second = factory.deploy(SIGNERS);

      expect(first.address).toBe(getContractAddress({ from: factory.address, nonce: 0n }));
      expect(second.address).toBe(getContractAddress({ from: factory.address, nonce: 1n }));
      expect(first.getSigners()).toEqual(SIGNERS);
    });

    it("puts wallets on the factory's network", () => {
      const { network, factory } = createFactory();
      const wallet = factory.deploy(SIGNERS);
      expect(network.contractAt(wallet.address)).toBe(wallet);
      expect(wallet.getDomainInfo().chainId).toBe(network.chainId);
    });

    it("applies the factory's wallet defaults", () => {
      const network = new LocalNetwork({ timestamp: T0 });
      const factory = new WalletFactory(network, { defaults: { maxSigners: 5 } });
      expect(factory.deploy(SIGNERS).maxSigners).toBe(5);
    });

    it("leaves no trace when the signer list is invalid", () => {
      const { factory } = createFactory();
      expect(() => factory.deploy([])).toThrow("At least one signer is required");
      expect(factory.walletCount).toBe(0);
      expect(factory.deploy(SIGNERS).address).toBe(
        getContractAddress({ from: factory.address, nonce: 0n }),
      );
    });
  });

  describe("deterministic deploy", () => {
    it("lands at the predicted address", () => {
      const { factory } = createFactory();
      const predicted = factory.predictAddress(SIGNERS, SALT);
      expect(factory.deploy(SIGNERS, { salt: SALT }).address).toBe(predicted);
    });

    it("depends on the signer list", () => {
      const { factory } = createFactory();
      expect(factory.predictAddress(SIGNERS, SALT)).not.toBe(
        factory.predictAddress([testAccount(3).address], SALT),
      );
    });

    it("refuses to deploy twice to the same address", () => {
      const { factory } = createFactory();
      factory.deploy(SIGNERS, { salt: SALT });

      let caught: unknown;
      try {
        factory.deploy(SIGNERS, { salt: SALT });
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(FactoryError);
      expect(caught).toMatchObject({ code: "ADDRESS_IN_USE" });
      expect(factory.walletCount).toBe(1);
    });

    it("requires a 32-byte salt", () => {
      const { factory } = createFactory();
      expect(() => factory.predictAddress(SIGNERS, "0x1234")).toThrow(
        "Salt must be 32 bytes, got 2",
      );
    });
  });

  describe("registry", () => {
    it("pages through wallets in deployment order", () => {
      const { factory } = createFactory();
      const wallets = [0, 1, 2].map(() => factory.deploy(SIGNERS).address);

      expect(factory.walletCount).toBe(3);
      expect(factory.getWallets(0, 2)).toEqual(wallets.slice(0, 2));
      expect(factory.getWallets(2, 10)).toEqual(wallets.slice(2));
      expect(factory.getWallets(5, 10)).toEqual([]);
    });

    it("rejects invalid pages", () => {
      const { factory } = createFactory();
      expect(() => factory.getWallets(-1, 10)).toThrow("Invalid offset: -1");
      expect(() => factory.getWallets(0, 0)).toThrow("Invalid limit: 0");
    });

    it("looks wallets up by address in any case", () => {
      const { factory } = createFactory();
      const wallet = factory.deploy(SIGNERS);

      expect(factory.getWallet(wallet.address.toLowerCase())).toBe(wallet);
      expect(factory.isWallet(wallet.address)).toBe(true);
      expect(factory.isWallet(OUTSIDER)).toBe(false);
    });
  });

  describe("ABI entry point", () => {
    it("deploys through a network call and returns the address", () => {
      const { network, factory } = createFactory();

      const output = network.call({
        from: OUTSIDER,
        to: factory.address,
        value: 0n,
        data: encodeFunctionData({
          abi: FACTORY_ABI,
          functionName: "deployDeterministic",
          args: [SIGNERS, SALT],
        }),
      });

      const address = decodeFunctionResult({
        abi: FACTORY_ABI,
        functionName: "deployDeterministic",
        data: output,
      });
      expect(address).toBe(factory.predictAddress(SIGNERS, SALT));
      expect(factory.isWallet(address)).toBe(true);
    });

    it("forgets wallets deployed in a rolled-back section", () => {
      const { network, factory } = createFactory();

      expect(() =>
        network.atomically(() => {
          factory.deploy(SIGNERS);
          throw new Error("abort");
        }),
      ).toThrow("abort");

      expect(factory.walletCount).toBe(0);
      expect(network.hasCode(getContractAddress({ from: factory.address, nonce: 0n }))).toBe(
        false,
      );
    });

    it("rejects unknown selectors", () => {
      const { network, factory } = createFactory();
      expect(() =>
        network.call({ from: OUTSIDER, to: factory.address, value: 0n, data: "0xabcdef01" }),
      ).toThrow(expect.objectContaining({ code: "UNSUPPORTED_CALL" }));
    });
  });
});
