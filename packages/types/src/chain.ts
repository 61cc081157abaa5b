/**
 * Chain Primitives
 *
 * Hex-encoded identifiers shared by every package.
 * Values are plain template-literal strings so they interoperate with viem
 * without a runtime dependency here.
 */

/** 0x-prefixed hex data */
export type Hex = `0x${string}`;

/** 20-byte account or contract address, EIP-55 checksummed once normalized */
export type Address = `0x${string}`;

/** EIP-155 numeric chain identifier */
export type ChainId = number;

/**
 * The four fields bound into every signed vote digest.
 */
export interface DomainInfo {
  /** Protocol name */
  readonly name: string;

  /** Protocol version */
  readonly version: string;

  /** Network the wallet lives on */
  readonly chainId: ChainId;

  /** The wallet instance's own address */
  readonly verifyingContract: Address;
}
