import { describe, it, expect } from "vitest";
import { AuthorizationError } from "../src/errors.js";
import { GovernanceGuard, GovernanceProof } from "../src/governance-guard.js";

describe("GovernanceGuard", () => {
  it("treats a proof as live only inside withAuthority", () => {
    const guard = new GovernanceGuard();
    let escaped: GovernanceProof | undefined;

    guard.withAuthority((proof) => {
      escaped = proof;
      expect(guard.isLive(proof)).toBe(true);
      expect(() => guard.assert(proof, "addSigner")).not.toThrow();
    });

    expect(guard.isLive(escaped)).toBe(false);
    expect(() => guard.assert(escaped, "addSigner")).toThrow(AuthorizationError);
  });

  it("revokes the proof when the section throws", () => {
    const guard = new GovernanceGuard();
    let escaped: GovernanceProof | undefined;

    expect(() =>
      guard.withAuthority((proof) => {
        escaped = proof;
        throw new Error("batch failed");
      }),
    ).toThrow("batch failed");

    expect(guard.isLive(escaped)).toBe(false);
  });

  it("rejects forged proofs", () => {
    const guard = new GovernanceGuard();

    guard.withAuthority(() => {
      expect(guard.isLive(new GovernanceProof(0))).toBe(false);
    });
  });

  it("rejects a proof minted by another guard", () => {
    const mine = new GovernanceGuard();
    const theirs = new GovernanceGuard();

    theirs.withAuthority((proof) => {
      expect(() => mine.assert(proof, "removeSigner")).toThrow(
        "removeSigner is only callable by an executed proposal",
      );
    });
  });

  it("rejects a missing proof with NOT_GOVERNANCE", () => {
    const guard = new GovernanceGuard();
    expect(() => guard.assert(undefined, "addSigner")).toThrow(
      expect.objectContaining({ code: "NOT_GOVERNANCE" }),
    );
  });

  it("returns the section's value", () => {
    const guard = new GovernanceGuard();
    expect(guard.withAuthority(() => 42)).toBe(42);
  });
});
