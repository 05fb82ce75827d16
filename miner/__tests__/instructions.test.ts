import { SystemProgram } from "@solana/web3.js";
import { describe, expect, it } from "vitest";
import { EncodingError } from "../errors";
import {
  CLAIM_REWARDS_DISCRIMINATOR,
  SUBMIT_PROOF_DISCRIMINATOR,
  claimRewardsInstruction,
  decodeInstruction,
  encodeClaimRewards,
  encodeSubmitProof,
  submitProofInstruction,
} from "../instructions";
import { U128_MAX } from "../pow-hash";
import { addresses } from "./helpers";

describe("discriminators", () => {
  it("match the anchor global namespace hashes", () => {
    expect([...SUBMIT_PROOF_DISCRIMINATOR]).toEqual([54, 241, 46, 84, 4, 212, 46, 94]);
    expect([...CLAIM_REWARDS_DISCRIMINATOR]).toEqual([4, 144, 132, 71, 116, 23, 151, 80]);
  });
});

describe("encodeSubmitProof", () => {
  it("appends the nonce as a u128 little-endian", () => {
    const data = encodeSubmitProof(0x0102n);

    expect(data.length).toBe(24);
    expect(data.subarray(0, 8).equals(SUBMIT_PROOF_DISCRIMINATOR)).toBe(true);
    expect([...data.subarray(8)]).toEqual([0x02, 0x01, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0]);
  });

  it("accepts the full u128 range and nothing outside it", () => {
    expect([...encodeSubmitProof(U128_MAX).subarray(8)]).toEqual(new Array(16).fill(0xff));
    expect(() => encodeSubmitProof(U128_MAX + 1n)).toThrow(EncodingError);
    expect(() => encodeSubmitProof(-1n)).toThrow(EncodingError);
  });
});

describe("encodeClaimRewards", () => {
  it("appends the amount as a u64 little-endian", () => {
    const data = encodeClaimRewards(1_000n);

    expect(data.length).toBe(16);
    expect(data.subarray(0, 8).equals(CLAIM_REWARDS_DISCRIMINATOR)).toBe(true);
    expect(data.readBigUInt64LE(8)).toBe(1_000n);
  });

  it("refuses amounts above u64", () => {
    expect(() => encodeClaimRewards(1n << 64n)).toThrow("does not fit in u64");
  });
});

describe("decodeInstruction", () => {
  it("reads back what the encoders wrote", () => {
    const nonce = (1n << 100n) + 12_345n;
    expect(decodeInstruction(encodeSubmitProof(nonce))).toEqual({ name: "submit_proof", nonce });
    expect(decodeInstruction(encodeClaimRewards(77n))).toEqual({ name: "claim_rewards", amount: 77n });
  });

  it("rejects truncated arguments", () => {
    expect(() => decodeInstruction(encodeSubmitProof(1n).subarray(0, 20))).toThrow(
      "submit_proof expects 16 argument bytes, got 12"
    );
  });

  it("rejects an unknown discriminator", () => {
    expect(() => decodeInstruction(Buffer.alloc(16))).toThrow(
      "Unknown instruction discriminator 0000000000000000"
    );
  });
});

describe("instruction accounts", () => {
  it("lists submit_proof accounts in program order", () => {
    const ix = submitProofInstruction(addresses, 9n);

    expect(ix.programId.equals(addresses.programId)).toBe(true);
    expect(ix.keys.map((k) => [k.pubkey.toBase58(), k.isSigner, k.isWritable])).toEqual([
      [addresses.miner.toBase58(), true, true],
      [addresses.powConfig.toBase58(), false, true],
      [addresses.mint.toBase58(), false, true],
      [addresses.minerTokenAccount.toBase58(), false, true],
      [addresses.minerStats.toBase58(), false, true],
      [addresses.feeVault.toBase58(), false, true],
      [addresses.tokenProgram.toBase58(), false, false],
      [SystemProgram.programId.toBase58(), false, false],
    ]);
    expect(decodeInstruction(ix.data)).toEqual({ name: "submit_proof", nonce: 9n });
  });

  it("lists claim_rewards accounts in program order", () => {
    const ix = claimRewardsInstruction(addresses, 5n);

    expect(ix.keys.map((k) => [k.pubkey.toBase58(), k.isSigner, k.isWritable])).toEqual([
      [addresses.miner.toBase58(), true, true],
      [addresses.powConfig.toBase58(), false, false],
      [addresses.minerStats.toBase58(), false, true],
      [addresses.mint.toBase58(), false, true],
      [addresses.minerTokenAccount.toBase58(), false, true],
      [addresses.tokenProgram.toBase58(), false, false],
      [SystemProgram.programId.toBase58(), false, false],
    ]);
  });
});
