/**
 * Instruction encoding for the PoW program.
 *
 * Anchor layout: 8-byte discriminator sha256("global:<name>")[0..8], then the
 * Borsh-encoded arguments (little-endian integers).
 */

import * as anchor from "@coral-xyz/anchor";
import { PublicKey, SystemProgram, TransactionInstruction } from "@solana/web3.js";
import * as crypto from "crypto";
import type { ProgramAddresses } from "./accounts";
import { EncodingError } from "./errors";
import { U128_MAX, U64_MAX } from "./pow-hash";

export function instructionDiscriminator(name: string): Buffer {
  return crypto.createHash("sha256").update(`global:${name}`).digest().subarray(0, 8);
}

export const SUBMIT_PROOF_DISCRIMINATOR = instructionDiscriminator("submit_proof");
export const CLAIM_REWARDS_DISCRIMINATOR = instructionDiscriminator("claim_rewards");

export type DecodedInstruction =
  | { name: "submit_proof"; nonce: bigint }
  | { name: "claim_rewards"; amount: bigint };

function encodeUnsigned(value: bigint, bytes: number, max: bigint, field: string): Buffer {
  if (value < 0n || value > max) {
    throw new EncodingError(`${field} ${value} does not fit in u${bytes * 8}`);
  }
  return new anchor.BN(value.toString()).toArrayLike(Buffer, "le", bytes);
}

function decodeUnsigned(data: Buffer): bigint {
  return BigInt(new anchor.BN(data, "le").toString());
}

export function encodeSubmitProof(nonce: bigint): Buffer {
  return Buffer.concat([SUBMIT_PROOF_DISCRIMINATOR, encodeUnsigned(nonce, 16, U128_MAX, "Nonce")]);
}

export function encodeClaimRewards(amount: bigint): Buffer {
  return Buffer.concat([CLAIM_REWARDS_DISCRIMINATOR, encodeUnsigned(amount, 8, U64_MAX, "Amount")]);
}

export function decodeInstruction(data: Buffer): DecodedInstruction {
  const discriminator = data.subarray(0, 8);
  const args = data.subarray(8);

  if (discriminator.equals(SUBMIT_PROOF_DISCRIMINATOR)) {
    if (args.length !== 16) {
      throw new EncodingError(`submit_proof expects 16 argument bytes, got ${args.length}`);
    }
    return { name: "submit_proof", nonce: decodeUnsigned(args) };
  }

  if (discriminator.equals(CLAIM_REWARDS_DISCRIMINATOR)) {
    if (args.length !== 8) {
      throw new EncodingError(`claim_rewards expects 8 argument bytes, got ${args.length}`);
    }
    return { name: "claim_rewards", amount: decodeUnsigned(args) };
  }

  throw new EncodingError(`Unknown instruction discriminator ${discriminator.toString("hex")}`);
}

export function submitProofInstruction(addresses: ProgramAddresses, nonce: bigint): TransactionInstruction {
  return new TransactionInstruction({
    programId: addresses.programId,
    keys: [
      { pubkey: addresses.miner, isSigner: true, isWritable: true },
      { pubkey: addresses.powConfig, isSigner: false, isWritable: true },
      { pubkey: addresses.mint, isSigner: false, isWritable: true },
      { pubkey: addresses.minerTokenAccount, isSigner: false, isWritable: true },
      { pubkey: addresses.minerStats, isSigner: false, isWritable: true },
      { pubkey: addresses.feeVault, isSigner: false, isWritable: true },
      readonly(addresses.tokenProgram),
      readonly(SystemProgram.programId),
    ],
    data: encodeSubmitProof(nonce),
  });
}

export function claimRewardsInstruction(addresses: ProgramAddresses, amount: bigint): TransactionInstruction {
  return new TransactionInstruction({
    programId: addresses.programId,
    keys: [
      { pubkey: addresses.miner, isSigner: true, isWritable: true },
      readonly(addresses.powConfig),
      { pubkey: addresses.minerStats, isSigner: false, isWritable: true },
      { pubkey: addresses.mint, isSigner: false, isWritable: true },
      { pubkey: addresses.minerTokenAccount, isSigner: false, isWritable: true },
      readonly(addresses.tokenProgram),
      readonly(SystemProgram.programId),
    ],
    data: encodeClaimRewards(amount),
  });
}

function readonly(pubkey: PublicKey) {
  return { pubkey, isSigner: false, isWritable: false };
}
