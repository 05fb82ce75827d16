/**
 * Program-derived addresses and raw account decoding for the PoW program.
 */

import { PublicKey } from "@solana/web3.js";
import { TOKEN_2022_PROGRAM_ID, getAssociatedTokenAddressSync } from "@solana/spl-token";
import * as crypto from "crypto";
import { EncodingError } from "./errors";

// Seeds
export const POW_CONFIG_SEED = Buffer.from("pow_config");
export const FEE_VAULT_SEED = Buffer.from("fee_vault");
export const MINER_STATS_SEED = Buffer.from("miner_stats");

export interface ProgramAddresses {
  programId: PublicKey;
  mint: PublicKey;
  miner: PublicKey;
  powConfig: PublicKey;
  feeVault: PublicKey;
  minerStats: PublicKey;
  minerTokenAccount: PublicKey;
  tokenProgram: PublicKey;
}

export function deriveAddresses(
  programId: PublicKey,
  mint: PublicKey,
  miner: PublicKey,
  tokenProgram: PublicKey = TOKEN_2022_PROGRAM_ID
): ProgramAddresses {
  const [powConfig] = PublicKey.findProgramAddressSync([POW_CONFIG_SEED], programId);
  const [feeVault] = PublicKey.findProgramAddressSync([FEE_VAULT_SEED], programId);
  const [minerStats] = PublicKey.findProgramAddressSync(
    [MINER_STATS_SEED, miner.toBuffer()],
    programId
  );
  const minerTokenAccount = getAssociatedTokenAddressSync(mint, miner, false, tokenProgram);

  return { programId, mint, miner, powConfig, feeVault, minerStats, minerTokenAccount, tokenProgram };
}

export function accountDiscriminator(name: string): Buffer {
  return crypto.createHash("sha256").update(`account:${name}`).digest().subarray(0, 8);
}

const POW_CONFIG_DISCRIMINATOR = accountDiscriminator("PowConfig");
const MINER_STATS_DISCRIMINATOR = accountDiscriminator("MinerStats");

export const POW_CONFIG_SIZE = 144;
export const MINER_STATS_SIZE = 72;

export interface PowConfigAccount {
  authority: PublicKey;
  mint: PublicKey;
  difficulty: bigint;
  lastBlockTimestamp: bigint;
  blocksMined: bigint;
  rewardPerBlock: bigint;
  challenge: Buffer;
}

export interface MinerStatsAccount {
  miner: PublicKey;
  blocksMined: bigint;
  totalRewards: bigint;
  pendingRewards: bigint;
  lastRound: bigint;
}

function expectAccount(data: Buffer, name: string, discriminator: Buffer, size: number): void {
  if (data.length < size) {
    throw new EncodingError(`${name} account is ${data.length} bytes, expected at least ${size}`);
  }
  if (!data.subarray(0, 8).equals(discriminator)) {
    throw new EncodingError(`Account data is not a ${name} account`);
  }
}

/**
 * PowConfig layout:
 *   0 discriminator | 8 authority | 40 mint | 72 difficulty (u128)
 *   88 last_block_ts (i64) | 96 blocks_mined (u64) | 104 reward_per_block (u64)
 *   112 challenge (32 bytes)
 */
export function decodePowConfig(data: Buffer): PowConfigAccount {
  expectAccount(data, "PowConfig", POW_CONFIG_DISCRIMINATOR, POW_CONFIG_SIZE);

  const difficultyLow = data.readBigUInt64LE(72);
  const difficultyHigh = data.readBigUInt64LE(80);

  return {
    authority: new PublicKey(data.subarray(8, 40)),
    mint: new PublicKey(data.subarray(40, 72)),
    difficulty: difficultyLow | (difficultyHigh << 64n),
    lastBlockTimestamp: data.readBigInt64LE(88),
    blocksMined: data.readBigUInt64LE(96),
    rewardPerBlock: data.readBigUInt64LE(104),
    challenge: Buffer.from(data.subarray(112, 144)),
  };
}

/**
 * MinerStats layout:
 *   0 discriminator | 8 miner | 40 blocks_mined | 48 total_rewards
 *   56 pending_rewards | 64 last_round   (all u64)
 */
export function decodeMinerStats(data: Buffer): MinerStatsAccount {
  expectAccount(data, "MinerStats", MINER_STATS_DISCRIMINATOR, MINER_STATS_SIZE);

  return {
    miner: new PublicKey(data.subarray(8, 40)),
    blocksMined: data.readBigUInt64LE(40),
    totalRewards: data.readBigUInt64LE(48),
    pendingRewards: data.readBigUInt64LE(56),
    lastRound: data.readBigUInt64LE(64),
  };
}

// Inverse of the decoders, for seeding account data.

export function encodePowConfig(account: PowConfigAccount): Buffer {
  const data = Buffer.alloc(POW_CONFIG_SIZE);
  POW_CONFIG_DISCRIMINATOR.copy(data, 0);
  account.authority.toBuffer().copy(data, 8);
  account.mint.toBuffer().copy(data, 40);
  data.writeBigUInt64LE(account.difficulty & ((1n << 64n) - 1n), 72);
  data.writeBigUInt64LE(account.difficulty >> 64n, 80);
  data.writeBigInt64LE(account.lastBlockTimestamp, 88);
  data.writeBigUInt64LE(account.blocksMined, 96);
  data.writeBigUInt64LE(account.rewardPerBlock, 104);
  account.challenge.copy(data, 112);
  return data;
}

export function encodeMinerStats(account: MinerStatsAccount): Buffer {
  const data = Buffer.alloc(MINER_STATS_SIZE);
  MINER_STATS_DISCRIMINATOR.copy(data, 0);
  account.miner.toBuffer().copy(data, 8);
  data.writeBigUInt64LE(account.blocksMined, 40);
  data.writeBigUInt64LE(account.totalRewards, 48);
  data.writeBigUInt64LE(account.pendingRewards, 56);
  data.writeBigUInt64LE(account.lastRound, 64);
  return data;
}
