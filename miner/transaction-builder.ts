/**
 * Turns a solution (or a claim) into a signed, serialized transaction.
 *
 * No network access: the blockhash and fee come in through the FeeEstimate,
 * and ed25519 signatures are deterministic, so identical inputs always give
 * identical bytes.
 */

import * as anchor from "@coral-xyz/anchor";
import {
  ComputeBudgetProgram,
  Signer,
  Transaction,
  TransactionInstruction,
} from "@solana/web3.js";
import { createAssociatedTokenAccountIdempotentInstruction } from "@solana/spl-token";
import type { ProgramAddresses } from "./accounts";
import { EncodingError, describeError } from "./errors";
import { claimRewardsInstruction, submitProofInstruction } from "./instructions";
import type { FeeEstimate, SignedTransaction, Solution, TransactionKind } from "./types";

export interface TransactionBuilderOptions {
  /** Upper bound on the priority fee, micro-lamports per compute unit. */
  maxPriorityFee: number;
  computeUnitLimit: number;
}

export class TransactionBuilder {
  private addresses: ProgramAddresses;
  private options: TransactionBuilderOptions;

  constructor(addresses: ProgramAddresses, options: TransactionBuilderOptions) {
    this.addresses = addresses;
    this.options = options;
  }

  priorityFee(fee: FeeEstimate): number {
    const suggested = Number.isFinite(fee.microLamportsPerCu) ? Math.floor(fee.microLamportsPerCu) : 0;
    return Math.min(Math.max(0, suggested), this.options.maxPriorityFee);
  }

  /** Unsigned transaction, used to simulate compute usage before the real build. */
  draftSubmit(solution: Solution, fee: FeeEstimate, computeUnitLimit?: number): Transaction {
    return this.assemble(fee, [submitProofInstruction(this.addresses, solution.nonce)], computeUnitLimit);
  }

  buildSubmit(solution: Solution, fee: FeeEstimate, signer: Signer, computeUnitLimit?: number): SignedTransaction {
    return this.sign(
      "submit_proof",
      solution.round,
      fee,
      signer,
      [submitProofInstruction(this.addresses, solution.nonce)],
      computeUnitLimit
    );
  }

  buildClaim(amount: bigint, fee: FeeEstimate, signer: Signer, computeUnitLimit?: number): SignedTransaction {
    return this.sign(
      "claim_rewards",
      undefined,
      fee,
      signer,
      [this.createTokenAccount(), claimRewardsInstruction(this.addresses, amount)],
      computeUnitLimit
    );
  }

  /** Idempotent: succeeds whether or not the account already exists. */
  buildCreateTokenAccount(fee: FeeEstimate, signer: Signer, computeUnitLimit?: number): SignedTransaction {
    return this.sign("create_token_account", undefined, fee, signer, [this.createTokenAccount()], computeUnitLimit);
  }

  private createTokenAccount(): TransactionInstruction {
    const { miner, mint, minerTokenAccount, tokenProgram } = this.addresses;
    return createAssociatedTokenAccountIdempotentInstruction(miner, minerTokenAccount, miner, mint, tokenProgram);
  }

  private assemble(fee: FeeEstimate, instructions: TransactionInstruction[], computeUnitLimit?: number): Transaction {
    const units = computeUnitLimit ?? this.options.computeUnitLimit;
    return new Transaction({
      feePayer: this.addresses.miner,
      blockhash: fee.blockhash,
      lastValidBlockHeight: fee.lastValidBlockHeight,
    }).add(
      ComputeBudgetProgram.setComputeUnitLimit({ units }),
      ComputeBudgetProgram.setComputeUnitPrice({ microLamports: this.priorityFee(fee) }),
      ...instructions
    );
  }

  private sign(
    kind: TransactionKind,
    round: bigint | undefined,
    fee: FeeEstimate,
    signer: Signer,
    instructions: TransactionInstruction[],
    computeUnitLimit?: number
  ): SignedTransaction {
    if (!signer.publicKey.equals(this.addresses.miner)) {
      throw new EncodingError(
        `Signer ${signer.publicKey.toBase58()} is not the miner ${this.addresses.miner.toBase58()}`
      );
    }

    const units = computeUnitLimit ?? this.options.computeUnitLimit;
    const instructionData = instructions[instructions.length - 1].data;

    let serialized: Buffer;
    let signature: Buffer | null;
    try {
      const tx = this.assemble(fee, instructions, units);
      tx.sign(signer);
      serialized = tx.serialize();
      signature = tx.signature;
    } catch (err) {
      throw new EncodingError(`Failed to encode ${kind} transaction: ${describeError(err)}`, { cause: err });
    }
    if (!signature) {
      throw new EncodingError(`${kind} transaction has no fee payer signature`);
    }

    return Object.freeze({
      kind,
      round,
      instructionData: Buffer.from(instructionData),
      priorityFee: this.priorityFee(fee),
      computeUnitLimit: units,
      blockhash: fee.blockhash,
      lastValidBlockHeight: fee.lastValidBlockHeight,
      minContextSlot: fee.minContextSlot,
      signature: anchor.utils.bytes.bs58.encode(signature),
      serialized,
    });
  }
}
