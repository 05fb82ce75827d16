/**
 * Values passed between the stages of a mining round.
 */

export interface ProofStateSnapshot {
  difficulty: bigint;
  /** floor((2^128 - 1) / difficulty) */
  target: bigint;
  /** On-chain blocks_mined counter; identifies the round. */
  round: bigint;
  /** Round seed, 32 bytes. */
  challenge: Buffer;
  rewardPerRound: bigint;
  /** Pending rewards the miner can claim, in token base units. */
  claimable: bigint;
  refreshedAt: number;
}

export interface Solution {
  round: bigint;
  nonce: bigint;
  hash: Buffer;
}

export interface SearchStats {
  hashes: number;
  elapsedMs: number;
  /** Million hashes per second. */
  hashrate: number;
}

export type SearchResult =
  | { kind: "found"; solution: Solution; stats: SearchStats }
  | { kind: "not_found"; reason: "deadline" | "exhausted" | "cancelled"; stats: SearchStats };

export interface FeeEstimate {
  /** Suggested priority fee in micro-lamports per compute unit. */
  microLamportsPerCu: number;
  blockhash: string;
  lastValidBlockHeight: number;
  /** Slot the blockhash was observed at. */
  minContextSlot: number;
}

export type TransactionKind = "submit_proof" | "claim_rewards" | "create_token_account";

export interface SignedTransaction {
  readonly kind: TransactionKind;
  /** Set for proof submissions only. */
  readonly round?: bigint;
  readonly instructionData: Buffer;
  readonly priorityFee: number;
  readonly computeUnitLimit: number;
  readonly blockhash: string;
  readonly lastValidBlockHeight: number;
  readonly minContextSlot: number;
  readonly signature: string;
  readonly serialized: Buffer;
}

export interface SubmissionHandle {
  signature: string;
  lastValidBlockHeight: number;
  submittedAt: number;
}

export type TxStatus =
  | { state: "pending" }
  | { state: "confirmed"; slot: number }
  | { state: "rejected"; reason: string };

export type SubmissionOutcome =
  | { kind: "confirmed"; signature: string; slot: number }
  | { kind: "rejected"; reason: string; signature?: string }
  | { kind: "timed_out"; signature: string }
  | { kind: "stale_round"; solutionRound: bigint; currentRound: bigint }
  | { kind: "submit_failed"; attempts: number; error: string };
