import { AccountInfo, Keypair, PublicKey, Transaction } from "@solana/web3.js";
import { deriveAddresses, encodeMinerStats, encodePowConfig } from "../accounts";
import type { ChainClient } from "../chain-client";
import type { Clock } from "../clock";
import type { FeeEstimate, SignedTransaction, SubmissionHandle, TxStatus } from "../types";

export function keypairFromByte(byte: number): Keypair {
  return Keypair.fromSeed(new Uint8Array(32).fill(byte));
}

export const minerKeypair = keypairFromByte(7);
export const programId = keypairFromByte(1).publicKey;
export const mint = keypairFromByte(2).publicKey;
export const addresses = deriveAddresses(programId, mint, minerKeypair.publicKey);

export const testFee: FeeEstimate = {
  microLamportsPerCu: 5_000,
  blockhash: keypairFromByte(3).publicKey.toBase58(),
  lastValidBlockHeight: 1_000,
  minContextSlot: 900,
};

export function powConfigData(options: {
  difficulty: bigint;
  round: bigint;
  challenge?: Buffer;
  rewardPerBlock?: bigint;
}): Buffer {
  return encodePowConfig({
    authority: keypairFromByte(4).publicKey,
    mint,
    difficulty: options.difficulty,
    lastBlockTimestamp: 1_700_000_000n,
    blocksMined: options.round,
    rewardPerBlock: options.rewardPerBlock ?? 100n,
    challenge: options.challenge ?? Buffer.alloc(32, 0x11),
  });
}

export function minerStatsData(pendingRewards: bigint): Buffer {
  return encodeMinerStats({
    miner: minerKeypair.publicKey,
    blocksMined: 0n,
    totalRewards: pendingRewards,
    pendingRewards,
    lastRound: 0n,
  });
}

export function signedTxFixture(overrides: Partial<SignedTransaction> = {}): SignedTransaction {
  return {
    kind: "submit_proof",
    round: 5n,
    instructionData: Buffer.alloc(24),
    priorityFee: 0,
    computeUnitLimit: 200_000,
    blockhash: testFee.blockhash,
    lastValidBlockHeight: 1_000,
    minContextSlot: 900,
    signature: "sig-fixture",
    serialized: Buffer.from([1, 2, 3]),
    ...overrides,
  };
}

/** Clock whose sleeps complete instantly and move time forward. */
export class ManualClock implements Clock {
  current: number;
  sleeps: number[] = [];

  constructor(start = 1_000_000) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

/** In-memory chain. Accounts live in a map keyed by base58 address. */
export class FakeChainClient implements ChainClient {
  accounts = new Map<string, Buffer>();
  submitErrors: Error[] = [];
  pollScript: Array<TxStatus | Error> = [];
  defaultPoll: TxStatus = { state: "confirmed", slot: 99 };
  blockHeight: number | Error = 500;
  balance = 1_000_000_000;
  fee: FeeEstimate = testFee;
  simulatedUnits: number | null | Error = null;
  failReads = false;

  submitCalls = 0;
  pollCalls = 0;
  accountReads = 0;
  submitted: SignedTransaction[] = [];
  onSubmit?: (tx: SignedTransaction) => void;
  onSubmitError?: (tx: SignedTransaction) => void;

  setAccount(address: PublicKey, data: Buffer): void {
    this.accounts.set(address.toBase58(), data);
  }

  async fetchAccount(address: PublicKey): Promise<AccountInfo<Buffer> | null> {
    this.accountReads++;
    if (this.failReads) {
      throw new Error("fetch failed");
    }
    const data = this.accounts.get(address.toBase58());
    if (!data) return null;
    return { data, executable: false, lamports: 1_000_000, owner: programId, rentEpoch: 0 };
  }

  async fetchFeeHint(): Promise<FeeEstimate> {
    return this.fee;
  }

  async submit(tx: SignedTransaction): Promise<SubmissionHandle> {
    this.submitCalls++;
    const error = this.submitErrors.shift();
    if (error) {
      this.onSubmitError?.(tx);
      throw error;
    }
    this.submitted.push(tx);
    this.onSubmit?.(tx);
    return { signature: tx.signature, lastValidBlockHeight: tx.lastValidBlockHeight, submittedAt: 0 };
  }

  async pollStatus(): Promise<TxStatus> {
    this.pollCalls++;
    const next = this.pollScript.shift() ?? this.defaultPoll;
    if (next instanceof Error) throw next;
    return next;
  }

  async fetchBlockHeight(): Promise<number> {
    if (this.blockHeight instanceof Error) throw this.blockHeight;
    return this.blockHeight;
  }

  async fetchBalance(): Promise<number> {
    return this.balance;
  }

  async simulateUnits(_tx: Transaction): Promise<number | null> {
    if (this.simulatedUnits instanceof Error) throw this.simulatedUnits;
    return this.simulatedUnits;
  }
}
