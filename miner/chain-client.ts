/**
 * Read/write access to the chain, wrapped around a web3.js Connection.
 *
 * Every call runs under the configured timeout and fails with either a
 * TransientNetworkError or a PermanentRejectionError.
 */

import * as anchor from "@coral-xyz/anchor";
import type { AccountInfo, Commitment, PublicKey, Transaction } from "@solana/web3.js";
import { TransientNetworkError, classifyRpcError } from "./errors";
import type { FeeEstimate, SignedTransaction, SubmissionHandle, TxStatus } from "./types";

export interface ChainClient {
  fetchAccount(address: PublicKey): Promise<AccountInfo<Buffer> | null>;
  fetchFeeHint(writableAccounts: PublicKey[]): Promise<FeeEstimate>;
  submit(tx: SignedTransaction): Promise<SubmissionHandle>;
  pollStatus(handle: SubmissionHandle): Promise<TxStatus>;
  /** Current block height at the configured commitment. */
  fetchBlockHeight(): Promise<number>;
  /** Lamports held by the address. */
  fetchBalance(address: PublicKey): Promise<number>;
  /** Compute units the transaction consumed in simulation, null when unknown. */
  simulateUnits(tx: Transaction): Promise<number | null>;
}

export interface SolanaChainClientOptions {
  commitment: Commitment;
  timeoutMs: number;
  /** Percentile of recent prioritization fees used as the fee hint. */
  feePercentile: number;
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TransientNetworkError(`${label} timed out after ${timeoutMs}ms`)),
      timeoutMs
    );
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Nearest-rank percentile over the non-zero samples. Zero when the network
 * reported no paid transactions.
 */
export function priorityFeeFromSamples(samples: number[], percentile: number): number {
  const paid = samples.filter((fee) => fee > 0).sort((a, b) => a - b);
  if (paid.length === 0) return 0;
  const clamped = Math.min(100, Math.max(0, percentile));
  const rank = Math.ceil((clamped / 100) * paid.length);
  return paid[Math.max(0, rank - 1)];
}

export class SolanaChainClient implements ChainClient {
  private connection: anchor.web3.Connection;
  private options: SolanaChainClientOptions;

  constructor(connection: anchor.web3.Connection, options: SolanaChainClientOptions) {
    this.connection = connection;
    this.options = options;
  }

  private async call<T>(label: string, run: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(run(), this.options.timeoutMs, label);
    } catch (err) {
      throw classifyRpcError(err);
    }
  }

  fetchAccount(address: PublicKey): Promise<AccountInfo<Buffer> | null> {
    return this.call("getAccountInfo", () =>
      this.connection.getAccountInfo(address, this.options.commitment)
    );
  }

  fetchFeeHint(writableAccounts: PublicKey[]): Promise<FeeEstimate> {
    return this.call("fetchFeeHint", async () => {
      const [fees, latest] = await Promise.all([
        this.connection.getRecentPrioritizationFees({ lockedWritableAccounts: writableAccounts }),
        this.connection.getLatestBlockhashAndContext(this.options.commitment),
      ]);
      return {
        microLamportsPerCu: priorityFeeFromSamples(
          fees.map((f) => f.prioritizationFee),
          this.options.feePercentile
        ),
        blockhash: latest.value.blockhash,
        lastValidBlockHeight: latest.value.lastValidBlockHeight,
        minContextSlot: latest.context.slot,
      };
    });
  }

  submit(tx: SignedTransaction): Promise<SubmissionHandle> {
    return this.call("sendRawTransaction", async () => {
      const signature = await this.connection.sendRawTransaction(tx.serialized, {
        skipPreflight: true,
        preflightCommitment: this.options.commitment,
        maxRetries: 0,
        minContextSlot: tx.minContextSlot,
      });
      return { signature, lastValidBlockHeight: tx.lastValidBlockHeight, submittedAt: Date.now() };
    });
  }

  pollStatus(handle: SubmissionHandle): Promise<TxStatus> {
    return this.call("getSignatureStatuses", async () => {
      const { value } = await this.connection.getSignatureStatuses([handle.signature]);
      const status = value[0];

      if (!status) {
        const height = await this.connection.getBlockHeight(this.options.commitment);
        if (height > handle.lastValidBlockHeight) {
          return { state: "rejected", reason: "blockhash expired before the transaction landed" };
        }
        return { state: "pending" };
      }
      if (status.err) {
        return { state: "rejected", reason: JSON.stringify(status.err) };
      }
      const reached =
        status.confirmationStatus === "finalized" ||
        (status.confirmationStatus === "confirmed" && this.options.commitment !== "finalized");
      return reached ? { state: "confirmed", slot: status.slot } : { state: "pending" };
    });
  }

  fetchBlockHeight(): Promise<number> {
    return this.call("getBlockHeight", () => this.connection.getBlockHeight(this.options.commitment));
  }

  fetchBalance(address: PublicKey): Promise<number> {
    return this.call("getBalance", () => this.connection.getBalance(address, this.options.commitment));
  }

  simulateUnits(tx: Transaction): Promise<number | null> {
    return this.call("simulateTransaction", async () => {
      const message = tx.compileMessage();
      const versioned = new anchor.web3.VersionedTransaction(message);
      const result = await this.connection.simulateTransaction(versioned, {
        sigVerify: false,
        replaceRecentBlockhash: true,
        commitment: this.options.commitment,
      });
      if (result.value.err) {
        throw classifyRpcError(
          Object.assign(new Error(`Simulation failed: ${JSON.stringify(result.value.err)}`), {
            logs: result.value.logs ?? [],
          })
        );
      }
      return result.value.unitsConsumed ?? null;
    });
  }
}
