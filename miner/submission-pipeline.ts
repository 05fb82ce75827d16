/**
 * Send, retry and confirm one signed transaction.
 *
 *   built -> submitted -> confirming -> confirmed | rejected | timed_out
 *   built -> (retry ...) -> submitted | rejected | stale_round | submit_failed
 *
 * Transient send failures back off exponentially, up to `retryCap` retries.
 * A retry the node reports as already processed goes on to confirmation.
 * Before each retry the caller-supplied round probe is consulted; a solution
 * whose round has passed is never sent again.
 */

import type { ChainClient } from "./chain-client";
import { Clock, systemClock } from "./clock";
import { PermanentRejectionError, classifyRpcError, describeError, isAlreadyProcessed } from "./errors";
import { Logger, silentLogger } from "./logger";
import type { SignedTransaction, SubmissionHandle, SubmissionOutcome } from "./types";

export type PipelineState =
  | "built"
  | "submitted"
  | "confirming"
  | "confirmed"
  | "rejected"
  | "timed_out"
  | "stale_round"
  | "submit_failed";

export interface SubmissionPipelineOptions {
  /** Retries after the first send; total sends never exceed retryCap + 1. */
  retryCap: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  pollIntervalMs: number;
  confirmTimeoutMs: number;
  /** Report success as soon as the node accepts the transaction. */
  skipConfirm?: boolean;
}

export interface RoundGuard {
  round: bigint;
  /** Latest on-chain round; typically a ProofState refresh. */
  currentRound: () => Promise<bigint>;
}

export type TransitionListener = (state: PipelineState, detail?: string) => void;

export function backoffDelay(retry: number, baseMs: number, maxMs: number): number {
  return Math.min(maxMs, baseMs * 2 ** Math.max(0, retry - 1));
}

export class SubmissionPipeline {
  private client: ChainClient;
  private options: SubmissionPipelineOptions;
  private clock: Clock;
  private logger: Logger;

  constructor(client: ChainClient, options: SubmissionPipelineOptions, clock: Clock = systemClock, logger: Logger = silentLogger) {
    this.client = client;
    this.options = options;
    this.clock = clock;
    this.logger = logger;
  }

  async run(tx: SignedTransaction, guard?: RoundGuard, onTransition?: TransitionListener): Promise<SubmissionOutcome> {
    const transition = (state: PipelineState, detail?: string) => {
      this.logger.debug(`${tx.signature.slice(0, 16)}... -> ${state}${detail ? ` (${detail})` : ""}`);
      onTransition?.(state, detail);
    };

    transition("built");

    const sent = await this.send(tx, guard, transition);
    if ("kind" in sent) {
      return sent;
    }
    transition("submitted", sent.signature);

    if (this.options.skipConfirm) {
      transition("confirmed", "confirmation skipped");
      return { kind: "confirmed", signature: sent.signature, slot: 0 };
    }

    return this.confirm(sent, transition);
  }

  private async send(
    tx: SignedTransaction,
    guard: RoundGuard | undefined,
    transition: TransitionListener
  ): Promise<SubmissionHandle | SubmissionOutcome> {
    const { retryCap, backoffBaseMs, backoffMaxMs } = this.options;
    let lastError = "";

    for (let attempt = 0; attempt <= retryCap; attempt++) {
      if (attempt > 0) {
        await this.clock.sleep(backoffDelay(attempt, backoffBaseMs, backoffMaxMs));

        if (guard) {
          const stale = await this.checkRound(guard);
          if (stale) {
            transition("stale_round", `round #${guard.round} -> #${stale.currentRound}`);
            return stale;
          }
        }
        this.logger.info(`🔁 Retry ${attempt}/${retryCap} for ${tx.kind}...`);
      }

      try {
        return await this.client.submit(tx);
      } catch (err) {
        const classified = classifyRpcError(err);
        // An earlier send reached the node even though its response was lost
        if (attempt > 0 && classified instanceof PermanentRejectionError && isAlreadyProcessed(classified)) {
          this.logger.debug(`Resend of ${tx.signature.slice(0, 16)}... already processed`);
          return {
            signature: tx.signature,
            lastValidBlockHeight: tx.lastValidBlockHeight,
            submittedAt: this.clock.now(),
          };
        }
        if (classified instanceof PermanentRejectionError) {
          transition("rejected", classified.reason);
          return { kind: "rejected", reason: classified.reason, signature: tx.signature };
        }
        lastError = classified.message;
        this.logger.warn(`Error submitting transaction: ${lastError}`);
      }
    }

    transition("submit_failed", lastError);
    return { kind: "submit_failed", attempts: retryCap + 1, error: lastError };
  }

  private async checkRound(guard: RoundGuard): Promise<Extract<SubmissionOutcome, { kind: "stale_round" }> | null> {
    let currentRound: bigint;
    try {
      currentRound = await guard.currentRound();
    } catch (err) {
      // Without a fresh round the retry still goes ahead
      this.logger.debug(`Round check failed: ${describeError(err)}`);
      return null;
    }
    if (currentRound > guard.round) {
      return { kind: "stale_round", solutionRound: guard.round, currentRound };
    }
    return null;
  }

  private async confirm(handle: SubmissionHandle, transition: TransitionListener): Promise<SubmissionOutcome> {
    const deadline = this.clock.now() + this.options.confirmTimeoutMs;
    transition("confirming");

    while (this.clock.now() < deadline) {
      try {
        const status = await this.client.pollStatus(handle);
        if (status.state === "confirmed") {
          transition("confirmed", `slot ${status.slot}`);
          return { kind: "confirmed", signature: handle.signature, slot: status.slot };
        }
        if (status.state === "rejected") {
          transition("rejected", status.reason);
          return { kind: "rejected", reason: status.reason, signature: handle.signature };
        }
      } catch (err) {
        this.logger.debug(`Status poll failed: ${describeError(err)}`);
      }
      await this.clock.sleep(this.options.pollIntervalMs);
    }

    transition("timed_out", `${this.options.confirmTimeoutMs}ms`);
    return { kind: "timed_out", signature: handle.signature };
  }
}
