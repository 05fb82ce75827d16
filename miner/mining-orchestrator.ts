/**
 * The mining loop.
 *
 *   idle -> refreshing -> searching -> building -> submitting -> refreshing ...
 *
 * Any state moves to "stopped" once the abort signal fires. A search in
 * progress is cancelled; a submission in progress is allowed to reach its
 * terminal outcome first. No single round's failure ends the loop.
 */

import type { Signer } from "@solana/web3.js";
import { ProgramAddresses, decodePowConfig } from "./accounts";
import type { ChainClient } from "./chain-client";
import { Clock, systemClock } from "./clock";
import { PermanentRejectionError, describeError } from "./errors";
import type { HashSearchEngine } from "./hash-search-engine";
import { Logger, silentLogger } from "./logger";
import type { ProofState } from "./proof-state";
import type { SubmissionLedger } from "./submission-ledger";
import type { SubmissionPipeline } from "./submission-pipeline";
import type { TransactionBuilder } from "./transaction-builder";
import type {
  FeeEstimate,
  ProofStateSnapshot,
  SearchResult,
  SignedTransaction,
  Solution,
  SubmissionOutcome,
} from "./types";

export type OrchestratorState = "idle" | "refreshing" | "searching" | "building" | "submitting" | "stopped";

export type RoundReport =
  | { kind: "confirmed"; round: bigint; signature: string; slot: number; rewardDelta: bigint | null }
  | { kind: "rejected"; round: bigint; reason: string; signature?: string }
  | { kind: "timed_out"; round: bigint; signature: string }
  | { kind: "stale_round"; round: bigint; currentRound: bigint }
  | { kind: "submit_failed"; round: bigint; attempts: number; error: string }
  | { kind: "not_found"; round: bigint; reason: "deadline" | "exhausted" | "cancelled" }
  | { kind: "skipped"; round: bigint }
  | { kind: "error"; stage: OrchestratorState; error: string }
  | { kind: "stopped" };

export interface OrchestratorOptions {
  workerCount: number;
  searchWindowMs: number;
  maxStalenessMs: number;
  /** Pause after a skipped or failed round. */
  idleDelayMs: number;
  /** 0 disables watching the chain for a new round during a search. */
  roundWatchIntervalMs: number;
  dynamicComputeUnits: boolean;
  computeUnitMargin: number;
  simulationRetries: number;
}

export interface OrchestratorDeps {
  addresses: ProgramAddresses;
  signer: Signer;
  client: ChainClient;
  proofState: ProofState;
  engine: HashSearchEngine;
  builder: TransactionBuilder;
  pipeline: SubmissionPipeline;
  ledger?: SubmissionLedger;
  clock?: Clock;
  logger?: Logger;
}

export interface MiningStats {
  rounds: number;
  confirmed: number;
  missed: number;
  errors: number;
  totalReward: bigint;
  averageHashrate: number;
}

export class MiningOrchestrator {
  private deps: OrchestratorDeps;
  private options: OrchestratorOptions;
  private clock: Clock;
  private logger: Logger;
  private currentState: OrchestratorState = "idle";
  private hashrateSum = 0;
  private hashrateSamples = 0;
  private session: MiningStats = {
    rounds: 0,
    confirmed: 0,
    missed: 0,
    errors: 0,
    totalReward: 0n,
    averageHashrate: 0,
  };

  constructor(deps: OrchestratorDeps, options: OrchestratorOptions) {
    this.deps = deps;
    this.options = options;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? silentLogger;
  }

  get state(): OrchestratorState {
    return this.currentState;
  }

  stats(): MiningStats {
    return { ...this.session };
  }

  /** Mine until the signal aborts (or `maxRounds` rounds have run). */
  async run(signal: AbortSignal, maxRounds = Infinity): Promise<MiningStats> {
    let rounds = 0;
    while (!signal.aborted && rounds < maxRounds) {
      const report = await this.runRound(signal);
      rounds++;
      if (report.kind === "stopped") break;
      if (report.kind === "skipped" || report.kind === "error") {
        await this.clock.sleep(this.options.idleDelayMs, signal);
      }
    }
    this.currentState = "stopped";
    this.logger.info(
      `⏹️  Stopped after ${this.session.rounds} round(s): ${this.session.confirmed} block(s), reward ${this.session.totalReward}`
    );
    return this.stats();
  }

  async runRound(signal?: AbortSignal): Promise<RoundReport> {
    const report = await this.executeRound(signal);
    this.record(report);
    this.currentState = signal?.aborted ? "stopped" : "idle";
    return report;
  }

  private async executeRound(signal?: AbortSignal): Promise<RoundReport> {
    if (signal?.aborted) return { kind: "stopped" };

    // 1. Refresh protocol state
    this.currentState = "refreshing";
    let snapshot: ProofStateSnapshot;
    try {
      ({ snapshot } = await this.deps.proofState.refreshOrRetain(this.options.maxStalenessMs));
    } catch (err) {
      return this.fail("refreshing", err);
    }

    this.logger.separator();
    this.logger.info(`📦 Block #${snapshot.round}`);
    this.logger.info(`⚙️  Difficulty: ${snapshot.difficulty.toLocaleString()}`);
    this.logger.info(`🎲 Challenge: ${snapshot.challenge.toString("hex").substring(0, 16)}...`);

    if (await this.alreadySubmitted(snapshot.round)) {
      this.logger.debug(`Round #${snapshot.round} already has a submission, waiting for the next one`);
      return { kind: "skipped", round: snapshot.round };
    }

    // 2. Search
    if (signal?.aborted) return { kind: "stopped" };
    this.currentState = "searching";
    this.logger.info("⛏️  Mining...");

    const searchAbort = new AbortController();
    const forwardAbort = () => searchAbort.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });
    const watcher = this.watchRound(snapshot.round, searchAbort);

    let result: SearchResult;
    try {
      result = await this.deps.engine.search(snapshot, {
        workerCount: this.options.workerCount,
        // Workers compare against wall-clock time
        deadline: Date.now() + this.options.searchWindowMs,
        signal: searchAbort.signal,
      });
    } catch (err) {
      return this.fail("searching", err);
    } finally {
      watcher.stop();
      signal?.removeEventListener("abort", forwardAbort);
    }

    if (signal?.aborted) return { kind: "stopped" };
    const advancedTo = watcher.advancedTo();
    if (advancedTo !== null) {
      this.logger.warn(`New block detected (#${advancedTo}), restarting with new challenge`);
      return { kind: "stale_round", round: snapshot.round, currentRound: advancedTo };
    }
    if (result.kind === "not_found") {
      this.logger.info(`❌ No solution (${result.reason}) after ${result.stats.hashes.toLocaleString()} hashes`);
      return { kind: "not_found", round: snapshot.round, reason: result.reason };
    }

    this.hashrateSum += result.stats.hashrate;
    this.hashrateSamples++;
    this.logger.success(`Nonce found: ${result.solution.nonce}`);
    this.logger.info(`⏱️  Time: ${(result.stats.elapsedMs / 1000).toFixed(2)}s`);
    this.logger.info(
      `⚡ Hashrate: ${result.stats.hashrate.toFixed(2)} MH/s (avg: ${(this.hashrateSum / this.hashrateSamples).toFixed(2)} MH/s)`
    );

    // 3. Build
    this.currentState = "building";
    let tx: SignedTransaction;
    try {
      tx = await this.build(result.solution);
    } catch (err) {
      if (err instanceof PermanentRejectionError) {
        this.logger.error(err.message);
        return { kind: "rejected", round: snapshot.round, reason: err.reason };
      }
      return this.fail("building", err);
    }

    // 4. Submit; not tied to the stop signal
    this.currentState = "submitting";
    this.logger.info("📤 Submitting proof...");
    this.deps.ledger?.recordSubmission(snapshot.round, result.solution.nonce, tx.signature, tx.lastValidBlockHeight);

    const outcome = await this.deps.pipeline.run(tx, {
      round: snapshot.round,
      currentRound: async () => (await this.deps.proofState.refresh()).round,
    });

    const report = await this.settle(snapshot, outcome);
    const reward = report.kind === "confirmed" ? report.rewardDelta ?? undefined : undefined;
    this.deps.ledger?.recordOutcome(tx.signature, outcome, reward);
    return report;
  }

  /**
   * A round stays closed while one of our transactions for it has landed or
   * can still land. The block height is only read when an unexpired row
   * might exist; if it cannot be read the round stays closed.
   */
  private async alreadySubmitted(round: bigint): Promise<boolean> {
    const ledger = this.deps.ledger;
    if (!ledger?.hasSubmitted(round)) return false;

    let height: number;
    try {
      height = await this.deps.client.fetchBlockHeight();
    } catch (err) {
      this.logger.debug(`Could not read block height: ${describeError(err)}`);
      return true;
    }
    return ledger.hasSubmitted(round, height);
  }

  private async build(solution: Solution): Promise<SignedTransaction> {
    const { client, builder, signer, addresses } = this.deps;

    const balance = await client.fetchBalance(signer.publicKey);
    if (balance <= 0) {
      throw new PermanentRejectionError("Insufficient SOL balance");
    }

    const fee = await client.fetchFeeHint([addresses.powConfig]);
    const computeUnitLimit = await this.computeUnits(solution, fee);
    return builder.buildSubmit(solution, fee, signer, computeUnitLimit);
  }

  private async computeUnits(solution: Solution, fee: FeeEstimate): Promise<number | undefined> {
    if (!this.options.dynamicComputeUnits) return undefined;

    const draft = this.deps.builder.draftSubmit(solution, fee);
    for (let attempt = 0; attempt <= this.options.simulationRetries; attempt++) {
      try {
        const units = await this.deps.client.simulateUnits(draft);
        if (units !== null) {
          this.logger.debug(`Dynamic CUs: ${units}`);
          return units + this.options.computeUnitMargin;
        }
      } catch (err) {
        this.logger.debug(`Simulation error: ${describeError(err)}`);
      }
    }
    this.logger.warn("Simulation failed, using the configured compute unit limit");
    return undefined;
  }

  private async settle(snapshot: ProofStateSnapshot, outcome: SubmissionOutcome): Promise<RoundReport> {
    const round = snapshot.round;
    switch (outcome.kind) {
      case "confirmed": {
        const rewardDelta = await this.rewardSince(snapshot);
        this.logger.info(`🎉 Block mined successfully!`);
        this.logger.info(`   TX: ${outcome.signature}`);
        if (rewardDelta !== null) this.logger.info(`   Reward: +${rewardDelta}`);
        return { kind: "confirmed", round, signature: outcome.signature, slot: outcome.slot, rewardDelta };
      }
      case "rejected":
        this.logger.error(`Proof rejected: ${outcome.reason}`);
        return { kind: "rejected", round, reason: outcome.reason, signature: outcome.signature };
      case "timed_out":
        this.logger.info(`⌛ Not confirmed in time: ${outcome.signature}`);
        return { kind: "timed_out", round, signature: outcome.signature };
      case "stale_round":
        this.logger.info(`Round moved on to #${outcome.currentRound}, dropping solution`);
        return { kind: "stale_round", round, currentRound: outcome.currentRound };
      case "submit_failed":
        this.logger.warn(`Gave up after ${outcome.attempts} attempt(s): ${outcome.error}`);
        return { kind: "submit_failed", round, attempts: outcome.attempts, error: outcome.error };
    }
  }

  private async rewardSince(before: ProofStateSnapshot): Promise<bigint | null> {
    try {
      const after = await this.deps.proofState.refresh();
      return after.claimable - before.claimable;
    } catch (err) {
      this.logger.debug(`Could not read reward after confirmation: ${describeError(err)}`);
      return null;
    }
  }

  /**
   * Poll pow_config during the search and cancel it once another miner
   * lands the block. Reads the account directly; the snapshot is untouched.
   */
  private watchRound(round: bigint, searchAbort: AbortController) {
    let advanced: bigint | null = null;
    let timer: NodeJS.Timeout | null = null;

    if (this.options.roundWatchIntervalMs > 0) {
      timer = setInterval(() => {
        this.deps.client
          .fetchAccount(this.deps.addresses.powConfig)
          .then((info) => {
            if (!info || advanced !== null) return;
            const latest = decodePowConfig(info.data).blocksMined;
            if (latest !== round) {
              advanced = latest;
              searchAbort.abort();
            }
          })
          .catch((err: unknown) => this.logger.debug(`Round watch failed: ${describeError(err)}`));
      }, this.options.roundWatchIntervalMs);
    }

    return {
      advancedTo: () => advanced,
      stop: () => {
        if (timer) clearInterval(timer);
      },
    };
  }

  private fail(stage: OrchestratorState, err: unknown): RoundReport {
    const error = describeError(err);
    this.logger.error(`${stage}: ${error}`);
    return { kind: "error", stage, error };
  }

  private record(report: RoundReport): void {
    if (report.kind === "stopped") return;
    this.session.rounds++;
    if (report.kind === "confirmed") {
      this.session.confirmed++;
      this.session.totalReward += report.rewardDelta ?? 0n;
    } else if (report.kind === "error") {
      this.session.errors++;
    } else if (report.kind !== "skipped") {
      this.session.missed++;
    }
    this.session.averageHashrate = this.hashrateSamples ? this.hashrateSum / this.hashrateSamples : 0;
  }
}
