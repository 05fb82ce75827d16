/**
 * Cached view of the on-chain mining parameters.
 *
 * ProofState is the only writer of snapshots. Each snapshot is frozen, so a
 * search and the build that follows it always see the same difficulty, round
 * and challenge even if a refresh lands in between.
 */

import type { PublicKey } from "@solana/web3.js";
import { decodeMinerStats, decodePowConfig } from "./accounts";
import type { ChainClient } from "./chain-client";
import { Clock, systemClock } from "./clock";
import { DeadlineExceededError, EncodingError, TransientNetworkError, describeError } from "./errors";
import { Logger, silentLogger } from "./logger";
import { difficultyToTarget } from "./pow-hash";
import type { ProofStateSnapshot } from "./types";

export interface ProofStateAccounts {
  powConfig: PublicKey;
  minerStats: PublicKey;
}

export interface RetainedSnapshot {
  snapshot: ProofStateSnapshot;
  /** False when the refresh failed and an older snapshot was reused. */
  fresh: boolean;
}

export class ProofState {
  private client: ChainClient;
  private accounts: ProofStateAccounts;
  private clock: Clock;
  private logger: Logger;
  private latest: ProofStateSnapshot | null = null;
  private inflight: Promise<ProofStateSnapshot> | null = null;

  constructor(client: ChainClient, accounts: ProofStateAccounts, clock: Clock = systemClock, logger: Logger = silentLogger) {
    this.client = client;
    this.accounts = accounts;
    this.clock = clock;
    this.logger = logger;
  }

  current(): ProofStateSnapshot | null {
    return this.latest;
  }

  stalenessMs(): number {
    return this.latest ? this.clock.now() - this.latest.refreshedAt : Infinity;
  }

  /**
   * Re-read the chain. Concurrent callers share one request. On failure the
   * previous snapshot stays in place and the error propagates.
   */
  refresh(): Promise<ProofStateSnapshot> {
    if (!this.inflight) {
      this.inflight = this.load().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  async refreshOrRetain(maxStalenessMs: number): Promise<RetainedSnapshot> {
    try {
      return { snapshot: await this.refresh(), fresh: true };
    } catch (err) {
      const previous = this.latest;
      const age = this.stalenessMs();
      if (previous && age <= maxStalenessMs) {
        this.logger.warn(`Refresh failed (${describeError(err)}), reusing snapshot from ${age}ms ago`);
        return { snapshot: previous, fresh: false };
      }
      throw new DeadlineExceededError(
        previous
          ? `Proof state is ${age}ms old (limit ${maxStalenessMs}ms) and refresh failed: ${describeError(err)}`
          : `No proof state available: ${describeError(err)}`,
        { cause: err }
      );
    }
  }

  private async load(): Promise<ProofStateSnapshot> {
    const [configInfo, statsInfo] = await Promise.all([
      this.client.fetchAccount(this.accounts.powConfig),
      this.client.fetchAccount(this.accounts.minerStats),
    ]);

    if (!configInfo) {
      throw new TransientNetworkError(`PoW config ${this.accounts.powConfig.toBase58()} not found`);
    }

    const config = decodePowConfig(configInfo.data);
    if (config.difficulty === 0n) {
      throw new EncodingError("PoW config reports zero difficulty");
    }
    // A miner that never landed a block has no stats account yet
    const claimable = statsInfo ? decodeMinerStats(statsInfo.data).pendingRewards : 0n;

    const snapshot: ProofStateSnapshot = Object.freeze({
      difficulty: config.difficulty,
      target: difficultyToTarget(config.difficulty),
      round: config.blocksMined,
      challenge: config.challenge,
      rewardPerRound: config.rewardPerBlock,
      claimable,
      refreshedAt: this.clock.now(),
    });

    if (this.latest && snapshot.round !== this.latest.round) {
      this.logger.debug(`Round advanced #${this.latest.round} -> #${snapshot.round}`);
    }
    this.latest = snapshot;
    return snapshot;
  }
}
