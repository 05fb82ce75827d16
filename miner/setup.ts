/**
 * Wires the mining components together from a loaded config.
 */

import * as anchor from "@coral-xyz/anchor";
import type { Keypair } from "@solana/web3.js";
import { ProgramAddresses, deriveAddresses } from "./accounts";
import { ChainClient, SolanaChainClient } from "./chain-client";
import { systemClock } from "./clock";
import type { MinerConfig } from "./config";
import { HashSearchEngine, defaultWorkerCount } from "./hash-search-engine";
import { Logger } from "./logger";
import { MiningOrchestrator } from "./mining-orchestrator";
import { ProofState } from "./proof-state";
import { SubmissionLedger } from "./submission-ledger";
import { SubmissionPipeline, SubmissionPipelineOptions } from "./submission-pipeline";
import { TransactionBuilder } from "./transaction-builder";

export interface MinerContext {
  config: MinerConfig;
  wallet: anchor.Wallet;
  addresses: ProgramAddresses;
  client: ChainClient;
  proofState: ProofState;
  builder: TransactionBuilder;
  pipeline: SubmissionPipeline;
  /** Same retry policy; may skip confirmation. */
  claimPipeline: SubmissionPipeline;
  logger: Logger;
}

export function createMinerContext(config: MinerConfig, keypair: Keypair, logger: Logger): MinerContext {
  const connection = new anchor.web3.Connection(config.rpcUrl, config.commitment);
  const wallet = new anchor.Wallet(keypair);
  const addresses = deriveAddresses(config.programId, config.mint, wallet.publicKey);

  const client = new SolanaChainClient(connection, {
    commitment: config.commitment,
    timeoutMs: config.rpcTimeoutMs,
    feePercentile: config.priorityFeePercentile,
  });
  const proofState = new ProofState(client, addresses, systemClock, logger.child("state"));
  const builder = new TransactionBuilder(addresses, {
    maxPriorityFee: config.maxPriorityFee,
    computeUnitLimit: config.computeUnitLimit,
  });
  const pipelineOptions: SubmissionPipelineOptions = {
    retryCap: config.retryCap,
    backoffBaseMs: config.backoffBaseMs,
    backoffMaxMs: config.backoffMaxMs,
    pollIntervalMs: config.pollIntervalMs,
    confirmTimeoutMs: config.confirmTimeoutMs,
  };
  const pipeline = new SubmissionPipeline(client, pipelineOptions, systemClock, logger.child("submit"));
  const claimPipeline = new SubmissionPipeline(
    client,
    { ...pipelineOptions, skipConfirm: config.skipClaimConfirm },
    systemClock,
    logger.child("claim")
  );

  return { config, wallet, addresses, client, proofState, builder, pipeline, claimPipeline, logger };
}

export function createOrchestrator(ctx: MinerContext, ledger: SubmissionLedger): MiningOrchestrator {
  const { config } = ctx;
  const engine = new HashSearchEngine(ctx.wallet.publicKey.toBuffer(), undefined, ctx.logger.child("search"));

  return new MiningOrchestrator(
    {
      addresses: ctx.addresses,
      signer: ctx.wallet.payer,
      client: ctx.client,
      proofState: ctx.proofState,
      engine,
      builder: ctx.builder,
      pipeline: ctx.pipeline,
      ledger,
      clock: systemClock,
      logger: ctx.logger,
    },
    {
      workerCount: config.threads > 0 ? config.threads : defaultWorkerCount(),
      searchWindowMs: config.searchWindowMs,
      maxStalenessMs: config.maxStalenessMs,
      idleDelayMs: config.idleDelayMs,
      roundWatchIntervalMs: config.roundWatchIntervalMs,
      dynamicComputeUnits: config.dynamicComputeUnits,
      computeUnitMargin: config.computeUnitMargin,
      simulationRetries: config.simulationRetries,
    }
  );
}
