/**
 * Continuous Miner
 *
 * Connects to the PoW program and mines block after block until Ctrl+C.
 * Logs difficulty, hashrate and every new block; a second Ctrl+C exits
 * without waiting for the in-flight submission.
 */

import type { Keypair } from "@solana/web3.js";
import type { MinerConfig } from "../miner/config";
import type { Logger } from "../miner/logger";
import { createMinerContext, createOrchestrator } from "../miner/setup";
import { SubmissionLedger } from "../miner/submission-ledger";
import { ensureTokenAccount } from "../miner/token-account";

export async function runContinuousMiner(config: MinerConfig, keypair: Keypair, logger: Logger): Promise<void> {
  logger.banner("CONTINUOUS MINER - PoW Protocol");

  const ctx = createMinerContext(config, keypair, logger);
  const ledger = new SubmissionLedger(config.ledgerPath);
  const orchestrator = createOrchestrator(ctx, ledger);

  logger.info(`📍 Miner: ${ctx.wallet.publicKey.toBase58()}`);
  logger.info(`   RPC: ${config.rpcUrl}`);
  logger.info(`   Program: ${config.programId.toBase58()}`);
  logger.info(`   Threads: ${config.threads > 0 ? config.threads : "all cores"}`);
  logger.info(`   Ledger: ${config.ledgerPath}\n`);

  const tokenAccount = await ensureTokenAccount({
    addresses: ctx.addresses,
    signer: ctx.wallet.payer,
    client: ctx.client,
    builder: ctx.builder,
    pipeline: ctx.pipeline,
    logger,
  });
  if (tokenAccount.kind === "failed") {
    // Mining still works; rewards accrue in the stats account until claimed
    logger.warn(`Could not check the token account: ${tokenAccount.error}`);
  }

  const controller = new AbortController();
  const onSignal = () => {
    if (controller.signal.aborted) {
      logger.warn("Forced exit");
      process.exit(130);
    }
    logger.info("\n🛑 Stopping... waiting for any in-flight submission (Ctrl+C again to force)");
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  logger.info("⛏️  Starting continuous mining...\n");
  try {
    const stats = await orchestrator.run(controller.signal);
    const ledgerStats = ledger.stats();
    logger.info(`   Session total: ${stats.confirmed} block(s), reward ${stats.totalReward}`);
    logger.info(`   Average hashrate: ${stats.averageHashrate.toFixed(2)} MH/s`);
    logger.info(
      `   Ledger: ${ledgerStats.confirmed}/${ledgerStats.total} confirmed, ${ledgerStats.rejected} rejected, ${ledgerStats.timedOut} timed out`
    );
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    ledger.close();
  }
}
