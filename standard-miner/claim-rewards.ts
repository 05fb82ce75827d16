/**
 * Claim Rewards
 *
 * Moves the pending rewards recorded in the miner's stats account to its
 * associated token account, creating the token account if needed.
 */

import type { Keypair } from "@solana/web3.js";
import type { MinerConfig } from "../miner/config";
import type { Logger } from "../miner/logger";
import { claimRewards } from "../miner/reward-claimer";
import { createMinerContext } from "../miner/setup";

export async function runClaimRewards(
  config: MinerConfig,
  keypair: Keypair,
  logger: Logger,
  amount?: bigint
): Promise<boolean> {
  logger.banner("CLAIM REWARDS - PoW Protocol");

  const ctx = createMinerContext(config, keypair, logger);
  logger.info(`📍 Miner: ${ctx.wallet.publicKey.toBase58()}`);
  logger.info(`   Token account: ${ctx.addresses.minerTokenAccount.toBase58()}\n`);

  const result = await claimRewards(
    {
      addresses: ctx.addresses,
      signer: ctx.wallet.payer,
      client: ctx.client,
      proofState: ctx.proofState,
      builder: ctx.builder,
      pipeline: ctx.claimPipeline,
      logger,
    },
    amount
  );

  switch (result.kind) {
    case "nothing_to_claim":
      return true;
    case "failed":
      logger.error(result.error);
      return false;
    case "submitted":
      return result.outcome.kind === "confirmed";
  }
}
