/**
 * Makes sure the miner's associated token account exists before mining, so
 * the first rewarded proof has somewhere to land.
 */

import type { Signer } from "@solana/web3.js";
import type { ProgramAddresses } from "./accounts";
import type { ChainClient } from "./chain-client";
import { describeError } from "./errors";
import { Logger, silentLogger } from "./logger";
import type { SubmissionPipeline } from "./submission-pipeline";
import type { TransactionBuilder } from "./transaction-builder";
import type { SignedTransaction, SubmissionOutcome } from "./types";

export interface TokenAccountDeps {
  addresses: ProgramAddresses;
  signer: Signer;
  client: ChainClient;
  builder: TransactionBuilder;
  pipeline: SubmissionPipeline;
  logger?: Logger;
}

export type TokenAccountResult =
  | { kind: "exists" }
  | { kind: "failed"; error: string }
  | { kind: "submitted"; outcome: SubmissionOutcome };

export async function ensureTokenAccount(deps: TokenAccountDeps): Promise<TokenAccountResult> {
  const logger = deps.logger ?? silentLogger;
  const account = deps.addresses.minerTokenAccount;
  logger.info("🪙 Ensuring token account exists...");

  let tx: SignedTransaction;
  try {
    if (await deps.client.fetchAccount(account)) {
      logger.info(`   Token account: ${account.toBase58()}`);
      return { kind: "exists" };
    }
    const fee = await deps.client.fetchFeeHint([account]);
    tx = deps.builder.buildCreateTokenAccount(fee, deps.signer);
  } catch (err) {
    return { kind: "failed", error: describeError(err) };
  }

  const outcome = await deps.pipeline.run(tx);
  if (outcome.kind === "confirmed") {
    logger.success(`Token account created: ${account.toBase58()}`);
  } else {
    logger.warn(`Token account creation ended as ${outcome.kind}`);
  }
  return { kind: "submitted", outcome };
}
