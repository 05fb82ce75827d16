/**
 * One-shot claim of accumulated mining rewards, outside the search loop.
 */

import type { Signer } from "@solana/web3.js";
import type { ProgramAddresses } from "./accounts";
import type { ChainClient } from "./chain-client";
import { describeError } from "./errors";
import { Logger, silentLogger } from "./logger";
import type { ProofState } from "./proof-state";
import type { SubmissionPipeline } from "./submission-pipeline";
import type { TransactionBuilder } from "./transaction-builder";
import type { SignedTransaction, SubmissionOutcome } from "./types";

export interface ClaimDeps {
  addresses: ProgramAddresses;
  signer: Signer;
  client: ChainClient;
  proofState: ProofState;
  builder: TransactionBuilder;
  pipeline: SubmissionPipeline;
  logger?: Logger;
}

export type ClaimResult =
  | { kind: "nothing_to_claim" }
  | { kind: "failed"; error: string }
  | { kind: "submitted"; amount: bigint; outcome: SubmissionOutcome };

/** Claims `amount`, or everything claimable when omitted. */
export async function claimRewards(deps: ClaimDeps, amount?: bigint): Promise<ClaimResult> {
  const logger = deps.logger ?? silentLogger;

  let claimable: bigint;
  try {
    claimable = (await deps.proofState.refresh()).claimable;
  } catch (err) {
    return { kind: "failed", error: `Could not read claimable rewards: ${describeError(err)}` };
  }

  const requested = amount ?? claimable;
  if (requested <= 0n || claimable === 0n) {
    logger.info("Nothing to claim");
    return { kind: "nothing_to_claim" };
  }
  if (requested > claimable) {
    return { kind: "failed", error: `Requested ${requested} but only ${claimable} is claimable` };
  }

  logger.info(`🪙 Claiming ${requested} to ${deps.addresses.minerTokenAccount.toBase58()}`);

  let tx: SignedTransaction;
  try {
    const fee = await deps.client.fetchFeeHint([deps.addresses.minerStats]);
    tx = deps.builder.buildClaim(requested, fee, deps.signer);
  } catch (err) {
    return { kind: "failed", error: describeError(err) };
  }

  const outcome = await deps.pipeline.run(tx);
  if (outcome.kind === "confirmed") {
    logger.success(`Claimed ${requested}`);
    logger.info(`   TX: ${outcome.signature}`);
  } else {
    logger.error(`Claim ended as ${outcome.kind}`);
  }
  return { kind: "submitted", amount: requested, outcome };
}
