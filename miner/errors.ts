/**
 * Error taxonomy for the mining loop.
 *
 * Only ConfigError is fatal, and only at startup. Everything else degrades to
 * "skip to the next round" in the orchestrator.
 */

export class MinerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network hiccup, rate limit, node behind, timeout. Safe to retry. */
export class TransientNetworkError extends MinerError {}

/** The chain or the RPC node refused the transaction for good. */
export class PermanentRejectionError extends MinerError {
  readonly reason: string;

  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Transaction rejected: ${reason}`, options);
    this.reason = reason;
  }
}

export class StaleRoundError extends MinerError {
  readonly solutionRound: bigint;
  readonly currentRound: bigint;

  constructor(solutionRound: bigint, currentRound: bigint) {
    super(`Round advanced from #${solutionRound} to #${currentRound}`);
    this.solutionRound = solutionRound;
    this.currentRound = currentRound;
  }
}

export class DeadlineExceededError extends MinerError {}

export class EncodingError extends MinerError {}

export class ConfigError extends MinerError {}

// Substrings that mark a failure the chain will never accept on retry.
const PERMANENT_PATTERNS: RegExp[] = [
  /custom program error/i,
  /insufficient funds/i,
  /insufficient lamports/i,
  /invalid instruction data/i,
  /invalid account data/i,
  /signature verification fail/i,
  /already been processed/i,
  /error processing instruction/i,
];

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}

/** The node already holds a transaction with this signature. */
export function isAlreadyProcessed(err: PermanentRejectionError): boolean {
  return /already been processed/i.test(err.reason);
}

/**
 * Sort an RPC or web3.js failure into retryable or permanent.
 * Already-classified errors pass through unchanged.
 */
export function classifyRpcError(
  err: unknown
): TransientNetworkError | PermanentRejectionError {
  if (err instanceof TransientNetworkError || err instanceof PermanentRejectionError) {
    return err;
  }

  const message = describeError(err);
  const logs = extractLogs(err);
  const haystack = [message, ...logs].join("\n");

  if (PERMANENT_PATTERNS.some((pattern) => pattern.test(haystack))) {
    return new PermanentRejectionError(message, { cause: err });
  }
  return new TransientNetworkError(message, { cause: err });
}

// SendTransactionError carries program logs next to the message.
function extractLogs(err: unknown): string[] {
  if (typeof err !== "object" || err === null || !("logs" in err)) {
    return [];
  }
  const logs = err.logs;
  if (!Array.isArray(logs)) return [];
  return logs.filter((line): line is string => typeof line === "string");
}
