/**
 * Parallel nonce search.
 *
 * Each worker owns a disjoint stripe of the nonce space. Workers share a
 * single control block: a stop flag broadcast to everyone, and a winner slot
 * that exactly one worker can claim. No other state is shared, and nothing
 * survives between two calls to `search`.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { Worker } from "worker_threads";
import { Logger, silentLogger } from "./logger";
import {
  CONTROL_SLOTS,
  CONTROL_STOP,
  StripeJob,
  StripeResult,
  U64_MAX,
  computeHash,
  meetsTarget,
  searchStripe,
} from "./pow-hash";
import type { ProofStateSnapshot, SearchResult } from "./types";

export interface SearchOptions {
  workerCount: number;
  /** Epoch milliseconds. */
  deadline: number;
  signal?: AbortSignal;
  startNonce?: bigint;
  /** Inclusive upper bound; reaching it is exhaustion, not an error. */
  maxNonce?: bigint;
}

/** Runs one stripe of the search somewhere and reports how it ended. */
export interface StripeRunner {
  run(job: StripeJob, control: SharedArrayBuffer): Promise<StripeResult>;
}

function resolveWorkerScript(): { file: string; execArgv: string[] } {
  const compiled = path.join(__dirname, "hash-worker.js");
  if (fs.existsSync(compiled)) {
    return { file: compiled, execArgv: [] };
  }
  // Running from sources through ts-node
  return {
    file: path.join(__dirname, "hash-worker.ts"),
    execArgv: ["--require", "ts-node/register/transpile-only"],
  };
}

export class ThreadStripeRunner implements StripeRunner {
  private script = resolveWorkerScript();

  run(job: StripeJob, control: SharedArrayBuffer): Promise<StripeResult> {
    return new Promise((resolve, reject) => {
      let settled = false;
      const worker = new Worker(this.script.file, {
        workerData: { job, control },
        execArgv: this.script.execArgv,
      });

      worker.once("message", (result: StripeResult) => {
        settled = true;
        resolve(result);
      });
      worker.once("error", (err) => {
        settled = true;
        reject(err);
      });
      worker.once("exit", (code) => {
        if (!settled) {
          reject(new Error(`Hash worker ${job.workerIndex} exited with code ${code}`));
        }
      });
    });
  }
}

/** Same stripe loop on the calling thread; one stripe at a time. */
export class InlineStripeRunner implements StripeRunner {
  async run(job: StripeJob, control: SharedArrayBuffer): Promise<StripeResult> {
    return searchStripe(job, new Int32Array(control));
  }
}

export function defaultWorkerCount(): number {
  return Math.max(1, os.availableParallelism());
}

export class HashSearchEngine {
  private runner: StripeRunner;
  private minerPubkey: Buffer;
  private logger: Logger;

  constructor(minerPubkey: Buffer, runner: StripeRunner = new ThreadStripeRunner(), logger: Logger = silentLogger) {
    if (minerPubkey.length !== 32) {
      throw new RangeError(`Miner pubkey must be 32 bytes, got ${minerPubkey.length}`);
    }
    this.minerPubkey = minerPubkey;
    this.runner = runner;
    this.logger = logger;
  }

  async search(snapshot: ProofStateSnapshot, options: SearchOptions): Promise<SearchResult> {
    const workerCount = Math.max(1, Math.floor(options.workerCount));
    const startNonce = options.startNonce ?? 0n;
    const maxNonce = options.maxNonce ?? U64_MAX;
    const startedAt = Date.now();

    const control = new SharedArrayBuffer(CONTROL_SLOTS * Int32Array.BYTES_PER_ELEMENT);
    const flags = new Int32Array(control);
    const stop = () => Atomics.store(flags, CONTROL_STOP, 1);

    if (options.signal?.aborted) stop();
    options.signal?.addEventListener("abort", stop, { once: true });
    const deadlineTimer = setTimeout(stop, Math.max(0, options.deadline - startedAt));

    this.logger.debug(
      `Searching round #${snapshot.round} with ${workerCount} worker(s), nonces ${startNonce}..${maxNonce}`
    );

    let results: StripeResult[];
    try {
      results = await Promise.all(
        Array.from({ length: workerCount }, (_, workerIndex) =>
          this.runner
            .run(
              {
                challenge: snapshot.challenge,
                minerPubkey: this.minerPubkey,
                round: snapshot.round,
                target: snapshot.target,
                workerIndex,
                workerCount,
                startNonce,
                maxNonce,
                deadline: options.deadline,
              },
              control
            )
            .catch((err: unknown) => {
              // Halt the siblings before the failure propagates
              stop();
              throw err;
            })
        )
      );
    } finally {
      clearTimeout(deadlineTimer);
      options.signal?.removeEventListener("abort", stop);
    }

    const hashes = results.reduce((sum, r) => sum + r.hashes, 0);
    const elapsedMs = Math.max(1, Date.now() - startedAt);
    const stats = { hashes, elapsedMs, hashrate: hashes / (elapsedMs / 1000) / 1_000_000 };

    const winner = results.find(
      (r): r is Extract<StripeResult, { kind: "found" }> => r.kind === "found"
    );
    if (winner) {
      const hash = computeHash(snapshot.challenge, this.minerPubkey, winner.nonce, snapshot.round);
      if (!meetsTarget(hash, snapshot.target)) {
        throw new Error(`Worker reported nonce ${winner.nonce} which does not meet the target`);
      }
      return { kind: "found", solution: { round: snapshot.round, nonce: winner.nonce, hash }, stats };
    }

    let reason: "deadline" | "exhausted" | "cancelled" = "exhausted";
    if (options.signal?.aborted) {
      reason = "cancelled";
    } else if (results.some((r) => r.kind === "deadline") || Date.now() >= options.deadline) {
      reason = "deadline";
    } else if (results.some((r) => r.kind === "cancelled")) {
      reason = "cancelled";
    }
    return { kind: "not_found", reason, stats };
  }
}
