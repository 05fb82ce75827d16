/**
 * Proof-of-work hashing shared by the search engine and its worker threads.
 *
 * hash = SHA256(challenge || miner_pubkey || nonce || round)
 * Format: 32 + 32 + 16 (u128 LE) + 8 (u64 LE) = 88 bytes
 */

import * as crypto from "crypto";

export const U128_MAX = (1n << 128n) - 1n;
export const U64_MAX = (1n << 64n) - 1n;

// Shared control block layout (Int32Array over a SharedArrayBuffer)
export const CONTROL_STOP = 0;
export const CONTROL_WINNER = 1;
export const CONTROL_SLOTS = 2;

/** Stop flag and deadline are checked once per this many nonces. */
export const CHECK_INTERVAL = 1024;

export function computeHash(
  challenge: Uint8Array,
  minerPubkey: Uint8Array,
  nonce: bigint,
  round: bigint
): Buffer {
  const hasher = crypto.createHash("sha256");
  hasher.update(challenge);
  hasher.update(minerPubkey);
  hasher.update(encodeNonceAndRound(nonce, round));
  return hasher.digest();
}

function encodeNonceAndRound(nonce: bigint, round: bigint): Buffer {
  const tail = Buffer.alloc(24);
  tail.writeBigUInt64LE(nonce & U64_MAX, 0); // low 8 bytes
  tail.writeBigUInt64LE(nonce >> 64n, 8); // high 8 bytes
  tail.writeBigUInt64LE(round, 16);
  return tail;
}

export function difficultyToTarget(difficulty: bigint): bigint {
  if (difficulty <= 0n) {
    throw new RangeError(`Difficulty must be positive, got ${difficulty}`);
  }
  return U128_MAX / difficulty;
}

/** Leading 16 bytes of the hash as an unsigned little-endian u128. */
export function hashValue(hash: Uint8Array): bigint {
  const view = Buffer.from(hash.buffer, hash.byteOffset, hash.byteLength);
  return view.readBigUInt64LE(0) | (view.readBigUInt64LE(8) << 64n);
}

/** Strictly below the target, as the program checks it. */
export function meetsTarget(hash: Uint8Array, target: bigint): boolean {
  return hashValue(hash) < target;
}

export interface StripeJob {
  challenge: Uint8Array;
  minerPubkey: Uint8Array;
  round: bigint;
  target: bigint;
  workerIndex: number;
  workerCount: number;
  startNonce: bigint;
  maxNonce: bigint;
  /** Epoch milliseconds after which the worker gives up. */
  deadline: number;
}

export type StripeResult =
  | { kind: "found"; nonce: bigint; hash: Uint8Array; hashes: number }
  | { kind: "exhausted"; hashes: number }
  | { kind: "deadline"; hashes: number }
  | { kind: "cancelled"; hashes: number };

/**
 * Enumerate nonces start + i, start + i + N, ... for worker i of N.
 *
 * A worker that finds a valid hash must win the winner slot by
 * compare-and-exchange before it may report it; losers report "cancelled".
 */
export function searchStripe(job: StripeJob, control: Int32Array): StripeResult {
  const prefix = Buffer.concat([job.challenge, job.minerPubkey]);
  const step = BigInt(job.workerCount);
  let nonce = job.startNonce + BigInt(job.workerIndex);
  let hashes = 0;

  while (nonce <= job.maxNonce) {
    if (hashes % CHECK_INTERVAL === 0) {
      if (Atomics.load(control, CONTROL_STOP) !== 0) {
        return { kind: "cancelled", hashes };
      }
      if (Date.now() >= job.deadline) {
        return { kind: "deadline", hashes };
      }
    }

    const hash = crypto
      .createHash("sha256")
      .update(prefix)
      .update(encodeNonceAndRound(nonce, job.round))
      .digest();
    hashes++;

    if (meetsTarget(hash, job.target)) {
      const claimed = Atomics.compareExchange(control, CONTROL_WINNER, 0, job.workerIndex + 1);
      Atomics.store(control, CONTROL_STOP, 1);
      if (claimed !== 0) {
        return { kind: "cancelled", hashes };
      }
      return { kind: "found", nonce, hash, hashes };
    }

    nonce += step;
  }

  return { kind: "exhausted", hashes };
}
