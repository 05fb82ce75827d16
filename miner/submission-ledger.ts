/**
 * Submission Ledger
 *
 * Persists every signed proof submission to SQLite so a restarted miner
 * never sends a second transaction for a round while an earlier one can
 * still land. Failed and expired submissions leave the round open.
 */

import Database from "better-sqlite3";
import * as fs from "fs";
import * as path from "path";
import type { SubmissionOutcome } from "./types";

export enum SubmissionStatus {
  SUBMITTING = "submitting", // Signed, handed to the pipeline
  CONFIRMED = "confirmed",
  REJECTED = "rejected",
  TIMED_OUT = "timed_out",
  STALE = "stale_round",
  FAILED = "submit_failed",
}

export interface SubmissionRecord {
  id: number;
  round: string; // decimal u64
  nonce: string; // decimal u128
  signature: string;
  status: SubmissionStatus;
  last_valid_block_height: number;
  reward: string | null;
  error_message: string | null;
  created_at: number; // unix timestamp
  updated_at: number; // unix timestamp
}

export interface LedgerStats {
  total: number;
  confirmed: number;
  rejected: number;
  timedOut: number;
  stale: number;
  failed: number;
}

const OUTCOME_STATUS: Record<SubmissionOutcome["kind"], SubmissionStatus> = {
  confirmed: SubmissionStatus.CONFIRMED,
  rejected: SubmissionStatus.REJECTED,
  timed_out: SubmissionStatus.TIMED_OUT,
  stale_round: SubmissionStatus.STALE,
  submit_failed: SubmissionStatus.FAILED,
};

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export class SubmissionLedger {
  private db: Database.Database;

  /** Pass ":memory:" for a throwaway ledger. */
  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS submissions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        round TEXT NOT NULL,
        nonce TEXT NOT NULL,
        signature TEXT NOT NULL UNIQUE,
        status TEXT NOT NULL DEFAULT 'submitting',
        last_valid_block_height INTEGER NOT NULL DEFAULT 0,
        reward TEXT,
        error_message TEXT,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      )
    `);

    // Ledgers written before the column existed
    const columns = this.db.prepare<[], { name: string }>("PRAGMA table_info(submissions)").all();
    if (!columns.some((c) => c.name === "last_valid_block_height")) {
      this.db.exec("ALTER TABLE submissions ADD COLUMN last_valid_block_height INTEGER NOT NULL DEFAULT 0");
    }

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_submissions_round ON submissions(round)
    `);
  }

  /**
   * Whether a submission for this round has landed or may still land.
   *
   * Confirmed rows always count. In-flight and timed-out rows count while
   * their blockhash is valid at `blockHeight`; without a height they count
   * unconditionally. Rejected, stale and failed rows never block a round.
   */
  hasSubmitted(round: bigint, blockHeight?: number): boolean {
    const row = this.db
      .prepare<[string, string, string, string, number | null, number | null], { count: number }>(`
        SELECT COUNT(*) AS count FROM submissions
        WHERE round = ?
          AND (status = ? OR (status IN (?, ?) AND (? IS NULL OR last_valid_block_height >= ?)))
      `)
      .get(
        round.toString(),
        SubmissionStatus.CONFIRMED,
        SubmissionStatus.SUBMITTING,
        SubmissionStatus.TIMED_OUT,
        blockHeight ?? null,
        blockHeight ?? null
      );
    return (row?.count ?? 0) > 0;
  }

  /** Resending identical bytes reopens the existing row. */
  recordSubmission(round: bigint, nonce: bigint, signature: string, lastValidBlockHeight: number): SubmissionRecord {
    const now = nowSeconds();
    this.db
      .prepare<[string, string, string, string, number, number, number]>(`
        INSERT INTO submissions (round, nonce, signature, status, last_valid_block_height, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(signature) DO UPDATE SET
          status = excluded.status,
          error_message = NULL,
          updated_at = excluded.updated_at
      `)
      .run(round.toString(), nonce.toString(), signature, SubmissionStatus.SUBMITTING, lastValidBlockHeight, now, now);

    const record = this.getBySignature(signature);
    if (!record) {
      throw new Error(`Submission ${signature} vanished after insert`);
    }
    return record;
  }

  recordOutcome(signature: string, outcome: SubmissionOutcome, reward?: bigint): void {
    let errorMessage: string | null = null;
    if (outcome.kind === "rejected") errorMessage = outcome.reason;
    if (outcome.kind === "submit_failed") errorMessage = outcome.error;

    this.db
      .prepare<[string, string | null, string | null, number, string]>(`
        UPDATE submissions
        SET status = ?, reward = COALESCE(?, reward), error_message = ?, updated_at = ?
        WHERE signature = ?
      `)
      .run(OUTCOME_STATUS[outcome.kind], reward?.toString() ?? null, errorMessage, nowSeconds(), signature);
  }

  getBySignature(signature: string): SubmissionRecord | null {
    const row = this.db
      .prepare<[string], SubmissionRecord>("SELECT * FROM submissions WHERE signature = ?")
      .get(signature);
    return row ?? null;
  }

  recent(limit: number = 20): SubmissionRecord[] {
    return this.db
      .prepare<[number], SubmissionRecord>("SELECT * FROM submissions ORDER BY id DESC LIMIT ?")
      .all(limit);
  }

  stats(): LedgerStats {
    const rows = this.db
      .prepare<[], { status: SubmissionStatus; count: number }>(
        "SELECT status, COUNT(*) AS count FROM submissions GROUP BY status"
      )
      .all();

    const count = (status: SubmissionStatus) => rows.find((r) => r.status === status)?.count ?? 0;
    return {
      total: rows.reduce((sum, r) => sum + r.count, 0),
      confirmed: count(SubmissionStatus.CONFIRMED),
      rejected: count(SubmissionStatus.REJECTED),
      timedOut: count(SubmissionStatus.TIMED_OUT),
      stale: count(SubmissionStatus.STALE),
      failed: count(SubmissionStatus.FAILED),
    };
  }

  close(): void {
    this.db.close();
  }
}
