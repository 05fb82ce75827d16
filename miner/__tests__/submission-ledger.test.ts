import Database from "better-sqlite3";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SubmissionLedger, SubmissionStatus } from "../submission-ledger";

describe("SubmissionLedger", () => {
  let ledger: SubmissionLedger;

  beforeEach(() => {
    ledger = new SubmissionLedger(":memory:");
  });

  afterEach(() => {
    ledger.close();
  });

  it("records a submission as in flight", () => {
    const record = ledger.recordSubmission(7n, (1n << 100n) + 3n, "sig-a", 1_000);

    expect(record).toMatchObject({
      round: "7",
      nonce: "1267650600228229401496703205379",
      signature: "sig-a",
      status: SubmissionStatus.SUBMITTING,
      last_valid_block_height: 1_000,
      reward: null,
      error_message: null,
    });
    expect(ledger.hasSubmitted(7n)).toBe(true);
    expect(ledger.hasSubmitted(8n)).toBe(false);
  });

  it("stores the outcome and reward", () => {
    ledger.recordSubmission(7n, 1n, "sig-a", 1_000);

    ledger.recordOutcome("sig-a", { kind: "confirmed", signature: "sig-a", slot: 40 }, 250n);

    expect(ledger.getBySignature("sig-a")).toMatchObject({
      status: SubmissionStatus.CONFIRMED,
      reward: "250",
      error_message: null,
    });
  });

  it("keeps the rejection reason", () => {
    ledger.recordSubmission(7n, 1n, "sig-a", 1_000);
    ledger.recordSubmission(8n, 2n, "sig-b", 1_000);

    ledger.recordOutcome("sig-a", { kind: "rejected", reason: "custom program error: 0x1" });
    ledger.recordOutcome("sig-b", { kind: "submit_failed", attempts: 5, error: "timeout" });

    expect(ledger.getBySignature("sig-a")?.error_message).toBe("custom program error: 0x1");
    expect(ledger.getBySignature("sig-b")).toMatchObject({
      status: SubmissionStatus.FAILED,
      error_message: "timeout",
    });
  });

  it("reopens the row when the same transaction is sent again", () => {
    ledger.recordSubmission(7n, 1n, "sig-a", 1_000);
    ledger.recordOutcome("sig-a", { kind: "submit_failed", attempts: 2, error: "timeout" });

    const record = ledger.recordSubmission(7n, 1n, "sig-a", 1_000);

    expect(record).toMatchObject({ status: SubmissionStatus.SUBMITTING, error_message: null });
    expect(ledger.stats().total).toBe(1);
  });

  it("leaves a round open after a failed, rejected or stale submission", () => {
    ledger.recordSubmission(7n, 1n, "sig-a", 1_000);
    ledger.recordSubmission(7n, 2n, "sig-b", 1_000);
    ledger.recordSubmission(7n, 3n, "sig-c", 1_000);

    ledger.recordOutcome("sig-a", { kind: "submit_failed", attempts: 2, error: "timeout" });
    ledger.recordOutcome("sig-b", { kind: "rejected", reason: "blockhash expired before the transaction landed" });
    ledger.recordOutcome("sig-c", { kind: "stale_round", solutionRound: 7n, currentRound: 8n });

    expect(ledger.hasSubmitted(7n)).toBe(false);
    expect(ledger.hasSubmitted(7n, 500)).toBe(false);
  });

  it("keeps a timed-out round closed until its blockhash expires", () => {
    ledger.recordSubmission(7n, 1n, "sig-a", 1_000);
    ledger.recordOutcome("sig-a", { kind: "timed_out", signature: "sig-a" });

    expect(ledger.hasSubmitted(7n)).toBe(true);
    expect(ledger.hasSubmitted(7n, 1_000)).toBe(true);
    expect(ledger.hasSubmitted(7n, 1_001)).toBe(false);
  });

  it("treats an in-flight row left by a crash like a timed-out one", () => {
    ledger.recordSubmission(7n, 1n, "sig-a", 1_000);

    expect(ledger.hasSubmitted(7n, 900)).toBe(true);
    expect(ledger.hasSubmitted(7n, 1_001)).toBe(false);
  });

  it("keeps a confirmed round closed for good", () => {
    ledger.recordSubmission(7n, 1n, "sig-a", 1_000);
    ledger.recordOutcome("sig-a", { kind: "confirmed", signature: "sig-a", slot: 40 });

    expect(ledger.hasSubmitted(7n, 5_000)).toBe(true);
  });

  it("lists the newest submissions first", () => {
    ledger.recordSubmission(1n, 1n, "sig-1", 1_000);
    ledger.recordSubmission(2n, 2n, "sig-2", 1_000);
    ledger.recordSubmission(3n, 3n, "sig-3", 1_000);

    expect(ledger.recent(2).map((r) => r.signature)).toEqual(["sig-3", "sig-2"]);
  });

  it("counts submissions by status", () => {
    ledger.recordSubmission(1n, 1n, "sig-1", 1_000);
    ledger.recordSubmission(2n, 2n, "sig-2", 1_000);
    ledger.recordSubmission(3n, 3n, "sig-3", 1_000);
    ledger.recordSubmission(4n, 4n, "sig-4", 1_000);
    ledger.recordOutcome("sig-1", { kind: "confirmed", signature: "sig-1", slot: 1 });
    ledger.recordOutcome("sig-2", { kind: "timed_out", signature: "sig-2" });
    ledger.recordOutcome("sig-3", { kind: "stale_round", solutionRound: 3n, currentRound: 4n });

    expect(ledger.stats()).toEqual({ total: 4, confirmed: 1, rejected: 0, timedOut: 1, stale: 1, failed: 0 });
  });

  it("remembers submissions across reopen", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "ledger-"));
    const dbPath = path.join(dir, "nested", "submissions.db");
    try {
      const first = new SubmissionLedger(dbPath);
      first.recordSubmission(11n, 5n, "sig-x", 1_000);
      first.close();

      const reopened = new SubmissionLedger(dbPath);
      expect(reopened.hasSubmitted(11n)).toBe(true);
      reopened.close();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("adds the block height column to a ledger written without it", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "ledger-"));
    const dbPath = path.join(dir, "submissions.db");
    try {
      const old = new Database(dbPath);
      old.exec(`
        CREATE TABLE submissions (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          round TEXT NOT NULL,
          nonce TEXT NOT NULL,
          signature TEXT NOT NULL UNIQUE,
          status TEXT NOT NULL DEFAULT 'submitting',
          reward TEXT,
          error_message TEXT,
          created_at INTEGER NOT NULL,
          updated_at INTEGER NOT NULL
        )
      `);
      old
        .prepare("INSERT INTO submissions (round, nonce, signature, created_at, updated_at) VALUES (?, ?, ?, 0, 0)")
        .run("4", "1", "sig-old");
      old.close();

      const upgraded = new SubmissionLedger(dbPath);
      expect(upgraded.getBySignature("sig-old")?.last_valid_block_height).toBe(0);
      expect(upgraded.hasSubmitted(4n)).toBe(true);
      expect(upgraded.hasSubmitted(4n, 1)).toBe(false);
      upgraded.close();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
