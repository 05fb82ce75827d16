/**
 * Miner configuration
 *
 * Read from miner-config.json (--local) or miner-config-devnet.json next to
 * the project root, or from --config <path>. Environment variables override
 * the file; command-line flags override both.
 */

import { Keypair, PublicKey } from "@solana/web3.js";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { z } from "zod";
import { ConfigError, describeError } from "./errors";

const base58Key = z.string().refine(
  (value) => {
    try {
      new PublicKey(value);
      return true;
    } catch {
      return false;
    }
  },
  { message: "Not a valid base58 public key" }
);

export const MinerConfigSchema = z
  .object({
    rpc_url: z.string().url(),
    wallet_path: z.string().min(1),
    program_id: base58Key,
    mint: base58Key,
    commitment: z.enum(["processed", "confirmed", "finalized"]).default("confirmed"),
    threads: z.number().int().min(0).default(0).describe("0 uses every available core"),
    priority_fee_percentile: z.number().min(0).max(100).default(50),
    max_priority_fee: z.number().int().min(0).default(100_000),
    compute_unit_limit: z.number().int().positive().default(400_000),
    dynamic_compute_units: z.boolean().default(false),
    compute_unit_margin: z.number().int().min(0).default(1_000),
    simulation_retries: z.number().int().min(0).default(4),
    rpc_timeout_ms: z.number().int().positive().default(15_000),
    confirm_timeout_ms: z.number().int().positive().default(60_000),
    poll_interval_ms: z.number().int().positive().default(2_000),
    retry_cap: z.number().int().min(0).default(4),
    skip_claim_confirm: z.boolean().default(false).describe("Report a claim done once the node accepts it"),
    backoff_base_ms: z.number().int().min(0).default(2_000),
    backoff_max_ms: z.number().int().min(0).default(16_000),
    max_staleness_ms: z.number().int().positive().default(30_000),
    search_window_ms: z.number().int().positive().default(60_000),
    round_watch_interval_ms: z.number().int().min(0).default(5_000),
    idle_delay_ms: z.number().int().min(0).default(5_000),
    ledger_path: z.string().min(1).default("data/submissions.db"),
    verbose: z.boolean().default(false),
  })
  .strict();

export type MinerConfigFile = z.input<typeof MinerConfigSchema>;

export interface MinerConfig {
  rpcUrl: string;
  walletPath: string;
  programId: PublicKey;
  mint: PublicKey;
  commitment: "processed" | "confirmed" | "finalized";
  threads: number;
  priorityFeePercentile: number;
  maxPriorityFee: number;
  computeUnitLimit: number;
  dynamicComputeUnits: boolean;
  computeUnitMargin: number;
  simulationRetries: number;
  rpcTimeoutMs: number;
  confirmTimeoutMs: number;
  pollIntervalMs: number;
  retryCap: number;
  skipClaimConfirm: boolean;
  backoffBaseMs: number;
  backoffMaxMs: number;
  maxStalenessMs: number;
  searchWindowMs: number;
  roundWatchIntervalMs: number;
  idleDelayMs: number;
  ledgerPath: string;
  verbose: boolean;
}

export interface CliFlags {
  local?: boolean;
  configPath?: string;
  threads?: number;
  verbose?: boolean;
}

type Env = Record<string, string | undefined>;

function expandHome(p: string): string {
  return p.startsWith("~/") ? path.join(os.homedir(), p.slice(2)) : p;
}

function envNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Validate raw config JSON and apply environment and flag overrides.
 * Relative paths resolve against `baseDir`.
 */
export function parseMinerConfig(raw: unknown, env: Env = {}, flags: CliFlags = {}, baseDir = process.cwd()): MinerConfig {
  const merged: Record<string, unknown> = typeof raw === "object" && raw !== null ? { ...raw } : {};

  if (env.MINER_RPC_URL) merged.rpc_url = env.MINER_RPC_URL;
  if (env.MINER_WALLET_PATH) merged.wallet_path = env.MINER_WALLET_PATH;
  const envThreads = envNumber(env, "MINER_THREADS");
  if (envThreads !== undefined) merged.threads = envThreads;
  const envMaxFee = envNumber(env, "MINER_MAX_PRIORITY_FEE");
  if (envMaxFee !== undefined) merged.max_priority_fee = envMaxFee;
  if (env.MINER_VERBOSE) merged.verbose = env.MINER_VERBOSE === "true";

  if (flags.threads !== undefined) merged.threads = flags.threads;
  if (flags.verbose) merged.verbose = true;

  const parsed = MinerConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid miner config: ${issues}`);
  }
  const c = parsed.data;

  return {
    rpcUrl: c.rpc_url,
    walletPath: path.resolve(baseDir, expandHome(c.wallet_path)),
    programId: new PublicKey(c.program_id),
    mint: new PublicKey(c.mint),
    commitment: c.commitment,
    threads: c.threads,
    priorityFeePercentile: c.priority_fee_percentile,
    maxPriorityFee: c.max_priority_fee,
    computeUnitLimit: c.compute_unit_limit,
    dynamicComputeUnits: c.dynamic_compute_units,
    computeUnitMargin: c.compute_unit_margin,
    simulationRetries: c.simulation_retries,
    rpcTimeoutMs: c.rpc_timeout_ms,
    confirmTimeoutMs: c.confirm_timeout_ms,
    pollIntervalMs: c.poll_interval_ms,
    retryCap: c.retry_cap,
    skipClaimConfirm: c.skip_claim_confirm,
    backoffBaseMs: c.backoff_base_ms,
    backoffMaxMs: c.backoff_max_ms,
    maxStalenessMs: c.max_staleness_ms,
    searchWindowMs: c.search_window_ms,
    roundWatchIntervalMs: c.round_watch_interval_ms,
    idleDelayMs: c.idle_delay_ms,
    ledgerPath: path.resolve(baseDir, expandHome(c.ledger_path)),
    verbose: c.verbose,
  };
}

export function resolveConfigPath(flags: CliFlags, projectRoot: string): string {
  if (flags.configPath) return path.resolve(flags.configPath);
  return path.join(projectRoot, flags.local ? "miner-config.json" : "miner-config-devnet.json");
}

export function loadMinerConfig(flags: CliFlags, projectRoot: string, env: Env = process.env): MinerConfig {
  const configPath = resolveConfigPath(flags, projectRoot);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot read config ${configPath}: ${describeError(err)}`, { cause: err });
  }
  return parseMinerConfig(raw, env, flags, path.dirname(configPath));
}

/** Solana CLI keypair file: a JSON array of 64 secret key bytes. */
export function loadKeypair(walletPath: string): Keypair {
  let bytes: unknown;
  try {
    bytes = JSON.parse(fs.readFileSync(walletPath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot read wallet ${walletPath}: ${describeError(err)}`, { cause: err });
  }
  const secret = z.array(z.number().int().min(0).max(255)).length(64).safeParse(bytes);
  if (!secret.success) {
    throw new ConfigError(`Wallet ${walletPath} is not a 64-byte secret key array`);
  }
  return Keypair.fromSecretKey(new Uint8Array(secret.data));
}
