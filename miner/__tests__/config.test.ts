import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadKeypair, loadMinerConfig, parseMinerConfig, resolveConfigPath } from "../config";
import { ConfigError } from "../errors";
import { minerKeypair, mint, programId } from "./helpers";

const raw = {
  rpc_url: "http://127.0.0.1:8899",
  wallet_path: "keys/id.json",
  program_id: programId.toBase58(),
  mint: mint.toBase58(),
};

describe("parseMinerConfig", () => {
  it("fills in defaults and resolves paths against the config directory", () => {
    const config = parseMinerConfig(raw, {}, {}, "/srv/miner");

    expect(config).toMatchObject({
      rpcUrl: "http://127.0.0.1:8899",
      walletPath: "/srv/miner/keys/id.json",
      ledgerPath: "/srv/miner/data/submissions.db",
      commitment: "confirmed",
      threads: 0,
      maxPriorityFee: 100_000,
      computeUnitLimit: 400_000,
      retryCap: 4,
      backoffBaseMs: 2_000,
      backoffMaxMs: 16_000,
      confirmTimeoutMs: 60_000,
      skipClaimConfirm: false,
      verbose: false,
    });
    expect(config.programId.equals(programId)).toBe(true);
  });

  it("reads the claim confirmation switch", () => {
    expect(parseMinerConfig({ ...raw, skip_claim_confirm: true }).skipClaimConfirm).toBe(true);
    expect(() => parseMinerConfig({ ...raw, skip_claim_confirm: "yes" })).toThrow(/skip_claim_confirm/);
  });

  it("expands a home-relative wallet path", () => {
    const config = parseMinerConfig({ ...raw, wallet_path: "~/.config/solana/id.json" }, {}, {}, "/srv/miner");

    expect(config.walletPath).toBe(path.join(os.homedir(), ".config/solana/id.json"));
  });

  it("lets the environment override the file and flags override both", () => {
    const env = {
      MINER_RPC_URL: "http://10.0.0.5:8899",
      MINER_THREADS: "8",
      MINER_MAX_PRIORITY_FEE: "2500",
      MINER_VERBOSE: "true",
    };

    expect(parseMinerConfig(raw, env, {}, "/srv")).toMatchObject({
      rpcUrl: "http://10.0.0.5:8899",
      threads: 8,
      maxPriorityFee: 2_500,
      verbose: true,
    });
    expect(parseMinerConfig(raw, env, { threads: 2 }, "/srv").threads).toBe(2);
  });

  it("rejects a non-numeric environment value", () => {
    expect(() => parseMinerConfig(raw, { MINER_THREADS: "lots" })).toThrow(
      'MINER_THREADS must be a number, got "lots"'
    );
  });

  it("names the offending field", () => {
    expect(() => parseMinerConfig({ ...raw, program_id: "not-a-key" })).toThrow(
      "Invalid miner config: program_id: Not a valid base58 public key"
    );
    expect(() => parseMinerConfig({ ...raw, retry_cap: -1 })).toThrow(/^Invalid miner config: retry_cap: /);
  });

  it("rejects unknown keys", () => {
    expect(() => parseMinerConfig({ ...raw, gpu: true })).toThrow(ConfigError);
  });

  it("rejects a config that is not an object", () => {
    expect(() => parseMinerConfig("rpc")).toThrow(/rpc_url: Required/);
  });
});

describe("config files", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "miner-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("picks the local or devnet file from the project root", () => {
    expect(resolveConfigPath({ local: true }, "/srv/app")).toBe("/srv/app/miner-config.json");
    expect(resolveConfigPath({}, "/srv/app")).toBe("/srv/app/miner-config-devnet.json");
    expect(resolveConfigPath({ configPath: "/etc/miner.json", local: true }, "/srv/app")).toBe("/etc/miner.json");
  });

  it("loads a config file and the wallet it points at", () => {
    fs.writeFileSync(path.join(dir, "miner-config.json"), JSON.stringify(raw));
    fs.mkdirSync(path.join(dir, "keys"));
    fs.writeFileSync(path.join(dir, "keys", "id.json"), JSON.stringify(Array.from(minerKeypair.secretKey)));

    const config = loadMinerConfig({ local: true }, dir, {});
    const keypair = loadKeypair(config.walletPath);

    expect(config.walletPath).toBe(path.join(dir, "keys", "id.json"));
    expect(keypair.publicKey.equals(minerKeypair.publicKey)).toBe(true);
  });

  it("reports a missing config file", () => {
    expect(() => loadMinerConfig({}, dir, {})).toThrow(ConfigError);
  });

  it("rejects a wallet that is not 64 bytes", () => {
    const walletPath = path.join(dir, "short.json");
    fs.writeFileSync(walletPath, JSON.stringify([1, 2, 3]));

    expect(() => loadKeypair(walletPath)).toThrow(`Wallet ${walletPath} is not a 64-byte secret key array`);
  });

  it("accepts the bundled config files", () => {
    const projectRoot = path.resolve(__dirname, "..", "..");

    expect(loadMinerConfig({ local: true }, projectRoot, {}).rpcUrl).toBe("http://127.0.0.1:8899");
    expect(loadMinerConfig({}, projectRoot, {}).commitment).toBe("confirmed");
  });
});
