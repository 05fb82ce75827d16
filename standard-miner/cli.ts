#!/usr/bin/env node
/**
 * pow-miner CLI
 *
 * Usage:
 *   pow-miner mine  [--local] [--config <path>] [--threads <n>] [--verbose]
 *   pow-miner claim [--local] [--config <path>] [--amount <base units>]
 */

import * as path from "path";
import { CliFlags, loadKeypair, loadMinerConfig } from "../miner/config";
import { ConfigError, describeError } from "../miner/errors";
import { Logger } from "../miner/logger";
import { runClaimRewards } from "./claim-rewards";
import { runContinuousMiner } from "./continuous-miner";

const USAGE = `Usage:
  pow-miner mine  [--local] [--config <path>] [--threads <n>] [--verbose]
  pow-miner claim [--local] [--config <path>] [--amount <base units>]`;

interface ParsedArgs {
  command: string | undefined;
  flags: CliFlags;
  amount?: bigint;
}

function parseArgs(argv: string[]): ParsedArgs {
  const [command, ...rest] = argv;
  const flags: CliFlags = {};
  let amount: bigint | undefined;

  const valueAfter = (i: number, name: string): string => {
    const value = rest[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new ConfigError(`${name} needs a value`);
    }
    return value;
  };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    switch (arg) {
      case "--local":
        flags.local = true;
        break;
      case "--verbose":
        flags.verbose = true;
        break;
      case "--config":
        flags.configPath = valueAfter(i++, arg);
        break;
      case "--threads": {
        const threads = Number(valueAfter(i++, arg));
        if (!Number.isInteger(threads) || threads < 0) {
          throw new ConfigError("--threads must be a non-negative integer");
        }
        flags.threads = threads;
        break;
      }
      case "--amount": {
        const raw = valueAfter(i++, arg);
        if (!/^\d+$/.test(raw)) {
          throw new ConfigError("--amount must be a whole number of base units");
        }
        amount = BigInt(raw);
        break;
      }
      default:
        throw new ConfigError(`Unknown option ${arg}`);
    }
  }

  return { command, flags, amount };
}

async function main(): Promise<number> {
  const { command, flags, amount } = parseArgs(process.argv.slice(2));
  if (command !== "mine" && command !== "claim") {
    console.log(USAGE);
    return command === undefined || command === "help" || command === "--help" ? 0 : 1;
  }

  // Config files live at the project root, one level above this directory
  const parent = path.resolve(__dirname, "..");
  const projectRoot = path.basename(parent) === "dist" ? path.dirname(parent) : parent;
  const config = loadMinerConfig(flags, projectRoot);
  const logger = new Logger(config.verbose);
  logger.info(`Using config: ${flags.configPath ?? (flags.local ? "localhost" : "devnet")}`);
  const keypair = loadKeypair(config.walletPath);

  if (command === "mine") {
    await runContinuousMiner(config, keypair, logger);
    return 0;
  }
  return (await runClaimRewards(config, keypair, logger, amount)) ? 0 : 1;
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    if (err instanceof ConfigError) {
      console.error(`❌ ${err.message}`);
      console.error(USAGE);
    } else {
      console.error(`❌ ${describeError(err)}`);
    }
    process.exit(1);
  });
