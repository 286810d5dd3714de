#!/usr/bin/env node

/**
 * sta-summary command-line entry point
 */

import dotenv from "dotenv";
dotenv.config();

import { runCli } from "./cli.js";
import { loadConfig } from "./config.js";

async function main() {
  const code = await runCli(process.argv.slice(2), loadConfig());
  process.exitCode = code;
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
