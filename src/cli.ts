#!/usr/bin/env node
import process from "node:process";
import { runCli } from "./commands.js";
import { logger } from "./logger.js";

async function main(): Promise<void> {
  try {
    process.exitCode = await runCli(process.argv.slice(2));
  } catch (error) {
    logger.error("guardian-mcp failed unexpectedly", "cli", { error });
    process.exitCode = 1;
  }
}

void main();
