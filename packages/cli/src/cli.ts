#!/usr/bin/env node
import { runViewmarkCli } from "./viewmarkCli.js";

async function main() {
  try {
    process.exitCode = await runViewmarkCli(process.argv.slice(2));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`viewmark failed: ${message}\n`);
    process.exitCode = 1;
  }
}

void main();
