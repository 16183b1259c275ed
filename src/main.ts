#!/usr/bin/env node
import { runCli } from "./cli.js";
import { createFileBackedService } from "./pomodoro.js";

async function main() {
  const service = createFileBackedService();
  process.exitCode = await runCli(process.argv.slice(2), { service });
}

main().catch(error => {
  console.error("marinara failed", error);
  process.exit(1);
});
