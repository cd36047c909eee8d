#!/usr/bin/env node
import path from "path";
import { runCli } from "./app.js";
import { loadEnv } from "./env.js";

async function main(): Promise<void> {
  const env = await loadEnv(path.resolve(".env"), process.env);
  process.exitCode = await runCli(process.argv.slice(2), {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    env
  });
}

main().catch((error: unknown) => {
  process.stderr.write(`error: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
