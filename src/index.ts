#!/usr/bin/env node
import { config as loadDotenv } from "dotenv";
import { runCli } from "./cli.js";

loadDotenv();

runCli(process.argv.slice(2), process.env).then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error("[MONITOR] Fatal:", err);
    process.exit(1);
  }
);
