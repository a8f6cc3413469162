#!/usr/bin/env node
import "dotenv/config";
import { main } from "./cli.js";

const { exitCode, running } = await main(process.argv.slice(2), process.env);

if (!running) {
  process.exit(exitCode);
} else {
  const shutdown = (signal: string) => {
    console.error(`[braintree-mcp] ${signal} received, shutting down`);
    running.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("[braintree-mcp] error during shutdown:", err);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}
