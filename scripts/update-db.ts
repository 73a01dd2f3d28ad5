#!/usr/bin/env node
import "dotenv/config";
import { main } from "../server/cli";

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("[update-db] Fatal error:", error);
    process.exitCode = 1;
  });
