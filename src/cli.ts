#!/usr/bin/env node
import { errorMessage, EXIT_CODES } from "./errors.js";
import { main } from "./cli/main.js";

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(`Internal error: ${errorMessage(err)}`);
    process.exit(EXIT_CODES.internal);
  }
);
