#!/usr/bin/env tsx

import { main } from "./index.js";

main(process.argv.slice(2))
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    console.error("Unexpected error:", error);
    process.exit(3);
  });
