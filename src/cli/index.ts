#!/usr/bin/env node
/**
 * CLI for the VoDy font site deploy
 */

import { main } from "./deploy.js";

main(process.argv.slice(2))
  .then((exitCode) => process.exit(exitCode))
  .catch((error) => {
    console.error("Deployment failed:", error);
    process.exit(1);
  });
