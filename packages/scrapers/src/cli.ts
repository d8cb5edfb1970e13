#!/usr/bin/env node
/**
 * VCT calendar CLI
 *
 * Usage:
 *   vct-calendar                                  # scrape the active stage into vct-2026.ics
 *   vct-calendar --stage masters --append         # add new Masters matches to the file
 *   vct-calendar --stage kickoff --save-stage     # also write calendars/kickoff.ics
 *   vct-calendar --list                           # list stages
 */

import { config as loadEnv } from "dotenv";
import { createConfig, configFromEnv } from "./config.js";
import { generateCommand } from "./commands/generate.js";

loadEnv();

generateCommand(process.argv.slice(2), createConfig(configFromEnv()))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`❌ ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
