#!/usr/bin/env node
/**
 * VCT calendar updater
 *
 * Usage:
 *   vct-calendar-update                               # refresh every stage found in vct-2026.ics
 *   vct-calendar-update --upcoming                    # only stages with matches still ahead
 *   vct-calendar-update --input a.ics --output b.ics --stage kickoff --stage masters
 *
 * Exits 1 when the input file is missing or a request fails.
 */

import { config as loadEnv } from "dotenv";
import { createConfig, configFromEnv } from "./config.js";
import { updateCommand } from "./commands/update.js";

loadEnv();

updateCommand(process.argv.slice(2), createConfig(configFromEnv()))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`❌ ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
