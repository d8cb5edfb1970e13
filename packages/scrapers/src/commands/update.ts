/**
 * `vct-calendar-update` — refresh times, teams and results of entries
 * already in a calendar. Never adds or removes entries.
 */

import { existsSync } from "node:fs";
import {
  STAGE_KEYS,
  stagesInCalendar,
  upcomingStagesInCalendar,
  type CalendarOptions,
  type Match,
  type StageKey,
} from "@vct-calendar/core";
import { flagValue, flagValues, hasFlag } from "../args.js";
import { readCalendarFile, updateCalendarFile } from "../calendar-file.js";
import type { ScraperConfig } from "../config.js";
import { getStageScraper } from "../registry.js";
import { DEFAULT_OUTPUT } from "./generate.js";

export const UPDATE_USAGE = `Usage: vct-calendar-update [options]

Options:
  --input PATH      Calendar file to update (default: ${DEFAULT_OUTPUT})
  --output PATH     Where to write the result (default: the input file)
  --stage KEY       Stage to refresh; repeatable (default: stages found in the file)
  --upcoming        When detecting stages, only keep those with events still ahead
  --help, -h        Show this help`;

/** Run the update command. Resolves to the process exit code. */
export async function updateCommand(
  args: readonly string[],
  config: ScraperConfig,
  calendarOptions: CalendarOptions = {}
): Promise<number> {
  if (hasFlag(args, "--help", "-h")) {
    console.log(UPDATE_USAGE);
    return 0;
  }

  const input = flagValue(args, "--input") ?? DEFAULT_OUTPUT;
  const output = flagValue(args, "--output") ?? input;
  // Validate stage keys before touching the file
  const explicit = flagValues(args, "--stage").map((key) => getStageScraper(key, config));

  if (!existsSync(input)) {
    console.error(`Error: ${input} not found. Run vct-calendar first.`);
    return 1;
  }

  console.log(`Loading existing calendar from ${input}...`);
  const calendar = readCalendarFile(input);

  let stages: StageKey[];
  if (explicit.length > 0) {
    stages = [...new Set(explicit.map((s) => s.id))];
  } else {
    const detected = hasFlag(args, "--upcoming")
      ? upcomingStagesInCalendar(calendar, calendarOptions.now)
      : stagesInCalendar(calendar);
    stages = STAGE_KEYS.filter((key) => detected.has(key));
    console.log(`Auto-detected stages: ${stages.join(", ") || "(none)"}`);
  }

  console.log(`\n🔍 Scraping latest data from ${config.baseUrl}...`);
  const matches: Match[] = [];
  for (const stage of stages) {
    console.log(`  Fetching ${stage}...`);
    matches.push(...(await getStageScraper(stage, config).scrape()));
  }
  console.log(`Found ${matches.length} total matches`);

  const { stats, changes } = updateCalendarFile(matches, input, output, calendarOptions);
  for (const change of changes) {
    console.log(`  Updated ${change.uid}: ${change.changes.join(", ")}`);
  }

  console.log(`\nUpdate complete:`);
  console.log(`  - Updated: ${stats.updated}`);
  console.log(`  - Unchanged: ${stats.unchanged}`);
  console.log(`  - Skipped (new events): ${stats.skippedNew}`);
  console.log(`  - Skipped (no time): ${stats.skippedNoTime}`);
  console.log(`\n✅ Saved to ${output}`);
  return 0;
}
