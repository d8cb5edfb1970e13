/**
 * `vct-calendar` — scrape one stage and write (or extend) a calendar file.
 */

import { existsSync } from "node:fs";
import { join } from "node:path";
import { matchSummary, type CalendarOptions } from "@vct-calendar/core";
import { flagValue, hasFlag } from "../args.js";
import { appendToCalendarFile, generateCalendarFile } from "../calendar-file.js";
import type { ScraperConfig } from "../config.js";
import { createRegistry, defaultStage, getStageScraper } from "../registry.js";

export const DEFAULT_OUTPUT = "vct-2026.ics";
const PREVIEW_COUNT = 5;

export const GENERATE_USAGE = `Usage: vct-calendar [options]

Options:
  --stage KEY       Stage to scrape (default: the active stage)
  --output PATH     Calendar file to write (default: ${DEFAULT_OUTPUT})
  --append          Add new matches to an existing file instead of overwriting it
  --save-stage      Also write calendars/<stage>.ics
  --list, -l        List stages
  --help, -h        Show this help`;

export interface GenerateDeps {
  calendar?: CalendarOptions;
  /** Directory for --save-stage output. */
  calendarsDir?: string;
}

/** Run the generate command. Resolves to the process exit code. */
export async function generateCommand(
  args: readonly string[],
  config: ScraperConfig,
  deps: GenerateDeps = {}
): Promise<number> {
  if (hasFlag(args, "--help", "-h")) {
    console.log(GENERATE_USAGE);
    return 0;
  }

  if (hasFlag(args, "--list", "-l")) {
    console.log("Available stages:\n");
    for (const s of createRegistry(config)) {
      const marker = config.stages[s.id].active ? " (active)" : "";
      console.log(`  ${s.id.padEnd(12)} ${s.name}${marker} (${s.url})`);
    }
    return 0;
  }

  const stageArg = flagValue(args, "--stage");
  const scraper = stageArg ? getStageScraper(stageArg, config) : defaultStage(config);
  const output = flagValue(args, "--output") ?? DEFAULT_OUTPUT;

  console.log(`🔍 Scraping VCT ${config.eventYear} ${scraper.id} matches from ${config.baseUrl}...`);
  const matches = await scraper.scrape();

  console.log(`\nTotal matches found: ${matches.length}`);
  for (const match of matches.slice(0, PREVIEW_COUNT)) {
    console.log(`  - ${matchSummary(match)} @ ${match.dateText}`);
  }
  if (matches.length > PREVIEW_COUNT) {
    console.log(`  ... and ${matches.length - PREVIEW_COUNT} more`);
  }

  if (hasFlag(args, "--save-stage")) {
    const stageFile = join(deps.calendarsDir ?? "calendars", `${scraper.id}.ics`);
    console.log(`\nSaving stage calendar to ${stageFile}...`);
    const written = generateCalendarFile(matches, stageFile, deps.calendar);
    console.log(`Generated ${stageFile} with ${written} events`);
  }

  console.log(`\n🗓️  Generating calendar...`);
  if (hasFlag(args, "--append") && existsSync(output)) {
    const added = appendToCalendarFile(matches, output, deps.calendar);
    for (const match of added) console.log(`  Added: ${matchSummary(match)}`);
    console.log(`Appended ${added.length} new events to ${output}`);
  } else {
    const written = generateCalendarFile(matches, output, deps.calendar);
    console.log(`Created ${output} with ${written} events`);
  }

  console.log(`\n✅ Done!`);
  return 0;
}
