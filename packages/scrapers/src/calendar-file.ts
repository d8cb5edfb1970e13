/**
 * Calendar files on disk.
 *
 * Files are read fully, changed in memory and written back in one go.
 * There is no locking; two runs against the same file are unsupported.
 */

import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import {
  appendMatches,
  buildCalendar,
  calendarEvents,
  parseCalendar,
  serializeCalendar,
  updateMatches,
  type CalendarComponent,
  type CalendarOptions,
  type Match,
  type UpdateResult,
} from "@vct-calendar/core";

/** Read and parse a calendar. Throws MalformedCalendarError. */
export function readCalendarFile(path: string): CalendarComponent {
  return parseCalendar(readFileSync(path, "utf-8"));
}

export function writeCalendarFile(path: string, calendar: CalendarComponent): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, serializeCalendar(calendar), "utf-8");
}

/** Write a fresh calendar. Returns the number of entries written. */
export function generateCalendarFile(matches: readonly Match[], path: string, options: CalendarOptions = {}): number {
  const calendar = buildCalendar(matches, options);
  writeCalendarFile(path, calendar);
  return calendarEvents(calendar).length;
}

/** Add matches not yet in the file. Returns the matches that were added. */
export function appendToCalendarFile(matches: readonly Match[], path: string, options: CalendarOptions = {}): Match[] {
  const calendar = readCalendarFile(path);
  const added = appendMatches(calendar, matches, options);
  writeCalendarFile(path, calendar);
  return added;
}

/** Refresh entries already in `inputPath` and write the result to `outputPath`. */
export function updateCalendarFile(
  matches: readonly Match[],
  inputPath: string,
  outputPath: string = inputPath,
  options: CalendarOptions = {}
): UpdateResult {
  const calendar = readCalendarFile(inputPath);
  const result = updateMatches(calendar, matches, options);
  writeCalendarFile(outputPath, calendar);
  return result;
}
