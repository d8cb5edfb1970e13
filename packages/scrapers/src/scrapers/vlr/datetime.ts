/**
 * Match times on vlr.gg are shown in WIB without a year, in two layouts:
 *
 *   "11:00 pm WIB, Jan 20"   legacy bracket cards
 *   "Mar 1 ... 12:00 am"     current event cards
 */

import * as chrono from "chrono-node";
import type { LocalDateTime } from "@vct-calendar/core";
import { firstResult, type Strategy } from "../../cascade.js";

const MONTHS = "Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec";

/** Anything earlier is a year the parser made up. */
const MIN_PLAUSIBLE_YEAR = 2020;

const DATE_TEXT_PATTERNS: readonly Strategy<string, string>[] = [
  (text) => text.match(/(\d{1,2}:\d{2}\s*[ap]m\s*WIB,?\s*\w+\s*\d{1,2})/i)?.[1] ?? null,
  (text) => {
    const compact = text.replace(/\s+/g, " ").trim();
    const m = compact.match(new RegExp(`\\b((?:${MONTHS})\\s+\\d{1,2})\\b.*?\\b(\\d{1,2}:\\d{2}\\s*[ap]m)\\b`, "i"));
    // Reorder to the legacy "time date" layout
    return m ? `${m[2]} ${m[1]}` : null;
  },
];

/** Pull the date/time part out of a match card's flattened text. "" when absent. */
export function extractDateText(cardText: string): string {
  if (!cardText) return "";
  return firstResult(DATE_TEXT_PATTERNS, cardText) ?? "";
}

/**
 * Parse scraped date/time text into a wall-clock time.
 *
 * Returns null for empty text, the "-" placeholder, or anything the parser
 * cannot read. A missing or implausible year becomes `defaultYear`; a missing
 * time of day becomes midnight. The result is still in the source timezone.
 */
export function parseSourceDateTime(text: string, defaultYear: number): LocalDateTime | null {
  if (!text || text.trim() === "-") return null;

  const cleaned = text
    .replace(/\bWIB\b,?/gi, "")
    .replace(/\s+/g, " ")
    .trim();
  if (!cleaned) return null;

  const [result] = chrono.parse(cleaned);
  if (!result) return null;

  const { start } = result;
  const statedYear = start.isCertain("year") ? start.get("year") : null;
  const timed = start.isCertain("hour");

  return {
    year: statedYear !== null && statedYear >= MIN_PLAUSIBLE_YEAR ? statedYear : defaultYear,
    month: start.get("month") ?? 1,
    day: start.get("day") ?? 1,
    hour: timed ? start.get("hour") ?? 0 : 0,
    minute: timed ? start.get("minute") ?? 0 : 0,
    second: timed ? start.get("second") ?? 0 : 0,
  };
}
