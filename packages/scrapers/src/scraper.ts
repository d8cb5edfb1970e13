/**
 * Scraper interface — one implementation per stage of the event series.
 */

import type { Match } from "@vct-calendar/core";

export interface Scraper {
  /** Stage key, e.g. "kickoff" */
  readonly id: string;

  /** Human-readable name, e.g. "Kickoff" */
  readonly name: string;

  /** The directory page being scraped */
  readonly url: string;

  /** Fetch and parse every match of the stage. */
  scrape(): Promise<Match[]>;
}
