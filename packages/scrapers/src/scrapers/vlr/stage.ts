/**
 * Scraper for one VCT stage on vlr.gg.
 *
 * Reads the stage's tournament directory, then every tournament page in
 * turn. Requests are strictly sequential; a failed request aborts the stage.
 */

import type { Match, StageKey } from "@vct-calendar/core";
import type { ScraperConfig } from "../../config.js";
import type { Scraper } from "../../scraper.js";
import { fetchMatches } from "./matches.js";
import { directoryUrl, fetchTournaments, resolveStage } from "./tournaments.js";

export class StageScraper implements Scraper {
  readonly id: StageKey;
  readonly name: string;
  readonly url: string;

  constructor(
    stageKey: string,
    private readonly config: ScraperConfig
  ) {
    const stage = resolveStage(stageKey, config);
    this.id = stage.key;
    this.name = stage.name;
    this.url = directoryUrl(stage, config);
  }

  async scrape(): Promise<Match[]> {
    const { config } = this;
    const tournaments = await fetchTournaments(this.id, config);
    config.log(`Found ${tournaments.length} tournaments for ${this.id}`);

    const matches: Match[] = [];
    for (const tournament of tournaments) {
      config.log(`  Scraping ${tournament.name}...`);
      const found = await fetchMatches(tournament, config);
      config.log(`    Found ${found.length} matches`);
      matches.push(...found);
    }
    return matches;
  }
}

/** Scrape every match of a stage. Rejects with UnknownStageError before any request. */
export async function scrapeStage(stageKey: string, config: ScraperConfig): Promise<Match[]> {
  return new StageScraper(stageKey, config).scrape();
}
