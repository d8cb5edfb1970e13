/**
 * Stage registry — one scraper per stage of the event series.
 */

import { STAGE_KEYS, UnknownStageError } from "@vct-calendar/core";
import type { ScraperConfig } from "./config.js";
import { StageScraper } from "./scrapers/vlr/index.js";

export function createRegistry(config: ScraperConfig): StageScraper[] {
  return STAGE_KEYS.map((key) => new StageScraper(key, config));
}

export function getStageScraper(id: string, config: ScraperConfig): StageScraper {
  const scraper = createRegistry(config).find((s) => s.id === id);
  if (!scraper) throw new UnknownStageError(id);
  return scraper;
}

/** The stage the CLI scrapes when none is given: the first active one. */
export function defaultStage(config: ScraperConfig): StageScraper {
  const registry = createRegistry(config);
  return registry.find((s) => config.stages[s.id].active) ?? registry[0];
}
