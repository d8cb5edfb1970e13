/**
 * Tournament directory for one stage (vlr.gg/vct/?stage=<id>).
 *
 * The listing has no structured data we can rely on, so each tournament is
 * read from its /event/<id>/<slug> link.
 */

import type { CheerioAPI } from "cheerio";
import { REGIONS, UnknownStageError, isStageKey, type Region, type StageDefinition, type StageKey, type Tournament } from "@vct-calendar/core";
import type { ScraperConfig } from "../../config.js";
import { fetchPage } from "../../http.js";

const EVENT_PATH_PREFIX = "/event/";
const DATES_SELECTOR = ".event-item-desc-item-value, div:nth-child(3)";

/** Words kept upper-case in names built from slugs. */
const ACRONYMS = new Set(["VCT", "EMEA"]);

export interface ResolvedStage extends StageDefinition {
  readonly key: StageKey;
}

export function resolveStage(stageKey: string, config: Pick<ScraperConfig, "stages">): ResolvedStage {
  if (!isStageKey(stageKey)) throw new UnknownStageError(stageKey);
  return { key: stageKey, ...config.stages[stageKey] };
}

export function directoryUrl(stage: StageDefinition, config: Pick<ScraperConfig, "baseUrl">): string {
  return `${config.baseUrl}/vct/?region=all&stage=${stage.categoryId}`;
}

/** Fetch the directory page of a stage and list its tournaments. */
export async function fetchTournaments(stageKey: string, config: ScraperConfig): Promise<Tournament[]> {
  const stage = resolveStage(stageKey, config);
  const $ = await fetchPage(directoryUrl(stage, config), config);
  return extractTournaments($, config);
}

export function extractTournaments(
  $: CheerioAPI,
  config: Pick<ScraperConfig, "baseUrl" | "excludedRegions">
): Tournament[] {
  const tournaments: Tournament[] = [];
  const seenIds = new Set<string>();

  $(`a[href^="${EVENT_PATH_PREFIX}"]`).each((_i, el) => {
    const $link = $(el);
    const href = $link.attr("href") ?? "";

    // ["", "event", "<id>", "<slug>", ...]
    const parts = href.split("/");
    if (parts.length < 3) return;
    const id = parts[2];
    const slug = parts[3] ?? "";

    const name = tournamentName(slug);
    if (!id || !name) return;

    const region = inferRegion(name);
    if (region && config.excludedRegions.includes(region)) return;
    if (seenIds.has(id)) return;
    seenIds.add(id);

    tournaments.push({
      id,
      name,
      slug,
      region,
      dates: $link.find(DATES_SELECTOR).first().text().replace(/\s+/g, " ").trim(),
      url: new URL(href, config.baseUrl).toString(),
    });
  });

  return tournaments;
}

/** "vct-2026-emea-kickoff" -> "VCT 2026 EMEA Kickoff" */
export function tournamentName(slug: string): string {
  return slug
    .split("-")
    .filter(Boolean)
    .map((word) => {
      const upper = word.toUpperCase();
      if (ACRONYMS.has(upper)) return upper;
      return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
    })
    .join(" ");
}

/** First known region contained in the name, case-insensitively. */
export function inferRegion(name: string): Region | "" {
  const lower = name.toLowerCase();
  return REGIONS.find((r) => lower.includes(r.toLowerCase())) ?? "";
}
