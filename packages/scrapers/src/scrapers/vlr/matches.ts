/**
 * Matches on a tournament page.
 *
 * vlr.gg has served at least two bracket layouts for the same events, so
 * anchors are located with an ordered list of selectors and every field is
 * read with its own fallbacks. A match is only dropped when its link has no
 * numeric id or does not resolve to a URL.
 */

import type { CheerioAPI, Element } from "cheerio";
import type { Match, Tournament } from "@vct-calendar/core";
import { firstResult, nonEmpty, type Strategy } from "../../cascade.js";
import type { ScraperConfig } from "../../config.js";
import { fetchPage } from "../../http.js";
import { extractDateText, parseSourceDateTime } from "./datetime.js";
import { BRACKET_SUFFIX, DEFAULT_PHASE, headingPhases, hrefPath, phaseFromUrl } from "./phase.js";
import { extractTeams, textParts } from "./teams.js";

const MATCH_ID = /\/(\d{5,7})\//;
const MATCH_PATH = /^\/\d{5,7}\//;

/** Ordered anchor selectors; the first that finds anything is used. */
export const ANCHOR_STRATEGIES: readonly Strategy<CheerioAPI, Element[]>[] = [
  // Bracket links ending in a round code, e.g. /512345/drx-vs-t1-ur1
  ($) => nonEmpty($("a[href]").toArray().filter((el) => BRACKET_SUFFIX.test(hrefPath($(el).attr("href") ?? "").toLowerCase()))),
  // Match cards
  ($) => nonEmpty($('a[href^="/"][class*="match"]').toArray()),
  // Anything inside the bracket container
  ($) => nonEmpty($(".event-bracket, .bracket").first().find("a[href]").toArray()),
  // Any link shaped like /<id>/<slug>
  ($) => nonEmpty($('a[href^="/"]').toArray().filter((el) => MATCH_PATH.test($(el).attr("href") ?? ""))),
];

/** State carried from one anchor to the next. */
interface ExtractionState {
  /** Phase of the last anchor that had a round heading. */
  readonly currentPhase: string;
  readonly matches: readonly Match[];
}

export async function fetchMatches(tournament: Tournament, config: ScraperConfig): Promise<Match[]> {
  const $ = await fetchPage(tournament.url, config);
  return extractMatches($, tournament, config);
}

export function extractMatches(
  $: CheerioAPI,
  tournament: Tournament,
  config: Pick<ScraperConfig, "baseUrl" | "eventYear">
): Match[] {
  const anchors = firstResult(ANCHOR_STRATEGIES, $) ?? [];
  const headings = headingPhases($);

  const initial: ExtractionState = { currentPhase: "", matches: [] };
  const final = anchors.reduce<ExtractionState>((state, anchor) => {
    const href = $(anchor).attr("href") ?? "";
    const id = href.match(MATCH_ID)?.[1];
    if (!id || !URL.canParse(href, config.baseUrl)) return state;

    const currentPhase = headings.get(anchor) ?? state.currentPhase;
    if (state.matches.some((m) => m.id === id)) return { ...state, currentPhase };

    const match = buildMatch($, anchor, {
      id,
      href,
      tournament,
      phase: phaseFromUrl(href) ?? (currentPhase || DEFAULT_PHASE),
      config,
    });
    return { currentPhase, matches: [...state.matches, match] };
  }, initial);

  return [...final.matches];
}

function buildMatch(
  $: CheerioAPI,
  anchor: Element,
  ctx: { id: string; href: string; tournament: Tournament; phase: string; config: Pick<ScraperConfig, "baseUrl" | "eventYear"> }
): Match {
  const $anchor = $(anchor);
  const teams = extractTeams($, $anchor);
  const dateText = extractDateText(textParts($, $anchor).join(" "));

  return {
    id: ctx.id,
    eventName: ctx.tournament.name,
    phase: ctx.phase,
    team1: teams.team1,
    team2: teams.team2,
    score1: teams.score1,
    score2: teams.score2,
    startLocal: parseSourceDateTime(dateText, ctx.config.eventYear),
    dateText,
    url: new URL(ctx.href, ctx.config.baseUrl).toString(),
  };
}
