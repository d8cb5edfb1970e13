/**
 * Team names and scores from a match anchor.
 *
 * Bracket cards carry both names and scores; sidebar cards only names;
 * anything else falls back to guessing from the anchor's text.
 */

import type { AnyNode, Cheerio, CheerioAPI, Element } from "cheerio";
import { TBD } from "@vct-calendar/core";
import { firstResult, type Strategy } from "../../cascade.js";

export interface TeamsResult {
  team1: string;
  team2: string;
  score1?: string;
  score2?: string;
}

const MONTHS = "Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec";

const TIME_TOKEN = /^[\d:\s]+[ap]m$/i;
const MONTH_TOKEN = new RegExp(`^(${MONTHS})\\b`);
const ROUND_WORD = "Round|Upper|Lower|Middle|Grand|Final|Bo\\d+";
/** "Final", "Bo3", "Upper Round 1", "Grand Final" */
const ROUND_TOKEN = new RegExp(`^(?:${ROUND_WORD})(?:\\s+(?:${ROUND_WORD}|\\d+))*$`, "i");
const PLACEHOLDER_TOKENS = new Set(["-", "WIB"]);
const TRAILING_SCORE = /^(.*\S)\s+(\d)$/;

const TEXT_NODE = 3;
const ELEMENT_NODE = 1;

type AnchorInput = { $: CheerioAPI; $anchor: Cheerio<Element> };

const TEAM_STRATEGIES: readonly Strategy<AnchorInput, TeamsResult>[] = [
  // Bracket card (event page bracket)
  ({ $, $anchor }) => {
    const names = texts($, $anchor.find(".team-name div"));
    if (names.length < 2) return null;
    return {
      team1: names[0],
      team2: names[1],
      score1: digits($anchor.find(".score-left").first().text()),
      score2: digits($anchor.find(".score-right").first().text()),
    };
  },
  // Sidebar / upcoming list card
  ({ $, $anchor }) => {
    const names = texts($, $anchor.find(".event-sidebar-matches-team .name span"));
    if (names.length < 2) return null;
    return { team1: names[0], team2: names[1] };
  },
  // Anything else: guess from the text tokens
  ({ $, $anchor }) => teamsFromTokens(textParts($, $anchor)),
];

export function extractTeams($: CheerioAPI, $anchor: Cheerio<Element>): TeamsResult {
  const teams = firstResult(TEAM_STRATEGIES, { $, $anchor });
  return teams ?? { team1: TBD, team2: TBD };
}

/**
 * Pick team names out of a card's text tokens.
 *
 * Times, dates, round words and placeholders are dropped. A token ending in
 * a lone digit ("Team Heretics 2") carries that team's score.
 */
export function teamsFromTokens(tokens: readonly string[]): TeamsResult | null {
  const candidates: { name: string; score?: string }[] = [];

  for (const token of tokens) {
    if (TIME_TOKEN.test(token)) continue;
    if (MONTH_TOKEN.test(token)) continue;
    if (ROUND_TOKEN.test(token)) continue;
    if (PLACEHOLDER_TOKENS.has(token)) continue;
    if (token.length <= 1 || /^\d+$/.test(token)) continue;

    const scored = token.match(TRAILING_SCORE);
    candidates.push(scored ? { name: scored[1], score: scored[2] } : { name: token });
  }

  const [first, second] = candidates;
  if (!first) return null;
  if (!second) return { team1: first.name, team2: TBD, score1: first.score };
  return { team1: first.name, team2: second.name, score1: first.score, score2: second.score };
}

/** Trimmed, non-empty text nodes under an element, in document order. */
export function textParts($: CheerioAPI, $el: Cheerio<AnyNode>): string[] {
  return $el
    .contents()
    .toArray()
    .flatMap((node) => {
      if (node.nodeType === TEXT_NODE) {
        const text = $(node).text().trim();
        return text ? [text] : [];
      }
      if (node.nodeType === ELEMENT_NODE) return textParts($, $(node));
      return [];
    });
}

function texts($: CheerioAPI, $els: Cheerio<Element>): string[] {
  return $els
    .toArray()
    .map((el) => $(el).text().trim())
    .filter(Boolean);
}

function digits(text: string): string | undefined {
  const trimmed = text.trim();
  return /^\d+$/.test(trimmed) ? trimmed : undefined;
}
