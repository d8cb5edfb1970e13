/**
 * Core match model for the VCT calendar.
 *
 * Records are produced by the scrapers and rendered by the iCal layer.
 * They are never mutated after creation.
 */

import type { LocalDateTime } from "./datetime.js";

/** Domain used in derived calendar UIDs. */
export const SOURCE_DOMAIN = "vlr.gg";

/** Region labels a tournament name can carry, in match priority order. */
export const REGIONS = ["Americas", "EMEA", "Pacific", "China"] as const;

export type Region = (typeof REGIONS)[number];

/** A tournament listed on a stage directory page. */
export interface Tournament {
  /** Site-side event id, e.g. "2682". */
  readonly id: string;

  /** Display name derived from the URL slug. */
  readonly name: string;

  readonly slug: string;

  /** Inferred region, or "" when the name carries none. */
  readonly region: Region | "";

  /** Raw date range text as listed, e.g. "Jan 15—Feb 23". */
  readonly dates: string;

  /** Absolute tournament page URL. */
  readonly url: string;
}

/** A single match discovered on a tournament page. */
export interface Match {
  /** Site-side match id (5 to 7 digits). */
  readonly id: string;

  /** Name of the tournament the match belongs to. */
  readonly eventName: string;

  /** Bracket position, e.g. "Upper Round 1". "Match" when unknown. */
  readonly phase: string;

  readonly team1: string;
  readonly team2: string;

  /** Digit-only score text, absent until played. */
  readonly score1?: string;
  readonly score2?: string;

  /** Scheduled start as wall-clock time in the source timezone (WIB). */
  readonly startLocal: LocalDateTime | null;

  /** Date/time text exactly as scraped. */
  readonly dateText: string;

  /** Canonical match page URL. */
  readonly url: string;
}

/** Placeholder for a team that is not known yet. */
export const TBD = "TBD";

/** Calendar UID for a match, stable across runs. */
export function matchUid(match: Pick<Match, "id">): string {
  return `match-${match.id}@${SOURCE_DOMAIN}`;
}

/** Human-readable calendar summary, e.g. "VCT 2026 Pacific Kickoff - DRX vs T1 (Grand Final)". */
export function matchSummary(match: Pick<Match, "eventName" | "team1" | "team2" | "phase">): string {
  return `${match.eventName} - ${match.team1} vs ${match.team2} (${match.phase})`;
}

/** True once both scores are known. */
export function hasResult(match: Pick<Match, "score1" | "score2">): boolean {
  return match.score1 !== undefined && match.score2 !== undefined;
}
