/**
 * Bracket phase of a match.
 *
 * Precedence: suffix code in the match URL, then the nearest preceding
 * round heading, then the phase of the previous match, then "Match".
 */

import type { Cheerio, CheerioAPI, Element } from "cheerio";

export const DEFAULT_PHASE = "Match";

/** "-ur1", "-mr4", "-lbf", "-gf", ... at the end of a match path. */
export const BRACKET_SUFFIX = /-(?:([uml])(?:r(\d+)|bf)|gf)$/;

const SIDE_LABELS: Record<string, string> = { u: "Upper", m: "Middle", l: "Lower" };

const PHASE_KEYWORDS = /(Upper|Lower|Middle|Round|Final)/i;

const HEADING_SELECTOR = "h1, h2, h3, h4, h5, h6, .bracket-col-label, .wf-label";

/** Path part of an href, without query or fragment. */
export function hrefPath(href: string): string {
  return href.split(/[?#]/)[0];
}

/** "/123456/a-vs-b-ur1" -> "Upper Round 1"; null without a suffix code. */
export function phaseFromUrl(href: string): string | null {
  const m = hrefPath(href).toLowerCase().match(BRACKET_SUFFIX);
  if (!m) return null;

  const [, side, round] = m;
  if (!side) return "Grand Final";

  const label = SIDE_LABELS[side];
  return round ? `${label} Round ${round}` : `${label} Final`;
}

/**
 * For every anchor on the page that sits inside a round column, the text
 * of the closest heading before it that names a phase.
 */
export function headingPhases($: CheerioAPI): Map<Element, string> {
  const phases = new Map<Element, string>();
  let lastHeading: string | null = null;

  // Combined selections come back in document order
  $(`${HEADING_SELECTOR}, a[href]`).each((_i, el) => {
    const $el = $(el);
    if ($el.is("a")) {
      if (lastHeading && inRoundColumn($, $el)) phases.set(el, lastHeading);
      return;
    }
    // Labels inside a match card describe that card, not the matches after it
    if ($el.closest("a").length > 0) return;
    const text = $el.text().replace(/\s+/g, " ").trim();
    if (PHASE_KEYWORDS.test(text)) lastHeading = text;
  });

  return phases;
}

function inRoundColumn($: CheerioAPI, $anchor: Cheerio<Element>): boolean {
  return $anchor.parents().toArray().some((parent) => /round/i.test($(parent).attr("class") ?? ""));
}
