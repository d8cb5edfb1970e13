/**
 * Scraper configuration.
 *
 * Everything the scrapers need from the outside world is carried in one
 * immutable value; nothing reads process state after startup.
 *
 * Environment overrides (loaded from .env by the CLIs):
 *   VCT_BASE_URL          — site root (default: https://www.vlr.gg)
 *   VCT_REQUEST_DELAY_MS  — pause after every request (default: 1000)
 *   VCT_EXCLUDED_REGIONS  — comma-separated regions to skip (default: none)
 *   VCT_EVENT_YEAR        — year assumed for dates without one (default: 2026)
 */

import { ConfigurationError, STAGES, type StageDefinition, type StageKey } from "@vct-calendar/core";

export interface ScraperConfig {
  readonly baseUrl: string;
  readonly stages: Readonly<Record<StageKey, StageDefinition>>;
  /** Tournaments whose inferred region is listed here are skipped. */
  readonly excludedRegions: readonly string[];
  readonly requestDelayMs: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly eventYear: number;
  readonly fetch: typeof fetch;
  /** Progress output. */
  readonly log: (line: string) => void;
}

export const DEFAULT_CONFIG: ScraperConfig = Object.freeze({
  baseUrl: "https://www.vlr.gg",
  stages: STAGES,
  excludedRegions: [],
  requestDelayMs: 1000,
  headers: {
    "User-Agent":
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  },
  eventYear: 2026,
  fetch: (input: Parameters<typeof fetch>[0], init?: Parameters<typeof fetch>[1]) => fetch(input, init),
  log: (line: string) => console.log(line),
});

export function createConfig(overrides: Partial<ScraperConfig> = {}): ScraperConfig {
  return Object.freeze({ ...DEFAULT_CONFIG, ...overrides });
}

/** Read overrides from environment variables. Throws ConfigurationError on bad values. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ScraperConfig> {
  const overrides: { -readonly [K in keyof ScraperConfig]?: ScraperConfig[K] } = {};

  const baseUrl = env.VCT_BASE_URL?.trim();
  if (baseUrl) overrides.baseUrl = baseUrl.replace(/\/+$/, "");

  const delay = env.VCT_REQUEST_DELAY_MS?.trim();
  if (delay) overrides.requestDelayMs = parseNonNegativeInt("VCT_REQUEST_DELAY_MS", delay);

  const year = env.VCT_EVENT_YEAR?.trim();
  if (year) overrides.eventYear = parseNonNegativeInt("VCT_EVENT_YEAR", year);

  const regions = env.VCT_EXCLUDED_REGIONS;
  if (regions !== undefined) {
    overrides.excludedRegions = regions
      .split(",")
      .map((r) => r.trim())
      .filter(Boolean);
  }

  return overrides;
}

function parseNonNegativeInt(name: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parseInt(value, 10);
}
