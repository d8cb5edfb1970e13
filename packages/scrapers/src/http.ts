import * as cheerio from "cheerio";
import { setTimeout as delay } from "node:timers/promises";
import type { ScraperConfig } from "./config.js";
import { FetchError } from "./errors.js";

/**
 * Fetch a page and load it into cheerio.
 *
 * One attempt only; the configured delay follows every request, failed or not.
 */
export async function fetchPage(
  url: string,
  config: Pick<ScraperConfig, "fetch" | "headers" | "requestDelayMs">
): Promise<cheerio.CheerioAPI> {
  try {
    const response = await config.fetch(url, { headers: config.headers });
    if (!response.ok) {
      // Error pages are never read
      await response.body?.cancel();
      throw new FetchError(url, response.status);
    }
    return cheerio.load(await response.text());
  } finally {
    await delay(config.requestDelayMs);
  }
}
