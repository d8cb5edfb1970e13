export type { Scraper } from "./scraper.js";
export { createRegistry, getStageScraper, defaultStage } from "./registry.js";
export { type ScraperConfig, DEFAULT_CONFIG, createConfig, configFromEnv } from "./config.js";
export { FetchError } from "./errors.js";
export { fetchPage } from "./http.js";
export { readCalendarFile, writeCalendarFile, generateCalendarFile, appendToCalendarFile, updateCalendarFile } from "./calendar-file.js";
export { generateCommand } from "./commands/generate.js";
export { updateCommand } from "./commands/update.js";

export * from "./scrapers/vlr/index.js";
