import { describe, it, expect, vi } from "vitest";
import { UnknownStageError } from "@vct-calendar/core";
import { FetchError, StageScraper, createConfig, createRegistry, defaultStage, fetchPage, getStageScraper, scrapeStage, type ScraperConfig } from "../src/index.js";

const DIRECTORY = "https://www.vlr.gg/vct/?region=all&stage=45";

const PAGES: Record<string, string> = {
  [DIRECTORY]: `
    <a href="/event/2682/vct-2026-pacific-kickoff">Pacific</a>
    <a href="/event/2683/vct-2026-emea-kickoff">EMEA</a>`,
  "https://www.vlr.gg/event/2682/vct-2026-pacific-kickoff": `
    <a href="/512345/drx-vs-t1-ur1"></a>
    <a href="/512346/prx-vs-geng-ur2"></a>`,
  "https://www.vlr.gg/event/2683/vct-2026-emea-kickoff": `
    <a href="/512400/fnc-vs-th-gf"></a>`,
};

function fakeFetch(pages: Record<string, string>) {
  return vi.fn(async (input: string | URL | Request) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const html = pages[url];
    return html === undefined ? new Response("not found", { status: 404 }) : new Response(html, { status: 200 });
  });
}

function testConfig(overrides: Partial<ScraperConfig> = {}): ScraperConfig {
  return createConfig({ requestDelayMs: 0, fetch: fakeFetch(PAGES), log: vi.fn(), ...overrides });
}

describe("StageScraper", () => {
  it("scrapes every tournament of the stage in order", async () => {
    const fetch = fakeFetch(PAGES);
    const log = vi.fn();
    const matches = await scrapeStage("kickoff", testConfig({ fetch, log }));

    expect(matches.map((m) => [m.id, m.eventName, m.phase])).toEqual([
      ["512345", "VCT 2026 Pacific Kickoff", "Upper Round 1"],
      ["512346", "VCT 2026 Pacific Kickoff", "Upper Round 2"],
      ["512400", "VCT 2026 EMEA Kickoff", "Grand Final"],
    ]);
    expect(fetch.mock.calls.map(([url]) => url)).toEqual([
      DIRECTORY,
      "https://www.vlr.gg/event/2682/vct-2026-pacific-kickoff",
      "https://www.vlr.gg/event/2683/vct-2026-emea-kickoff",
    ]);
    expect(log.mock.calls.map(([line]) => line)).toEqual([
      "Found 2 tournaments for kickoff",
      "  Scraping VCT 2026 Pacific Kickoff...",
      "    Found 2 matches",
      "  Scraping VCT 2026 EMEA Kickoff...",
      "    Found 1 matches",
    ]);
  });

  it("skips excluded regions without requesting them", async () => {
    const fetch = fakeFetch(PAGES);
    const matches = await scrapeStage("kickoff", testConfig({ fetch, excludedRegions: ["EMEA"] }));

    expect(matches.map((m) => m.id)).toEqual(["512345", "512346"]);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it("rejects unknown stages before any request", async () => {
    const fetch = fakeFetch(PAGES);
    await expect(scrapeStage("playoffs", testConfig({ fetch }))).rejects.toBeInstanceOf(UnknownStageError);
    expect(fetch).not.toHaveBeenCalled();
  });

  it("aborts the stage when a tournament page fails", async () => {
    const pages = { [DIRECTORY]: PAGES[DIRECTORY] };
    await expect(scrapeStage("kickoff", testConfig({ fetch: fakeFetch(pages) }))).rejects.toThrow(
      "Failed to fetch https://www.vlr.gg/event/2682/vct-2026-pacific-kickoff: 404"
    );
  });

  it("returns nothing when the stage has no tournaments", async () => {
    const config = testConfig({ fetch: fakeFetch({ "https://www.vlr.gg/vct/?region=all&stage=1": "<p>Soon</p>" }) });
    expect(await new StageScraper("stage1", config).scrape()).toEqual([]);
  });
});

describe("fetchPage", () => {
  it("sends the configured headers", async () => {
    const fetch = fakeFetch(PAGES);
    await fetchPage(DIRECTORY, testConfig({ fetch, headers: { "User-Agent": "test-agent" } }));
    expect(fetch).toHaveBeenCalledWith(DIRECTORY, { headers: { "User-Agent": "test-agent" } });
  });

  it("throws FetchError with the status", async () => {
    const error = await fetchPage("https://www.vlr.gg/missing", testConfig()).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ status: 404, url: "https://www.vlr.gg/missing", code: "FETCH_FAILED" });
  });

  it("cancels the body of a failed response", async () => {
    const response = new Response("busy", { status: 503 });
    const body = response.body;
    const cancel = body ? vi.spyOn(body, "cancel") : null;

    await expect(fetchPage(DIRECTORY, testConfig({ fetch: vi.fn(async () => response) }))).rejects.toThrow(
      `Failed to fetch ${DIRECTORY}: 503`
    );
    expect(cancel).not.toBeNull();
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it("waits after every request", async () => {
    const started = Date.now();
    await fetchPage(DIRECTORY, testConfig({ requestDelayMs: 30 }));
    expect(Date.now() - started).toBeGreaterThanOrEqual(25);
  });

  it("waits after failed requests too", async () => {
    const started = Date.now();
    await expect(fetchPage("https://www.vlr.gg/missing", testConfig({ requestDelayMs: 30 }))).rejects.toThrow(FetchError);
    expect(Date.now() - started).toBeGreaterThanOrEqual(25);
  });
});

describe("registry", () => {
  const config = testConfig();

  it("has one scraper per stage", () => {
    expect(createRegistry(config).map((s) => [s.id, s.name])).toEqual([
      ["kickoff", "Kickoff"],
      ["masters", "Masters"],
      ["stage1", "Stage 1"],
      ["stage2", "Stage 2"],
      ["champions", "Champions"],
    ]);
  });

  it("looks scrapers up by key", () => {
    expect(getStageScraper("champions", config).url).toBe("https://www.vlr.gg/vct/?region=all&stage=47");
    expect(() => getStageScraper("playoffs", config)).toThrow(UnknownStageError);
  });

  it("defaults to the active stage", () => {
    expect(defaultStage(config).id).toBe("kickoff");

    const stages = { ...config.stages, kickoff: { ...config.stages.kickoff, active: false }, stage2: { ...config.stages.stage2, active: true } };
    expect(defaultStage(testConfig({ stages })).id).toBe("stage2");
  });
});
