import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { MalformedCalendarError, eventsByUid, type Match } from "@vct-calendar/core";
import { appendToCalendarFile, generateCalendarFile, readCalendarFile, updateCalendarFile } from "../src/index.js";

const now = new Date("2026-01-10T00:00:00Z");

function match(id: string, overrides: Partial<Match> = {}): Match {
  return {
    id,
    eventName: "VCT 2026 EMEA Kickoff",
    phase: "Upper Round 1",
    team1: "FNATIC",
    team2: "Team Heretics",
    startLocal: { year: 2026, month: 1, day: 22, hour: 22, minute: 0, second: 0 },
    dateText: "10:00 pm WIB, Jan 22",
    url: `https://www.vlr.gg/${id}/fnatic-vs-team-heretics-ur1`,
    ...overrides,
  };
}

describe("calendar files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "vct-calendar-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("creates missing directories when generating", () => {
    const path = join(dir, "calendars", "kickoff.ics");
    expect(generateCalendarFile([match("600001"), match("600002", { startLocal: null })], path, { now })).toBe(1);
    expect(readFileSync(path, "utf-8")).toContain("UID:match-600001@vlr.gg\r\n");
  });

  it("appends only new matches", () => {
    const path = join(dir, "vct.ics");
    generateCalendarFile([match("600001")], path, { now });

    const added = appendToCalendarFile([match("600001"), match("600003")], path, { now });

    expect(added.map((m) => m.id)).toEqual(["600003"]);
    expect([...eventsByUid(readCalendarFile(path)).keys()]).toEqual(["match-600001@vlr.gg", "match-600003@vlr.gg"]);
  });

  it("writes updates to a separate output file", () => {
    const input = join(dir, "vct.ics");
    const output = join(dir, "out", "vct.ics");
    generateCalendarFile([match("600001")], input, { now });
    const before = readFileSync(input, "utf-8");

    const result = updateCalendarFile([match("600001", { score1: "2", score2: "0" })], input, output, { now });

    expect(result.stats.updated).toBe(1);
    expect(readFileSync(input, "utf-8")).toBe(before);
    expect(readFileSync(output, "utf-8")).toContain("STATUS:CONFIRMED\r\n");
  });

  it("reports malformed files", () => {
    const path = join(dir, "broken.ics");
    writeFileSync(path, "BEGIN:VCALENDAR\r\nVERSION:2.0\r\n");
    expect(() => readCalendarFile(path)).toThrow(MalformedCalendarError);
  });
});
