import { describe, it, expect } from "vitest";
import {
  ConfigurationError,
  MalformedCalendarError,
  STAGES,
  STAGE_KEYS,
  UnknownStageError,
  hasResult,
  isStageKey,
  matchSummary,
  matchUid,
  stageFromSummary,
  type Match,
} from "../src/index.js";

describe("stages", () => {
  it("lists the five stages in season order", () => {
    expect(STAGE_KEYS).toEqual(["kickoff", "masters", "stage1", "stage2", "champions"]);
    expect(STAGE_KEYS.map((key) => STAGES[key].categoryId)).toEqual([45, 46, 1, 16, 47]);
  });

  it("recognises stage keys", () => {
    expect(isStageKey("stage1")).toBe(true);
    expect(isStageKey("playoffs")).toBe(false);
    expect(isStageKey(45)).toBe(false);
  });

  it("finds the stage named in a summary", () => {
    expect(stageFromSummary("VCT 2026 EMEA Stage 2 - FNATIC vs Team Heretics (Lower Final)")).toBe("stage2");
    expect(stageFromSummary("Champions Tour 2026 Champions Paris - A vs B (Grand Final)")).toBe("champions");
    expect(stageFromSummary("Showmatch - A vs B (Match)")).toBeNull();
  });
});

describe("match helpers", () => {
  const match: Match = {
    id: "123456",
    eventName: "VCT 2026 Americas Kickoff",
    phase: "Lower Round 2",
    team1: "Team A",
    team2: "Team B",
    startLocal: null,
    dateText: "",
    url: "https://www.vlr.gg/123456/team-a-vs-team-b-lr2",
  };

  it("derives the UID from the match id", () => {
    expect(matchUid(match)).toBe("match-123456@vlr.gg");
  });

  it("formats the summary", () => {
    expect(matchSummary(match)).toBe("VCT 2026 Americas Kickoff - Team A vs Team B (Lower Round 2)");
  });

  it("needs both scores for a result", () => {
    expect(hasResult(match)).toBe(false);
    expect(hasResult({ ...match, score1: "2" })).toBe(false);
    expect(hasResult({ ...match, score1: "2", score2: "0" })).toBe(true);
  });
});

describe("errors", () => {
  it("carries codes and names", () => {
    const err = new UnknownStageError("playoffs");
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err.code).toBe("UNKNOWN_STAGE");
    expect(err.name).toBe("UnknownStageError");
    expect(err.message).toBe("Unknown stage: playoffs");
  });

  it("appends the line number to parse errors", () => {
    expect(new MalformedCalendarError("Invalid content line: x", 3).message).toBe("Invalid content line: x (line 3)");
    expect(new MalformedCalendarError("Empty calendar document").message).toBe("Empty calendar document");
  });
});
