export { StageScraper, scrapeStage } from "./stage.js";
export { fetchTournaments, extractTournaments, tournamentName, inferRegion, resolveStage, directoryUrl, type ResolvedStage } from "./tournaments.js";
export { fetchMatches, extractMatches, ANCHOR_STRATEGIES } from "./matches.js";
export { phaseFromUrl, headingPhases, DEFAULT_PHASE } from "./phase.js";
export { extractTeams, teamsFromTokens, textParts, type TeamsResult } from "./teams.js";
export { extractDateText, parseSourceDateTime } from "./datetime.js";
