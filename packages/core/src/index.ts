/**
 * @vct-calendar/core — match model and iCalendar helpers shared by the scrapers and CLIs.
 */

export { type Tournament, type Match, type Region, REGIONS, SOURCE_DOMAIN, TBD, matchUid, matchSummary, hasResult } from "./match.js";
export { type LocalDateTime, WIB_OFFSET_MINUTES, localToUtc, formatLocalDateTime } from "./datetime.js";
export { type StageKey, type StageDefinition, STAGE_KEYS, STAGES, isStageKey, stageFromSummary } from "./stage.js";
export { CalendarToolError, ConfigurationError, UnknownStageError, MalformedCalendarError } from "./errors.js";
export {
  type CalendarProperty,
  type CalendarComponent,
  type CalendarOptions,
  type EventStatus,
  type UpdateStats,
  type UpdateResult,
  createCalendar,
  parseCalendar,
  serializeCalendar,
  calendarEvents,
  eventsByUid,
  getProperty,
  setProperty,
  matchToEvent,
  matchStatus,
  buildCalendar,
  appendMatches,
  updateMatches,
  stagesInCalendar,
  upcomingStagesInCalendar,
  escapeICalText,
  unescapeICalText,
  toICalDate,
  fromICalDate,
} from "./ical.js";
