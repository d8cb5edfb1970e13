/**
 * Read and write iCalendar documents holding VCT matches.
 *
 * Documents are kept as a tree of components with ordered properties, so a
 * file written by another tool survives a read/modify/write cycle with its
 * unknown properties and components intact.
 */

import { localToUtc, WIB_OFFSET_MINUTES } from "./datetime.js";
import { MalformedCalendarError } from "./errors.js";
import { hasResult, matchSummary, matchUid, type Match } from "./match.js";
import { stageFromSummary, type StageKey } from "./stage.js";

export interface CalendarProperty {
  name: string;
  /** Raw parameters, e.g. ["VALUE=DATE"]. */
  params: string[];
  /** Value as it appears in the file (still escaped). */
  value: string;
}

export interface CalendarComponent {
  type: string;
  properties: CalendarProperty[];
  components: CalendarComponent[];
}

export type EventStatus = "CONFIRMED" | "TENTATIVE";

export interface CalendarOptions {
  /** DTSTAMP for entries written in this run. Defaults to the current time. */
  now?: Date;
  /** UTC offset of the scraped wall-clock times. Defaults to WIB. */
  offsetMinutes?: number;
  /** Length of a calendar entry. Defaults to two hours. */
  durationMinutes?: number;
}

export interface UpdateStats {
  updated: number;
  unchanged: number;
  skippedNew: number;
  skippedNoTime: number;
}

export interface UpdateResult {
  stats: UpdateStats;
  /** One entry per updated UID, listing what changed. */
  changes: { uid: string; changes: string[] }[];
}

const DEFAULT_DURATION_MINUTES = 120;
/** RFC 5545 line limit, in UTF-8 octets, excluding the CRLF. */
const MAX_LINE_OCTETS = 75;

const encoder = new TextEncoder();

// ---- document ----

/** An empty VCALENDAR with the headers every generated file carries. */
export function createCalendar(): CalendarComponent {
  return {
    type: "VCALENDAR",
    properties: [
      prop("PRODID", "-//VCT 2026 Calendar//vlr.gg//EN"),
      prop("VERSION", "2.0"),
      prop("CALSCALE", "GREGORIAN"),
      prop("METHOD", "PUBLISH"),
      prop("X-WR-CALNAME", "Valorant Champions Tour"),
      prop("X-WR-TIMEZONE", "UTC"),
    ],
    components: [],
  };
}

/** Parse a full VCALENDAR document. Throws MalformedCalendarError. */
export function parseCalendar(text: string): CalendarComponent {
  // Unfold continuation lines (RFC 5545 §3.1)
  const lines = text.replace(/\r?\n[ \t]/g, "").split(/\r?\n/);
  const stack: CalendarComponent[] = [];
  let root: CalendarComponent | null = null;

  for (let idx = 0; idx < lines.length; idx++) {
    const line = lines[idx];
    const lineNo = idx + 1;
    if (!line.trim()) continue;
    if (root) throw new MalformedCalendarError("Content after END:VCALENDAR", lineNo);

    const property = parseLine(line, lineNo);
    const current = stack[stack.length - 1];

    if (property.name === "BEGIN") {
      const type = property.value.trim().toUpperCase();
      if (!current && type !== "VCALENDAR") {
        throw new MalformedCalendarError("Document does not start with BEGIN:VCALENDAR", lineNo);
      }
      const component: CalendarComponent = { type, properties: [], components: [] };
      current?.components.push(component);
      stack.push(component);
      continue;
    }

    if (!current) {
      throw new MalformedCalendarError("Document does not start with BEGIN:VCALENDAR", lineNo);
    }

    if (property.name === "END") {
      const type = property.value.trim().toUpperCase();
      if (type !== current.type) {
        throw new MalformedCalendarError(`END:${type} does not close BEGIN:${current.type}`, lineNo);
      }
      stack.pop();
      if (stack.length === 0) root = current;
      continue;
    }

    current.properties.push(property);
  }

  if (!root) {
    throw new MalformedCalendarError(
      stack.length > 0 ? `Unterminated ${stack[stack.length - 1].type}` : "Empty calendar document"
    );
  }
  return root;
}

/** Render a document with CRLF line endings and folded long lines. */
export function serializeCalendar(calendar: CalendarComponent): string {
  return serializeComponent(calendar).map(foldLine).join("\r\n") + "\r\n";
}

/** All VEVENT components of a document, in file order. */
export function calendarEvents(calendar: CalendarComponent): CalendarComponent[] {
  return calendar.components.filter((c) => c.type === "VEVENT");
}

/** Map of UID → VEVENT. The first event wins when a UID repeats. */
export function eventsByUid(calendar: CalendarComponent): Map<string, CalendarComponent> {
  const byUid = new Map<string, CalendarComponent>();
  for (const event of calendarEvents(calendar)) {
    const uid = getProperty(event, "UID");
    if (uid && !byUid.has(uid)) byUid.set(uid, event);
  }
  return byUid;
}

export function getProperty(component: CalendarComponent, name: string): string | undefined {
  return component.properties.find((p) => p.name === name)?.value;
}

/** Replace the first property of that name (dropping its parameters), or append it. */
export function setProperty(component: CalendarComponent, name: string, value: string): void {
  const existing = component.properties.find((p) => p.name === name);
  if (existing) {
    existing.params = [];
    existing.value = value;
  } else {
    component.properties.push(prop(name, value));
  }
}

// ---- matches ----

/** Build a VEVENT for a match, or null when its start time is unknown. */
export function matchToEvent(match: Match, options: CalendarOptions = {}): CalendarComponent | null {
  if (!match.startLocal) return null;

  const start = localToUtc(match.startLocal, options.offsetMinutes ?? WIB_OFFSET_MINUTES);
  const durationMs = (options.durationMinutes ?? DEFAULT_DURATION_MINUTES) * 60 * 1000;
  const end = new Date(start.getTime() + durationMs);

  return {
    type: "VEVENT",
    properties: [
      prop("UID", matchUid(match)),
      prop("SUMMARY", escapeICalText(matchSummary(match))),
      prop("DTSTART", toICalDate(start)),
      prop("DTEND", toICalDate(end)),
      prop("DESCRIPTION", escapeICalText(`Watch: ${match.url}`)),
      prop("URL", match.url),
      prop("DTSTAMP", toICalDate(options.now ?? new Date())),
      prop("STATUS", matchStatus(match)),
    ],
    components: [],
  };
}

export function matchStatus(match: Match): EventStatus {
  return hasResult(match) ? "CONFIRMED" : "TENTATIVE";
}

/** A fresh calendar with one entry per schedulable match. */
export function buildCalendar(matches: readonly Match[], options: CalendarOptions = {}): CalendarComponent {
  const calendar = createCalendar();
  appendMatches(calendar, matches, options);
  return calendar;
}

/**
 * Add entries for matches whose UID is not in the calendar yet.
 * Mutates `calendar`; returns the matches that were added.
 */
export function appendMatches(
  calendar: CalendarComponent,
  matches: readonly Match[],
  options: CalendarOptions = {}
): Match[] {
  const known = new Set(eventsByUid(calendar).keys());
  const added: Match[] = [];

  for (const match of matches) {
    const uid = matchUid(match);
    if (known.has(uid)) continue;

    const event = matchToEvent(match, options);
    if (!event) continue;

    calendar.components.push(event);
    known.add(uid);
    added.push(match);
  }

  return added;
}

/**
 * Refresh summary, times and status of entries that already exist.
 * Never adds or removes entries. Mutates `calendar`.
 */
export function updateMatches(
  calendar: CalendarComponent,
  matches: readonly Match[],
  options: CalendarOptions = {}
): UpdateResult {
  const existing = eventsByUid(calendar);
  const now = options.now ?? new Date();
  const result: UpdateResult = {
    stats: { updated: 0, unchanged: 0, skippedNew: 0, skippedNoTime: 0 },
    changes: [],
  };

  for (const match of matches) {
    const uid = matchUid(match);
    const current = existing.get(uid);
    if (!current) {
      result.stats.skippedNew++;
      continue;
    }

    const fresh = matchToEvent(match, { ...options, now });
    if (!fresh) {
      result.stats.skippedNoTime++;
      continue;
    }

    const changes = diffEvents(current, fresh);
    if (changes.length === 0) {
      result.stats.unchanged++;
      continue;
    }

    for (const name of ["SUMMARY", "DTSTART", "DTEND", "STATUS", "DTSTAMP"]) {
      const value = getProperty(fresh, name);
      if (value !== undefined) setProperty(current, name, value);
    }
    result.stats.updated++;
    result.changes.push({ uid, changes });
  }

  return result;
}

/** Stages that have at least one entry in the calendar. */
export function stagesInCalendar(calendar: CalendarComponent): Set<StageKey> {
  const stages = new Set<StageKey>();
  for (const event of calendarEvents(calendar)) {
    const stage = stageFromSummary(unescapeICalText(getProperty(event, "SUMMARY") ?? ""));
    if (stage) stages.add(stage);
  }
  return stages;
}

/** Stages with at least one entry ending (or, without DTEND, starting) at or after `now`. */
export function upcomingStagesInCalendar(calendar: CalendarComponent, now: Date = new Date()): Set<StageKey> {
  const stages = new Set<StageKey>();
  for (const event of calendarEvents(calendar)) {
    const stage = stageFromSummary(unescapeICalText(getProperty(event, "SUMMARY") ?? ""));
    if (!stage) continue;

    const raw = getProperty(event, "DTEND") ?? getProperty(event, "DTSTART");
    const when = raw ? fromICalDate(raw) : null;
    if (when && when.getTime() >= now.getTime()) stages.add(stage);
  }
  return stages;
}

// ---- helpers ----

function diffEvents(current: CalendarComponent, fresh: CalendarComponent): string[] {
  const changes: string[] = [];

  const oldSummary = unescapeICalText(getProperty(current, "SUMMARY") ?? "");
  const newSummary = unescapeICalText(getProperty(fresh, "SUMMARY") ?? "");
  if (oldSummary !== newSummary) changes.push(`summary: '${oldSummary}' → '${newSummary}'`);

  const oldStart = getProperty(current, "DTSTART");
  const newStart = getProperty(fresh, "DTSTART");
  if (oldStart && newStart && !sameInstant(oldStart, newStart)) {
    changes.push(`time: ${describeDate(oldStart)} → ${describeDate(newStart)}`);
  }

  const oldStatus = getProperty(current, "STATUS") ?? "";
  const newStatus = getProperty(fresh, "STATUS") ?? "";
  if (oldStatus !== newStatus) changes.push(`status: ${oldStatus} → ${newStatus}`);

  return changes;
}

function sameInstant(a: string, b: string): boolean {
  const da = fromICalDate(a);
  const db = fromICalDate(b);
  if (!da || !db) return a === b;
  return da.getTime() === db.getTime();
}

function describeDate(value: string): string {
  return fromICalDate(value)?.toISOString() ?? value;
}

function prop(name: string, value: string): CalendarProperty {
  return { name, params: [], value };
}

function parseLine(line: string, lineNo: number): CalendarProperty {
  // Parameter values may be quoted and contain ":" or ";"
  let inQuotes = false;
  let colonIdx = -1;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '"') inQuotes = !inQuotes;
    else if (ch === ":" && !inQuotes) {
      colonIdx = i;
      break;
    }
  }
  if (colonIdx < 1) throw new MalformedCalendarError(`Invalid content line: ${line}`, lineNo);

  const [name, ...params] = line.slice(0, colonIdx).split(";");
  return { name: name.trim().toUpperCase(), params, value: line.slice(colonIdx + 1) };
}

function serializeComponent(component: CalendarComponent): string[] {
  return [
    `BEGIN:${component.type}`,
    ...component.properties.map((p) => [p.name, ...p.params].join(";") + ":" + p.value),
    ...component.components.flatMap(serializeComponent),
    `END:${component.type}`,
  ];
}

function foldLine(line: string): string {
  if (encoder.encode(line).length <= MAX_LINE_OCTETS) return line;

  // Continuation lines start with a space, which counts towards the limit
  const chunks: string[] = [];
  let chunk = "";
  let octets = 0;
  let limit = MAX_LINE_OCTETS;
  for (const char of line) {
    const size = encoder.encode(char).length;
    if (octets + size > limit) {
      chunks.push(chunk);
      chunk = "";
      octets = 0;
      limit = MAX_LINE_OCTETS - 1;
    }
    chunk += char;
    octets += size;
  }
  chunks.push(chunk);
  return chunks.join("\r\n ");
}

export function escapeICalText(text: string): string {
  return text
    .replace(/\\/g, "\\\\")
    .replace(/;/g, "\\;")
    .replace(/,/g, "\\,")
    .replace(/\n/g, "\\n");
}

export function unescapeICalText(text: string): string {
  return text
    .replace(/\\n/gi, "\n")
    .replace(/\\,/g, ",")
    .replace(/\\;/g, ";")
    .replace(/\\\\/g, "\\");
}

/** 2026-01-20T16:00:00.000Z -> 20260120T160000Z */
export function toICalDate(date: Date): string {
  return date.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
}

/**
 * Parse a DATE-TIME or DATE value. Floating and TZID-qualified times are
 * read as UTC; date-only values as midnight UTC.
 */
export function fromICalDate(ical: string): Date | null {
  const m = ical.match(/^(\d{4})(\d{2})(\d{2})(?:T(\d{2})(\d{2})(\d{2})Z?)?$/);
  if (!m) return null;
  const [, y, mo, d, h = "0", mi = "0", s = "0"] = m;
  return new Date(Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s)));
}
