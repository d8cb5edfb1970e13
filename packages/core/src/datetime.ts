/**
 * Timezone-less wall-clock times.
 *
 * Scraped times carry no offset of their own; the source region's fixed
 * offset is attached only when converting to UTC.
 */

export interface LocalDateTime {
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

/** Western Indonesia Time (WIB), UTC+7. */
export const WIB_OFFSET_MINUTES = 7 * 60;

/** Attach a fixed UTC offset to a wall-clock time. */
export function localToUtc(local: LocalDateTime, offsetMinutes: number = WIB_OFFSET_MINUTES): Date {
  const asUtc = Date.UTC(local.year, local.month - 1, local.day, local.hour, local.minute, local.second);
  return new Date(asUtc - offsetMinutes * 60 * 1000);
}

/** Canonical form, e.g. "2026-01-20T23:00:00". */
export function formatLocalDateTime(local: LocalDateTime): string {
  const date = [pad(local.year, 4), pad(local.month), pad(local.day)].join("-");
  const time = [pad(local.hour), pad(local.minute), pad(local.second)].join(":");
  return `${date}T${time}`;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}
