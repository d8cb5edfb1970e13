import { CalendarToolError } from "@vct-calendar/core";

/** A page request answered with a non-success status. */
export class FetchError extends CalendarToolError {
  constructor(
    public readonly url: string,
    public readonly status: number
  ) {
    super("FETCH_FAILED", `Failed to fetch ${url}: ${status}`);
  }
}
