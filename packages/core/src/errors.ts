/** Base class for the errors that abort a calendar run. */
export class CalendarToolError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad settings: an unknown stage key or an unusable environment override. */
export class ConfigurationError extends CalendarToolError {
  constructor(message: string, code = "INVALID_CONFIG") {
    super(code, message);
  }
}

export class UnknownStageError extends ConfigurationError {
  constructor(public readonly stage: string) {
    super(`Unknown stage: ${stage}`, "UNKNOWN_STAGE");
  }
}

export class MalformedCalendarError extends CalendarToolError {
  constructor(
    message: string,
    public readonly line?: number
  ) {
    super("MALFORMED_CALENDAR", line === undefined ? message : `${message} (line ${line})`);
  }
}
