/**
 * Minimal argv helpers shared by the CLIs.
 */

import { CalendarToolError } from "@vct-calendar/core";

export class UsageError extends CalendarToolError {
  constructor(message: string) {
    super("USAGE", message);
  }
}

export function hasFlag(args: readonly string[], ...names: string[]): boolean {
  return args.some((a) => names.includes(a));
}

/** Value after the last occurrence of `--name`, if any. */
export function flagValue(args: readonly string[], name: string): string | undefined {
  const values = flagValues(args, name);
  return values[values.length - 1];
}

/** Values after every occurrence of `--name`, in order. */
export function flagValues(args: readonly string[], name: string): string[] {
  const values: string[] = [];
  args.forEach((arg, idx) => {
    if (arg !== name) return;
    const value = args[idx + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new UsageError(`${name} requires a value`);
    }
    values.push(value);
  });
  return values;
}
