import { JsonReporter } from "./json-reporter.js";
import { TextReporter } from "./text-reporter.js";
import type { ZoneReporter } from "./types.js";

export type OutputFormat = "log" | "text" | "json";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["log", "text", "json"];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Reporter for a format; "log" has none, the log lines are the report.
 */
export function getReporter(format: OutputFormat): ZoneReporter | undefined {
  switch (format) {
    case "text":
      return new TextReporter();
    case "json":
      return new JsonReporter();
    case "log":
      return undefined;
  }
}

export { JsonReporter } from "./json-reporter.js";
export { TextReporter } from "./text-reporter.js";
export type { ZoneReporter } from "./types.js";
