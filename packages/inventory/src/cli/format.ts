import { stripVTControlCharacters } from "node:util";

import type { LogEvent, LogStream } from "../types";

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time, `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(epochMs: number): string {
  const date = new Date(epochMs);

  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

/** `H:MM:SS`, prefixed with `N day(s), ` past one day. Fractions are dropped. */
export function formatDuration(totalSeconds: number): string {
  const whole = Math.max(0, Math.floor(totalSeconds));
  const days = Math.floor(whole / 86_400);
  const hours = Math.floor((whole % 86_400) / 3600);
  const minutes = Math.floor((whole % 3600) / 60);
  const seconds = whole % 60;
  const clock = `${hours}:${pad2(minutes)}:${pad2(seconds)}`;

  if (days === 0) {
    return clock;
  }

  return `${days} ${days === 1 ? "day" : "days"}, ${clock}`;
}

export function stripColor(text: string): string {
  return stripVTControlCharacters(text);
}

export function formatLogEventLine(event: LogEvent): string {
  return `${formatTimestamp(event.timestamp)}: ${event.message}\n`;
}

export function formatLogStreamHeader(logGroupName: string, logStreamName: string): string {
  return `${logGroupName} ${logStreamName}\n`;
}

export function logStreamRow(stream: LogStream): string[] {
  const latest =
    stream.lastEventTimestamp === null ? "-" : formatTimestamp(stream.lastEventTimestamp);
  const duration =
    stream.lastEventTimestamp === null || stream.firstEventTimestamp === null
      ? "-"
      : formatDuration(
          (stream.lastEventTimestamp - stream.firstEventTimestamp) / 1000
        );

  return [stream.name, formatTimestamp(stream.creationTime), latest, duration];
}

/** An org-mode table: `| a | b |` rows under a `|---+---|` rule. */
export function formatTable(headers: readonly string[], rows: readonly string[][]): string {
  const widths = headers.map((header, column) =>
    rows.reduce((width, row) => Math.max(width, (row[column] ?? "").length), header.length)
  );

  const renderRow = (cells: readonly string[]): string =>
    `| ${widths.map((width, column) => (cells[column] ?? "").padEnd(width)).join(" | ")} |`;
  const rule = `|${widths.map((width) => "-".repeat(width + 2)).join("+")}|`;

  return [renderRow(headers), rule, ...rows.map((row) => renderRow(row))].join("\n");
}
