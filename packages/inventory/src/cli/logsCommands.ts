import { type Command, Option } from "commander";

import type { InventoryContext } from "../context";
import { walkLogEvents } from "../traversal/logEvents";
import {
  createdSince,
  twentyFourHoursAgo,
  walkLogStreams
} from "../traversal/logStreams";
import type { LogEvent, LogStream } from "../types";
import {
  formatLogEventLine,
  formatLogStreamHeader,
  formatTable,
  logStreamRow,
  stripColor
} from "./format";
import type { OutputSink } from "./output";
import {
  addConnectionOptions,
  type ConnectionOptions,
  parsePositiveInt,
  type ProgramDependencies,
  withContext
} from "./shared";

export type LogStreamListFormat = "table" | "json" | "lines";

export interface LogStreamRecord {
  logStreamName: string;
  creationTime: number;
  firstEventTimestamp?: number;
  lastEventTimestamp?: number;
  storedBytes?: number;
}

/** The stream under the service's own field names; absent timestamps are left out. */
export function toLogStreamRecord(stream: LogStream): LogStreamRecord {
  const record: LogStreamRecord = {
    logStreamName: stream.name,
    creationTime: stream.creationTime
  };

  if (stream.firstEventTimestamp !== null) {
    record.firstEventTimestamp = stream.firstEventTimestamp;
  }
  if (stream.lastEventTimestamp !== null) {
    record.lastEventTimestamp = stream.lastEventTimestamp;
  }
  if (stream.storedBytes !== undefined) {
    record.storedBytes = stream.storedBytes;
  }

  return record;
}

export const LOG_STREAM_TABLE_HEADERS = [
  "name",
  "created at",
  "latest event at",
  "duration"
];

export interface ListLogStreamsOptions {
  logGroupName: string;
  limit?: number;
  today: boolean;
  format: LogStreamListFormat;
  now?: () => number;
}

export interface PrintLogStreamsOptions {
  logGroupName: string;
  streamNames: readonly string[];
  startFromHead: boolean;
  limit?: number;
  pageSize?: number;
  color: boolean;
}

type LogsGroupOptions = ConnectionOptions & {
  logGroupName: string;
};

type ReadCommandOptions = LogsGroupOptions & {
  pager: boolean;
  color: boolean;
  lines?: number;
  pageSize?: number;
};

export async function listLogStreams(
  context: InventoryContext,
  sink: OutputSink,
  options: ListLogStreamsOptions
): Promise<void> {
  const filter = options.today
    ? createdSince(twentyFourHoursAgo(options.now))
    : undefined;
  const streams = walkLogStreams(context.logs, options.logGroupName, {
    limit: options.limit,
    filter
  });

  if (options.format === "lines") {
    for await (const stream of streams) {
      await sink.write(`${stream.name}\n`);
    }
    return;
  }

  const collected: LogStream[] = [];
  for await (const stream of streams) {
    collected.push(stream);
  }

  if (options.format === "json") {
    await sink.write(`${JSON.stringify(collected.map(toLogStreamRecord))}\n`);
    return;
  }

  await sink.write(
    `${formatTable(LOG_STREAM_TABLE_HEADERS, collected.map((stream) => logStreamRow(stream)))}\n`
  );
}

async function* resolveStreamNames(
  context: InventoryContext,
  logGroupName: string,
  streamNames: readonly string[]
): AsyncGenerator<string, void, undefined> {
  if (streamNames.length > 0) {
    yield* streamNames;
    return;
  }

  for await (const stream of walkLogStreams(context.logs, logGroupName)) {
    yield stream.name;
  }
}

async function collectOldestFirst(
  newestFirst: AsyncIterable<LogEvent>
): Promise<LogEvent[]> {
  const events: LogEvent[] = [];
  for await (const event of newestFirst) {
    events.push(event);
  }

  return events.reverse();
}

/**
 * Prints each stream as a header, one line per event and a blank line. Events
 * read from the tail are buffered (at most `limit`) and printed oldest first.
 */
export async function printLogStreams(
  context: InventoryContext,
  sink: OutputSink,
  options: PrintLogStreamsOptions
): Promise<void> {
  for await (const logStreamName of resolveStreamNames(
    context,
    options.logGroupName,
    options.streamNames
  )) {
    await sink.write(formatLogStreamHeader(options.logGroupName, logStreamName));

    if (!options.color) {
      context.logger.debug(`removing color from ${logStreamName}`);
    }

    const events = walkLogEvents(context.logs, {
      logGroupName: options.logGroupName,
      logStreamName,
      limit: options.limit,
      pageSize: options.pageSize,
      startFromHead: options.startFromHead
    });
    const ordered = options.startFromHead ? events : await collectOldestFirst(events);

    for await (const event of ordered) {
      const line = formatLogEventLine(event);
      await sink.write(options.color ? line : stripColor(line));
    }

    await sink.write("\n");
  }
}

function addReadOptions(command: Command): Command {
  return command
    .argument("[streams...]", "log stream names (all streams when omitted)")
    .option("--no-pager", "write straight to stdout")
    .option("--no-color", "strip ANSI color codes from messages");
}

export function registerLogsCommands(
  program: Command,
  dependencies: ProgramDependencies
): void {
  const { io } = dependencies;
  const logs = addConnectionOptions(
    program.command("logs").description("List and read CloudWatch log streams")
  ).requiredOption("--log-group-name <name>", "log group to read");

  const runRead = async (
    streamNames: string[],
    options: ReadCommandOptions,
    mode: Pick<PrintLogStreamsOptions, "startFromHead" | "limit" | "pageSize">
  ): Promise<void> => {
    await withContext(dependencies, options, async (context) => {
      const usePager = options.pager && io.stdoutIsTTY;
      const sink = usePager ? io.openPager() : io.stdout;

      try {
        await printLogStreams(context, sink, {
          logGroupName: options.logGroupName,
          streamNames,
          color: options.color,
          ...mode
        });
      } finally {
        if (usePager) {
          await sink.close();
        }
      }
    });
  };

  logs
    .command("ls")
    .description("List log streams, most recent activity first")
    .option("-n, --lines <count>", "maximum number of streams", parsePositiveInt, 20)
    .option("--today", "only streams created in the last 24 hours", false)
    .addOption(
      new Option("--format <format>", "output format")
        .choices(["table", "json", "lines"])
        .default("table")
    )
    .action(async (_options: unknown, command: Command) => {
      const options = command.optsWithGlobals<
        LogsGroupOptions & { lines: number; today: boolean; format: LogStreamListFormat }
      >();

      await withContext(dependencies, options, (context) =>
        listLogStreams(context, io.stdout, {
          logGroupName: options.logGroupName,
          limit: options.lines,
          today: options.today,
          format: options.format
        })
      );
    });

  addReadOptions(logs.command("cat").description("Print whole log streams, earliest first"))
    .option("--page-size <count>", "events per request", parsePositiveInt)
    .action(async (streams: string[], _options: unknown, command: Command) => {
      const options = command.optsWithGlobals<ReadCommandOptions>();
      await runRead(streams, options, {
        startFromHead: true,
        pageSize: options.pageSize
      });
    });

  addReadOptions(logs.command("head").description("Print the first events of log streams"))
    .option("-n, --lines <count>", "number of events", parsePositiveInt, 10)
    .action(async (streams: string[], _options: unknown, command: Command) => {
      const options = command.optsWithGlobals<ReadCommandOptions>();
      await runRead(streams, options, { startFromHead: true, limit: options.lines });
    });

  addReadOptions(logs.command("tail").description("Print the last events of log streams"))
    .option("-n, --lines <count>", "number of events", parsePositiveInt, 10)
    .action(async (streams: string[], _options: unknown, command: Command) => {
      const options = command.optsWithGlobals<ReadCommandOptions>();
      await runRead(streams, options, { startFromHead: false, limit: options.lines });
    });
}
