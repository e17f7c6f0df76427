import type { LogsGateway } from "../api/logsGateway";
import type { LogStream } from "../types";
import { paginate, type PaginationResult } from "./pagination";

export const LOG_STREAMS_PAGE_SIZE = 10;
export const LOG_STREAMS_MAX_PAGE_SIZE = 50;

/** Applied to each whole page as it arrives, before any item is emitted. */
export type LogStreamFilter = (page: readonly LogStream[]) => LogStream[];

export interface WalkLogStreamsOptions {
  limit?: number;
  filter?: LogStreamFilter;
}

export function createdSince(sinceMs: number): LogStreamFilter {
  return (page) => page.filter((stream) => stream.creationTime >= sinceMs);
}

export function twentyFourHoursAgo(now: () => number = Date.now): number {
  return now() - 24 * 60 * 60 * 1000;
}

export function walkLogStreams(
  gateway: LogsGateway,
  logGroupName: string,
  options: WalkLogStreamsOptions = {}
): AsyncGenerator<LogStream, PaginationResult, undefined> {
  const filter = options.filter;

  return paginate<LogStream>(
    async (token, pageSize) => {
      const page = await gateway.describeLogStreamsPage({
        logGroupName,
        token,
        pageSize
      });

      return filter ? { items: filter(page.items), nextToken: page.nextToken } : page;
    },
    {
      limit: options.limit,
      pageSize: LOG_STREAMS_PAGE_SIZE,
      maxPageSize: LOG_STREAMS_MAX_PAGE_SIZE
    }
  );
}
