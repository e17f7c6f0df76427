import type { LogsGateway } from "../api/logsGateway";
import type { LogEvent } from "../types";
import { paginate, type PaginationResult } from "./pagination";

export const LOG_EVENTS_MAX_PAGE_SIZE = 10_000;

export interface WalkLogEventsOptions {
  logGroupName: string;
  logStreamName: string;
  limit?: number;
  pageSize?: number;
  startFromHead: boolean;
  unmask?: boolean;
}

/**
 * Streams one channel's events. From the head, events arrive oldest first and
 * the walk follows the forward token; from the tail, each page is reversed so
 * events arrive newest first and the walk follows the backward token.
 *
 * The service has no "has more" flag: a token equal to the one sent means the
 * end of the stream.
 */
export function walkLogEvents(
  gateway: LogsGateway,
  options: WalkLogEventsOptions
): AsyncGenerator<LogEvent, PaginationResult, undefined> {
  return paginate<LogEvent>(
    async (token, pageSize) => {
      const page = await gateway.getLogEventsPage({
        logGroupName: options.logGroupName,
        logStreamName: options.logStreamName,
        token,
        pageSize,
        startFromHead: options.startFromHead,
        unmask: options.unmask ?? false
      });

      if (options.startFromHead) {
        return { items: page.events, nextToken: page.nextForwardToken };
      }

      return {
        items: [...page.events].reverse(),
        nextToken: page.nextBackwardToken
      };
    },
    {
      limit: options.limit,
      pageSize: options.pageSize,
      maxPageSize: LOG_EVENTS_MAX_PAGE_SIZE
    }
  );
}
