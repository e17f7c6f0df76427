import {
  type CloudWatchLogsClient,
  DescribeLogStreamsCommand,
  GetLogEventsCommand
} from "@aws-sdk/client-cloudwatch-logs";

import type { CursorPage, LogEventsPage, LogStream } from "../types";
import { normalizeToken, parseLogEvent, parseLogStream } from "./responseParser";

export interface DescribeLogStreamsPageRequest {
  logGroupName: string;
  token: string | null;
  pageSize: number;
}

export interface GetLogEventsPageRequest {
  logGroupName: string;
  logStreamName: string;
  token: string | null;
  pageSize: number;
  startFromHead: boolean;
  unmask: boolean;
}

export interface LogsGateway {
  describeLogStreamsPage: (
    request: DescribeLogStreamsPageRequest
  ) => Promise<CursorPage<LogStream>>;
  getLogEventsPage: (request: GetLogEventsPageRequest) => Promise<LogEventsPage>;
}

export function createLogsGateway(client: CloudWatchLogsClient): LogsGateway {
  return {
    async describeLogStreamsPage(request) {
      const output = await client.send(
        new DescribeLogStreamsCommand({
          logGroupName: request.logGroupName,
          orderBy: "LastEventTime",
          descending: true,
          limit: request.pageSize,
          nextToken: request.token ?? undefined
        })
      );

      return {
        items: (output.logStreams ?? []).map((stream) => parseLogStream(stream)),
        nextToken: normalizeToken(output.nextToken)
      };
    },

    async getLogEventsPage(request) {
      const output = await client.send(
        new GetLogEventsCommand({
          logGroupName: request.logGroupName,
          logStreamName: request.logStreamName,
          limit: request.pageSize,
          startFromHead: request.startFromHead,
          unmask: request.unmask,
          nextToken: request.token ?? undefined
        })
      );

      return {
        events: (output.events ?? []).map((event) => parseLogEvent(event)),
        nextForwardToken: normalizeToken(output.nextForwardToken),
        nextBackwardToken: normalizeToken(output.nextBackwardToken)
      };
    }
  };
}
