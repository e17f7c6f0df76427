import { describe, expect, it } from "vitest";

import {
  createdSince,
  LOG_STREAMS_PAGE_SIZE,
  twentyFourHoursAgo,
  walkLogStreams
} from "../src/traversal/logStreams";
import type { LogStream } from "../src/types";
import { createFakeLogsGateway, logStream } from "./fakes";

async function collect(streams: AsyncIterable<LogStream>): Promise<string[]> {
  const names: string[] = [];
  for await (const stream of streams) {
    names.push(stream.name);
  }
  return names;
}

function buildStreams(total: number, creationTime: (index: number) => number): LogStream[] {
  return Array.from({ length: total }, (_, index) =>
    logStream(`stream-${index}`, creationTime(index))
  );
}

describe("walkLogStreams", () => {
  it("requests fixed-size pages and stops at the limit", async () => {
    const gateway = createFakeLogsGateway(buildStreams(12, () => 0));

    const names = await collect(walkLogStreams(gateway, "/app/web", { limit: 3 }));

    expect(names).toEqual(["stream-0", "stream-1", "stream-2"]);
    expect(gateway.streamRequests).toEqual([
      { logGroupName: "/app/web", token: null, pageSize: LOG_STREAMS_PAGE_SIZE }
    ]);
  });

  it("walks every page when no limit is given", async () => {
    const gateway = createFakeLogsGateway(buildStreams(12, () => 0));

    const names = await collect(walkLogStreams(gateway, "/app/web"));

    expect(names).toHaveLength(12);
    expect(gateway.streamRequests.map((request) => request.token)).toEqual([null, "10"]);
  });

  it("counts the limit after filtering each page", async () => {
    const gateway = createFakeLogsGateway(
      buildStreams(12, (index) => (index % 2 === 0 ? 20_000_000 : 1_000))
    );

    const names = await collect(
      walkLogStreams(gateway, "/app/web", {
        limit: 6,
        filter: createdSince(twentyFourHoursAgo(() => 100_000_000))
      })
    );

    expect(names).toEqual([
      "stream-0",
      "stream-2",
      "stream-4",
      "stream-6",
      "stream-8",
      "stream-10"
    ]);
    expect(gateway.streamRequests).toHaveLength(2);
  });
});

describe("twentyFourHoursAgo", () => {
  it("subtracts one day from the clock", () => {
    expect(twentyFourHoursAgo(() => 100_000_000)).toBe(13_600_000);
  });
});
