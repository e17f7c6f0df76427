export interface MockLogStream {
  logStreamName: string;
  creationTime: number;
  firstEventTimestamp: number;
  lastEventTimestamp: number;
  storedBytes: number;
}

export interface MockLogEvent {
  timestamp: number;
  message: string;
  ingestionTime: number;
}

export interface MockLogStreamsPage {
  logStreams: MockLogStream[];
  nextToken?: string;
}

export interface MockLogEventsPage {
  events: MockLogEvent[];
  nextForwardToken: string;
  nextBackwardToken: string;
}

export type MockParameterType = "String" | "StringList" | "SecureString";

export interface MockParameter {
  Name: string;
  Type: MockParameterType;
  Value: string;
  Description?: string;
  Version: number;
  LastModifiedDate: number;
}

export interface MockParameterFilter {
  Key: string;
  Option?: string;
  Values?: string[];
}

export interface MockParametersPage {
  Parameters: Array<Omit<MockParameter, "Value">>;
  NextToken?: string;
}

export class MockServiceError extends Error {
  readonly type: string;

  constructor(type: string, message: string) {
    super(message);
    this.name = "MockServiceError";
    this.type = type;
  }
}

const BASE_TIME_MS = 1704067200000;

export function buildMockLogStreams(total: number): MockLogStream[] {
  const streams: MockLogStream[] = [];

  for (let index = 0; index < total; index += 1) {
    const creationTime = BASE_TIME_MS + index * 3_600_000;

    streams.push({
      logStreamName: `app/${index.toString().padStart(4, "0")}`,
      creationTime,
      firstEventTimestamp: creationTime,
      lastEventTimestamp: creationTime + (index + 1) * 60_000,
      storedBytes: (index + 1) * 1024
    });
  }

  return streams;
}

export function buildMockLogEvents(
  stream: MockLogStream,
  total: number
): MockLogEvent[] {
  const events: MockLogEvent[] = [];

  for (let index = 0; index < total; index += 1) {
    const timestamp = stream.firstEventTimestamp + index * 1000;
    const level = index % 5 === 0 ? "\u001b[33mWARN\u001b[0m" : "INFO";

    events.push({
      timestamp,
      message: `${level} ${stream.logStreamName} event ${index}`,
      ingestionTime: timestamp + 250
    });
  }

  return events;
}

export function buildMockParameters(root: string, total: number): MockParameter[] {
  const parameters: MockParameter[] = [
    {
      Name: `${root}/service-0`,
      Type: "String",
      Value: "service-0",
      Description: "parameter named like its own path",
      Version: 1,
      LastModifiedDate: BASE_TIME_MS
    }
  ];

  for (let index = 0; index < total; index += 1) {
    parameters.push({
      Name: `${root}/service-${index % 3}/key_${index}`,
      Type: index % 2 === 0 ? "SecureString" : "String",
      Value: `value-${index}`,
      Version: 1,
      LastModifiedDate: BASE_TIME_MS + index * 60_000
    });
  }

  return parameters;
}

function encodeOffset(value: number): string {
  return Buffer.from(String(value), "utf8").toString("base64");
}

function decodeOffset(token: string): number {
  const decoded = Buffer.from(token, "base64").toString("utf8");
  const parsed = Number.parseInt(decoded, 10);

  if (Number.isNaN(parsed) || parsed < 0) {
    throw new MockServiceError("InvalidParameterException", `Invalid token: ${token}`);
  }

  return parsed;
}

function offsetPage<T>(
  items: T[],
  limit: number,
  token: string | undefined
): { page: T[]; nextToken?: string } {
  const startIndex = token ? decodeOffset(token) : 0;
  const endIndex = Math.min(startIndex + Math.max(limit, 1), items.length);
  const page = items.slice(startIndex, endIndex);

  return endIndex < items.length
    ? { page, nextToken: encodeOffset(endIndex) }
    : { page };
}

export function paginateLogStreams(
  streams: MockLogStream[],
  limit: number,
  token: string | undefined
): MockLogStreamsPage {
  const ordered = [...streams].sort(
    (a, b) => b.lastEventTimestamp - a.lastEventTimestamp
  );
  const { page, nextToken } = offsetPage(ordered, limit, token);

  return nextToken ? { logStreams: page, nextToken } : { logStreams: page };
}

function parseEventToken(token: string): { direction: "f" | "b"; index: number } {
  const match = /^([fb])\/(\d+)$/.exec(token);

  if (!match) {
    throw new MockServiceError("InvalidParameterException", `Invalid token: ${token}`);
  }

  return {
    direction: match[1] === "f" ? "f" : "b",
    index: Number.parseInt(match[2], 10)
  };
}

function eventToken(direction: "f" | "b", index: number): string {
  return `${direction}/${index.toString().padStart(12, "0")}`;
}

/**
 * Reads a window of events. At either end of the stream the token pointing
 * past that end is returned unchanged, which is how callers detect the end.
 */
export function pageLogEvents(
  events: MockLogEvent[],
  options: { limit: number; startFromHead: boolean; token?: string }
): MockLogEventsPage {
  const limit = Math.max(1, options.limit);
  let start: number;
  let end: number;

  if (options.token) {
    const { direction, index } = parseEventToken(options.token);
    const bounded = Math.min(Math.max(index, 0), events.length);

    if (direction === "f") {
      start = bounded;
      end = Math.min(start + limit, events.length);
    } else {
      end = bounded;
      start = Math.max(0, end - limit);
    }
  } else if (options.startFromHead) {
    start = 0;
    end = Math.min(limit, events.length);
  } else {
    end = events.length;
    start = Math.max(0, end - limit);
  }

  return {
    events: events.slice(start, end),
    nextForwardToken: eventToken("f", end),
    nextBackwardToken: eventToken("b", start)
  };
}

function matchesFilter(name: string, filter: MockParameterFilter): boolean {
  const values = filter.Values ?? [];

  switch (filter.Key) {
    case "Path":
      return values.some((path) => {
        const prefix = path === "/" ? "/" : `${path.replace(/\/+$/, "")}/`;
        if (!name.startsWith(prefix)) {
          return false;
        }

        return filter.Option === "OneLevel"
          ? !name.slice(prefix.length).includes("/")
          : true;
      });
    case "Name":
      return filter.Option === "BeginsWith"
        ? values.some((value) => name.startsWith(value))
        : values.includes(name);
    default:
      throw new MockServiceError(
        "InvalidFilterKey",
        `Unsupported filter key: ${filter.Key}`
      );
  }
}

export function describeParameters(
  parameters: MockParameter[],
  filters: MockParameterFilter[],
  maxResults: number,
  token: string | undefined
): MockParametersPage {
  const matching = parameters
    .filter((parameter) => filters.every((filter) => matchesFilter(parameter.Name, filter)))
    .sort((a, b) => (a.Name < b.Name ? -1 : a.Name > b.Name ? 1 : 0))
    .map(({ Value: _value, ...metadata }) => metadata);
  const { page, nextToken } = offsetPage(matching, maxResults, token);

  return nextToken ? { Parameters: page, NextToken: nextToken } : { Parameters: page };
}

export function getParameter(
  parameters: MockParameter[],
  name: string
): MockParameter {
  const parameter = parameters.find((candidate) => candidate.Name === name);

  if (!parameter) {
    throw new MockServiceError("ParameterNotFound", `Parameter ${name} not found.`);
  }

  return parameter;
}

export function putParameter(
  parameters: MockParameter[],
  input: { Name: string; Value: string; Type: MockParameterType; Overwrite?: boolean },
  nowMs: number
): number {
  const existing = parameters.find((candidate) => candidate.Name === input.Name);

  if (existing && !input.Overwrite) {
    throw new MockServiceError(
      "ParameterAlreadyExists",
      `The parameter ${input.Name} already exists.`
    );
  }

  if (existing) {
    existing.Value = input.Value;
    existing.Type = input.Type;
    existing.Version += 1;
    existing.LastModifiedDate = nowMs;
    return existing.Version;
  }

  parameters.push({
    Name: input.Name,
    Type: input.Type,
    Value: input.Value,
    Version: 1,
    LastModifiedDate: nowMs
  });

  return 1;
}
