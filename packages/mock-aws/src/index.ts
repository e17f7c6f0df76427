import { createServer, type IncomingMessage, type ServerResponse } from "node:http";

import {
  buildMockLogEvents,
  buildMockLogStreams,
  buildMockParameters,
  describeParameters,
  getParameter,
  MockServiceError,
  type MockLogEvent,
  type MockParameterFilter,
  type MockParameterType,
  pageLogEvents,
  paginateLogStreams,
  putParameter
} from "./mockData";

const port = Number.parseInt(process.env.PORT ?? "4566", 10);
const totalStreams = Number.parseInt(process.env.MOCK_LOG_STREAMS ?? "25", 10);
const eventsPerStream = Number.parseInt(process.env.MOCK_EVENTS_PER_STREAM ?? "500", 10);
const totalParameters = Number.parseInt(process.env.MOCK_PARAMETERS ?? "40", 10);
const parameterRoot = process.env.MOCK_PARAMETER_ROOT ?? "/mock";

const streams = buildMockLogStreams(totalStreams);
const eventsByStream = new Map<string, MockLogEvent[]>(
  streams.map((stream): [string, MockLogEvent[]] => [
    stream.logStreamName,
    buildMockLogEvents(stream, eventsPerStream)
  ])
);
const parameters = buildMockParameters(parameterRoot, totalParameters);

type JsonBody = Record<string, unknown>;

function writeJson(
  response: ServerResponse,
  statusCode: number,
  payload: unknown
): void {
  response.statusCode = statusCode;
  response.setHeader("Content-Type", "application/x-amz-json-1.1");
  response.end(JSON.stringify(payload));
}

async function readJsonBody(request: IncomingMessage): Promise<JsonBody> {
  const chunks: Buffer[] = [];

  for await (const chunk of request) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }

  const raw = Buffer.concat(chunks).toString("utf8");
  if (!raw) {
    return {};
  }

  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new MockServiceError("SerializationException", "Request body must be an object");
  }

  return Object.fromEntries(Object.entries(parsed));
}

function readString(body: JsonBody, key: string): string | undefined {
  const value = body[key];
  return typeof value === "string" ? value : undefined;
}

function requireString(body: JsonBody, key: string): string {
  const value = readString(body, key);

  if (value === undefined) {
    throw new MockServiceError("ValidationException", `${key} is required`);
  }

  return value;
}

function readNumber(body: JsonBody, key: string, fallback: number): number {
  const value = body[key];
  return typeof value === "number" ? value : fallback;
}

function readFilters(body: JsonBody): MockParameterFilter[] {
  const raw = body.ParameterFilters;
  if (!Array.isArray(raw)) {
    return [];
  }

  return raw.map((entry: unknown) => {
    if (typeof entry !== "object" || entry === null) {
      throw new MockServiceError("ValidationException", "Invalid parameter filter");
    }

    const filter = Object.fromEntries(Object.entries(entry));
    const values = Array.isArray(filter.Values)
      ? filter.Values.filter((value: unknown): value is string => typeof value === "string")
      : undefined;

    return {
      Key: requireString(filter, "Key"),
      Option: readString(filter, "Option"),
      Values: values
    };
  });
}

function toParameterType(value: string | undefined): MockParameterType {
  return value === "StringList" || value === "SecureString" ? value : "String";
}

function handle(target: string, body: JsonBody): unknown {
  switch (target) {
    case "Logs_20140328.DescribeLogStreams":
      return paginateLogStreams(
        streams,
        readNumber(body, "limit", 50),
        readString(body, "nextToken")
      );
    case "Logs_20140328.GetLogEvents": {
      const streamName = requireString(body, "logStreamName");
      const events = eventsByStream.get(streamName);

      if (!events) {
        throw new MockServiceError(
          "ResourceNotFoundException",
          `The specified log stream does not exist: ${streamName}`
        );
      }

      return pageLogEvents(events, {
        limit: readNumber(body, "limit", 10_000),
        startFromHead: body.startFromHead === true,
        token: readString(body, "nextToken")
      });
    }
    case "AmazonSSM.DescribeParameters": {
      const page = describeParameters(
        parameters,
        readFilters(body),
        readNumber(body, "MaxResults", 10),
        readString(body, "NextToken")
      );

      return {
        ...page,
        Parameters: page.Parameters.map((parameter) => ({
          ...parameter,
          LastModifiedDate: parameter.LastModifiedDate / 1000
        }))
      };
    }
    case "AmazonSSM.GetParameter": {
      const parameter = getParameter(parameters, requireString(body, "Name"));
      return {
        Parameter: { ...parameter, LastModifiedDate: parameter.LastModifiedDate / 1000 }
      };
    }
    case "AmazonSSM.PutParameter":
      return {
        Version: putParameter(
          parameters,
          {
            Name: requireString(body, "Name"),
            Value: requireString(body, "Value"),
            Type: toParameterType(readString(body, "Type")),
            Overwrite: body.Overwrite === true
          },
          Date.now()
        ),
        Tier: "Standard"
      };
    default:
      throw new MockServiceError("UnknownOperationException", `Unsupported target: ${target}`);
  }
}

const server = createServer((request, response) => {
  const target = request.headers["x-amz-target"];

  if (request.method !== "POST" || typeof target !== "string") {
    writeJson(response, 404, { __type: "UnknownOperationException", message: "Not Found" });
    return;
  }

  readJsonBody(request)
    .then((body) => writeJson(response, 200, handle(target, body)))
    .catch((error: unknown) => {
      if (error instanceof MockServiceError) {
        writeJson(response, 400, { __type: error.type, message: error.message });
        return;
      }

      writeJson(response, 500, {
        __type: "InternalServerError",
        message: error instanceof Error ? error.message : "Internal error"
      });
    });
});

server.listen(port, "127.0.0.1", () => {
  console.log(
    `mock aws listening on port ${port} (streams=${streams.length}, eventsPerStream=${eventsPerStream}, parameters=${parameters.length})`
  );
});
