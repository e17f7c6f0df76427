import type {
  LogStream as SdkLogStream,
  OutputLogEvent
} from "@aws-sdk/client-cloudwatch-logs";
import type {
  Parameter as SdkParameter,
  ParameterMetadata
} from "@aws-sdk/client-ssm";

import { InvalidResponseError } from "../errors";
import type { LogEvent, LogStream, Parameter, ParameterType } from "../types";

const PARAMETER_TYPES: readonly ParameterType[] = [
  "String",
  "StringList",
  "SecureString"
];

function toNullableNumber(value: number | undefined): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function toParameterType(value: string | undefined, name: string): ParameterType {
  const match = PARAMETER_TYPES.find((type) => type === value);

  if (!match) {
    throw new InvalidResponseError(
      `parameter ${name} has unknown type ${value ?? "undefined"}`
    );
  }

  return match;
}

function toDate(value: Date | undefined): Date | null {
  if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
    return null;
  }

  return value;
}

export function parseLogStream(raw: SdkLogStream): LogStream {
  if (!raw.logStreamName) {
    throw new InvalidResponseError("log stream is missing logStreamName");
  }

  const stream: LogStream = {
    name: raw.logStreamName,
    creationTime: toNullableNumber(raw.creationTime) ?? 0,
    firstEventTimestamp: toNullableNumber(raw.firstEventTimestamp),
    lastEventTimestamp: toNullableNumber(raw.lastEventTimestamp)
  };

  if (typeof raw.storedBytes === "number") {
    stream.storedBytes = raw.storedBytes;
  }

  return stream;
}

export function parseLogEvent(raw: OutputLogEvent): LogEvent {
  if (typeof raw.timestamp !== "number") {
    throw new InvalidResponseError("log event is missing timestamp");
  }

  const event: LogEvent = {
    timestamp: raw.timestamp,
    message: raw.message ?? ""
  };

  if (typeof raw.ingestionTime === "number") {
    event.ingestionTime = raw.ingestionTime;
  }

  return event;
}

export function parseParameterMetadata(raw: ParameterMetadata): Parameter {
  if (!raw.Name) {
    throw new InvalidResponseError("parameter is missing Name");
  }

  const parameter: Parameter = {
    name: raw.Name,
    type: toParameterType(raw.Type, raw.Name),
    description: raw.Description ?? "",
    lastModifiedAt: toDate(raw.LastModifiedDate)
  };

  if (typeof raw.Version === "number") {
    parameter.version = raw.Version;
  }

  return parameter;
}

export function parseParameterValue(
  raw: SdkParameter | undefined,
  requestedName: string
): string {
  if (!raw) {
    throw new InvalidResponseError(`no parameter returned for ${requestedName}`);
  }

  if (typeof raw.Value !== "string") {
    throw new InvalidResponseError(`parameter ${requestedName} has no Value`);
  }

  return raw.Value;
}

export function normalizeToken(token: string | undefined): string | null {
  return token ? token : null;
}
