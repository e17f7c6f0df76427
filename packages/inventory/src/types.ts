export interface LogStream {
  name: string;
  creationTime: number;
  firstEventTimestamp: number | null;
  lastEventTimestamp: number | null;
  storedBytes?: number;
}

export interface LogEvent {
  timestamp: number;
  message: string;
  ingestionTime?: number;
}

export type ParameterType = "String" | "StringList" | "SecureString";

export interface Parameter {
  name: string;
  type: ParameterType;
  description: string;
  lastModifiedAt: Date | null;
  version?: number;
  value?: string;
}

export interface CursorPage<T> {
  items: T[];
  nextToken: string | null;
}

export interface LogEventsPage {
  events: LogEvent[];
  nextForwardToken: string | null;
  nextBackwardToken: string | null;
}

export type ParameterQuery =
  | { kind: "all" }
  | { kind: "path"; path: string }
  | { kind: "name"; name: string };

export interface InventoryConfig {
  profile: string | undefined;
  region: string | undefined;
  endpointUrl: string | undefined;
  awsMaxAttempts: number;
  progressLogIntervalMs: number;
  fetchConcurrency: number;
  logLevel: LogLevel;
}

export type LogLevel = "debug" | "info" | "warn" | "error";
