import { ParameterNameError } from "../errors";

export const MAX_PARAMETER_NAME_LENGTH = 1011;
export const MAX_HIERARCHY_LEVELS = 15;

const RESERVED_PREFIXES = ["aws", "ssm"];
const ALLOWED_CHARACTERS = /^[A-Za-z0-9_.\-/]+$/;
const PARAMETER_ARN = /^arn:aws[a-z-]*:ssm:[a-z0-9-]*:\d*:parameter\/(.+)$/;

export type ParameterNameCheck =
  | { valid: true; name: string }
  | { valid: false; name: string; reason: string };

/** A parameter ARN names `/a/b` as `parameter/a/b` and `a` as `parameter/a`. */
export function nameFromArn(candidate: string): string | null {
  const match = PARAMETER_ARN.exec(candidate);
  if (!match) {
    return null;
  }

  const rest = match[1];
  return rest.includes("/") ? `/${rest}` : rest;
}

function findViolation(name: string): string | null {
  if (name.length === 0) {
    return "name is empty";
  }

  if (name.length > MAX_PARAMETER_NAME_LENGTH) {
    return `name is longer than ${MAX_PARAMETER_NAME_LENGTH} characters`;
  }

  if (!ALLOWED_CHARACTERS.test(name)) {
    return "only letters, digits, '_', '.', '-' and '/' are allowed";
  }

  if (name.includes("/") && !name.startsWith("/")) {
    return "a hierarchical name must be fully qualified (start with '/')";
  }

  const levels = name.startsWith("/") ? name.slice(1).split("/") : [name];

  if (levels.some((level) => level.length === 0)) {
    return "hierarchy levels cannot be empty";
  }

  if (levels.length > MAX_HIERARCHY_LEVELS) {
    return `name has more than ${MAX_HIERARCHY_LEVELS} hierarchy levels`;
  }

  const first = levels[0].toLowerCase();
  const reserved = RESERVED_PREFIXES.find((prefix) => first.startsWith(prefix));
  if (reserved) {
    return `name cannot begin with '${reserved}' (case-insensitive)`;
  }

  return null;
}

export function checkParameterName(candidate: string): ParameterNameCheck {
  const name = nameFromArn(candidate) ?? candidate;
  const reason = findViolation(name);

  return reason === null
    ? { valid: true, name: candidate }
    : { valid: false, name: candidate, reason };
}

export function assertValidParameterName(candidate: string): void {
  const check = checkParameterName(candidate);

  if (!check.valid) {
    throw new ParameterNameError(check.name, check.reason);
  }
}

export function joinParameterPath(basePath: string | undefined, key: string): string {
  if (!basePath) {
    return key;
  }

  const base = basePath.replace(/\/+$/, "");
  return `${base}/${key}`;
}

export function lastPathSegment(name: string): string {
  const segments = name.split("/");
  return segments[segments.length - 1];
}
