import { EnvFileFormatError } from "../errors";
import type { Parameter } from "../types";
import { joinParameterPath, lastPathSegment } from "./parameterNames";

export interface EnvEntry {
  key: string;
  value: string;
}

function isSkippable(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.length === 0 || trimmed.startsWith("#");
}

/** Later duplicates of a key win. */
export function parseEnvFile(content: string): EnvEntry[] {
  const entries = new Map<string, string>();
  const lines = content.split(/\r?\n/);

  lines.forEach((line, index) => {
    if (isSkippable(line)) {
      return;
    }

    const separator = line.indexOf("=");
    if (separator === -1) {
      throw new EnvFileFormatError(index + 1, line);
    }

    const key = line.slice(0, separator).trim();
    if (key.length === 0) {
      throw new EnvFileFormatError(index + 1, line);
    }

    entries.set(key, line.slice(separator + 1).trim());
  });

  return [...entries].map(([key, value]) => ({ key, value }));
}

/** Maps `DB_HOST=...` under `/svc` to `/svc/db_host`. */
export function envEntriesToParameterMap(
  entries: readonly EnvEntry[],
  basePath: string | undefined
): Map<string, string> {
  const parameters = new Map<string, string>();

  for (const entry of entries) {
    parameters.set(joinParameterPath(basePath, entry.key.toLowerCase()), entry.value);
  }

  return parameters;
}

export function envKeyForParameter(name: string): string {
  return lastPathSegment(name).toUpperCase();
}

export function formatEnvLine(parameter: Pick<Parameter, "name" | "value">): string {
  return `${envKeyForParameter(parameter.name)}=${parameter.value ?? ""}\n`;
}

export function formatEnvFile(
  parameters: Iterable<Pick<Parameter, "name" | "value">>
): string {
  let content = "";

  for (const parameter of parameters) {
    content += formatEnvLine(parameter);
  }

  return content;
}
