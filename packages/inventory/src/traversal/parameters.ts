import {
  DESCRIBE_PARAMETERS_MAX_PAGE_SIZE,
  type ParametersGateway
} from "../api/parametersGateway";
import { fetchParameterValues } from "../sync/parallelFetch";
import type { Parameter, ParameterQuery } from "../types";
import { paginatePages } from "./pagination";

export interface WalkParametersOptions {
  paths?: readonly string[];
  limit?: number;
  withValues?: boolean;
  decrypt?: boolean;
  concurrency: number;
  onValue?: (name: string, value: string) => void;
}

/**
 * A path query lists the direct children of the path, one level deep, and
 * never the parameter named exactly like the path, so every path is also
 * queried as an exact name.
 */
export function buildParameterQueries(
  paths: readonly string[] = []
): ParameterQuery[] {
  const queries: ParameterQuery[] = [];

  for (const raw of paths) {
    const trimmed = raw.trim();
    if (trimmed.length === 0) {
      continue;
    }

    const withoutTrailingSlash = trimmed.replace(/\/+$/, "");

    if (trimmed.startsWith("/")) {
      queries.push({ kind: "path", path: withoutTrailingSlash || "/" });
    }

    if (withoutTrailingSlash.length > 0) {
      queries.push({ kind: "name", name: withoutTrailingSlash });
    }
  }

  return queries.length > 0 ? queries : [{ kind: "all" }];
}

async function attachValues(
  gateway: ParametersGateway,
  parameters: Parameter[],
  options: WalkParametersOptions
): Promise<Parameter[]> {
  const values = await fetchParameterValues(
    gateway,
    parameters.map((parameter) => parameter.name),
    {
      concurrency: options.concurrency,
      decrypt: options.decrypt ?? true,
      onResult: options.onValue
    }
  );

  return parameters.map((parameter) => {
    const value = values.get(parameter.name);
    return value === undefined ? parameter : { ...parameter, value };
  });
}

export async function* walkParameters(
  gateway: ParametersGateway,
  options: WalkParametersOptions
): AsyncGenerator<Parameter, void, undefined> {
  const limit = options.limit;
  const seen = new Set<string>();
  let emitted = 0;

  if (limit !== undefined && limit <= 0) {
    return;
  }

  for (const query of buildParameterQueries(options.paths)) {
    const pages = paginatePages<Parameter>(
      (token, pageSize) =>
        gateway.describeParametersPage({ query, token, pageSize }),
      { maxPageSize: DESCRIBE_PARAMETERS_MAX_PAGE_SIZE }
    );

    for await (const page of pages) {
      const fresh: Parameter[] = [];

      for (const parameter of page) {
        if (limit !== undefined && emitted + fresh.length >= limit) {
          break;
        }

        if (seen.has(parameter.name)) {
          continue;
        }

        seen.add(parameter.name);
        fresh.push(parameter);
      }

      const ready = options.withValues && fresh.length > 0
        ? await attachValues(gateway, fresh, options)
        : fresh;

      for (const parameter of ready) {
        yield parameter;
      }

      emitted += ready.length;
      if (limit !== undefined && emitted >= limit) {
        return;
      }
    }
  }
}
