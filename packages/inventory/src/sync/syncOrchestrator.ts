import type { ParametersGateway } from "../api/parametersGateway";
import type { Logger } from "../logger";
import { walkParameters } from "../traversal/parameters";
import {
  diff,
  hasPendingChanges,
  type KeyValueDiff,
  pendingWrites
} from "./diff";
import { envEntriesToParameterMap, parseEnvFile } from "./envFile";
import { fetchAll } from "./parallelFetch";
import { assertValidParameterName } from "./parameterNames";
import { createProgressLogger } from "./progressLogger";

export const CONFIRMATION_TOKEN = "yes";

export type SyncState =
  | "LOAD_LOCAL"
  | "QUERY_REMOTE"
  | "DIFF"
  | "DRY_RUN_STOP"
  | "NOTHING_TO_DO"
  | "CONFIRM"
  | "CANCELLED"
  | "APPLY";

export type SyncOutcome =
  | { status: "dry-run"; diff: KeyValueDiff }
  | { status: "nothing-to-do"; diff: KeyValueDiff }
  | { status: "cancelled"; diff: KeyValueDiff }
  | { status: "applied"; diff: KeyValueDiff; written: number };

export interface SyncDependencies {
  gateway: ParametersGateway;
  confirm: (prompt: string, diff: KeyValueDiff) => Promise<string>;
  logger: Logger;
  concurrency: number;
  progressLogIntervalMs: number;
  now?: () => number;
  onState?: (state: SyncState) => void;
}

export interface SyncOptions {
  envContent: string;
  basePath?: string;
  dryRun: boolean;
}

export function loadLocalParameters(
  envContent: string,
  basePath: string | undefined
): Map<string, string> {
  const local = envEntriesToParameterMap(parseEnvFile(envContent), basePath);

  for (const name of local.keys()) {
    assertValidParameterName(name);
  }

  return local;
}

export async function loadRemoteValues(
  gateway: ParametersGateway,
  names: readonly string[],
  concurrency: number
): Promise<Map<string, string>> {
  const remote = new Map<string, string>();

  if (names.length === 0) {
    return remote;
  }

  for await (const parameter of walkParameters(gateway, {
    paths: names,
    withValues: true,
    decrypt: true,
    concurrency
  })) {
    if (parameter.value !== undefined) {
      remote.set(parameter.name, parameter.value);
    }
  }

  return remote;
}

export function buildConfirmationPrompt(
  result: KeyValueDiff,
  basePath: string | undefined
): string {
  const target = basePath ? ` under ${basePath}` : "";
  return `Write ${result.new.size} new and ${result.changed.size} changed parameter(s)${target}? Type "${CONFIRMATION_TOKEN}" to confirm: `;
}

export async function applyWrites(
  writes: ReadonlyMap<string, string>,
  dependencies: SyncDependencies
): Promise<number> {
  const { gateway, logger } = dependencies;
  const progress = createProgressLogger({
    label: "parameter write",
    total: writes.size,
    intervalMs: dependencies.progressLogIntervalMs,
    now: dependencies.now,
    log: logger.info
  });
  let written = 0;

  try {
    await fetchAll(
      [...writes],
      ([name, value]) => gateway.putSecureParameter(name, value),
      {
        concurrency: dependencies.concurrency,
        onResult: ([name], version) => {
          written += 1;
          progress.onItem(name);
          logger.debug(`wrote ${name} (version=${version ?? "unknown"})`);
        }
      }
    );
  } catch (error) {
    logger.error(`parameter write failed after ${written} of ${writes.size} writes`);
    throw error;
  } finally {
    progress.flush();
  }

  return written;
}

export async function runParameterSync(
  dependencies: SyncDependencies,
  options: SyncOptions
): Promise<SyncOutcome> {
  const enter = (state: SyncState): void => {
    dependencies.onState?.(state);
    dependencies.logger.debug(`sync state ${state}`);
  };

  enter("LOAD_LOCAL");
  const local = loadLocalParameters(options.envContent, options.basePath);

  enter("QUERY_REMOTE");
  const remote = await loadRemoteValues(
    dependencies.gateway,
    [...local.keys()],
    dependencies.concurrency
  );

  enter("DIFF");
  const result = diff(local, remote);

  if (options.dryRun) {
    enter("DRY_RUN_STOP");
    return { status: "dry-run", diff: result };
  }

  if (!hasPendingChanges(result)) {
    enter("NOTHING_TO_DO");
    return { status: "nothing-to-do", diff: result };
  }

  enter("CONFIRM");
  const answer = await dependencies.confirm(
    buildConfirmationPrompt(result, options.basePath),
    result
  );

  if (answer !== CONFIRMATION_TOKEN) {
    enter("CANCELLED");
    return { status: "cancelled", diff: result };
  }

  enter("APPLY");
  const written = await applyWrites(pendingWrites(result), dependencies);

  return { status: "applied", diff: result, written };
}
