import { type Command, InvalidArgumentError } from "commander";

import type { ConfigOverrides } from "../config";
import type { InventoryContext } from "../context";
import type { ProgramIO } from "./io";

export interface ProgramDependencies {
  createContext: (overrides: ConfigOverrides) => InventoryContext;
  io: ProgramIO;
  setExitCode: (code: number) => void;
}

export type ConnectionOptions = {
  profile?: string;
  region?: string;
  endpointUrl?: string;
};

export function parsePositiveInt(raw: string): number {
  const parsed = Number.parseInt(raw, 10);

  if (Number.isNaN(parsed) || parsed <= 0 || String(parsed) !== raw.trim()) {
    throw new InvalidArgumentError(`expected a positive integer, got ${raw}`);
  }

  return parsed;
}

export function collectValues(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function addConnectionOptions(command: Command): Command {
  return command
    .option("--profile <name>", "named credentials profile (defaults to AWS_PROFILE)")
    .option("--region <region>", "AWS region (defaults to AWS_REGION)")
    .option("--endpoint-url <url>", "service endpoint override, e.g. a local mock");
}

export async function withContext<T>(
  dependencies: ProgramDependencies,
  options: ConnectionOptions,
  run: (context: InventoryContext) => Promise<T>
): Promise<T> {
  const context = dependencies.createContext({
    profile: options.profile,
    region: options.region,
    endpointUrl: options.endpointUrl
  });

  try {
    return await run(context);
  } finally {
    context.close();
  }
}
