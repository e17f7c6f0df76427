import { type Command, Option } from "commander";

import type { InventoryContext } from "../context";
import type { KeyValueDiff } from "../sync/diff";
import { formatEnvLine } from "../sync/envFile";
import { checkParameterName } from "../sync/parameterNames";
import { createProgressLogger } from "../sync/progressLogger";
import { runParameterSync, type SyncOutcome } from "../sync/syncOrchestrator";
import { walkParameters } from "../traversal/parameters";
import type { Parameter } from "../types";
import { formatTable, formatTimestamp } from "./format";
import type { ConfirmPrompt } from "./confirm";
import { STDIO_PATH } from "./io";
import type { OutputSink } from "./output";
import {
  addConnectionOptions,
  collectValues,
  type ConnectionOptions,
  parsePositiveInt,
  type ProgramDependencies,
  withContext
} from "./shared";

export type ParameterSortKey = "name" | "modified";

export const PARAMETER_TABLE_HEADERS = ["name", "type", "description", "modified at"];

export interface ListParametersOptions {
  paths: readonly string[];
  limit?: number;
  sort?: ParameterSortKey;
}

export interface PullParametersOptions {
  paths: readonly string[];
  decrypt: boolean;
}

export interface PushParametersOptions {
  envContent: string;
  basePath?: string;
  dryRun: boolean;
}

type ListCommandOptions = ConnectionOptions & {
  path?: string[];
  lines?: number;
  sort?: ParameterSortKey;
};

type PullCommandOptions = ConnectionOptions & {
  path?: string[];
  decrypt: boolean;
};

type PushCommandOptions = ConnectionOptions & {
  path?: string;
  dryRun: boolean;
};

function compareParameters(sort: ParameterSortKey): (a: Parameter, b: Parameter) => number {
  if (sort === "name") {
    return (a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);
  }

  return (a, b) =>
    (a.lastModifiedAt?.getTime() ?? 0) - (b.lastModifiedAt?.getTime() ?? 0);
}

export function parameterRow(parameter: Parameter): string[] {
  return [
    parameter.name,
    parameter.type,
    parameter.description,
    parameter.lastModifiedAt ? formatTimestamp(parameter.lastModifiedAt.getTime()) : "-"
  ];
}

export async function listParameters(
  context: InventoryContext,
  sink: OutputSink,
  options: ListParametersOptions
): Promise<void> {
  const parameters: Parameter[] = [];

  for await (const parameter of walkParameters(context.parameters, {
    paths: options.paths,
    limit: options.limit,
    concurrency: context.config.fetchConcurrency
  })) {
    parameters.push(parameter);
  }

  if (options.sort) {
    parameters.sort(compareParameters(options.sort));
  }

  await sink.write(
    `${formatTable(PARAMETER_TABLE_HEADERS, parameters.map((parameter) => parameterRow(parameter)))}\n`
  );
}

export async function pullParameters(
  context: InventoryContext,
  sink: OutputSink,
  options: PullParametersOptions
): Promise<number> {
  const { logger } = context;
  const progress = createProgressLogger({
    label: "parameter value fetch",
    intervalMs: context.config.progressLogIntervalMs,
    log: logger.info
  });
  let exported = 0;

  for await (const parameter of walkParameters(context.parameters, {
    paths: options.paths,
    withValues: true,
    decrypt: options.decrypt,
    concurrency: context.config.fetchConcurrency,
    onValue: (name) => {
      progress.onItem(name);
      logger.debug(`got value for ${name}`);
    }
  })) {
    await sink.write(formatEnvLine(parameter));
    exported += 1;
  }

  progress.flush();
  return exported;
}

export function formatDiffReport(result: KeyValueDiff): string {
  const sorted = (keys: Iterable<string>): string[] => [...keys].sort();
  const lines = [
    ...sorted(result.new.keys()).map((key) => `new       ${key}`),
    ...sorted(result.changed.keys()).map((key) => `changed   ${key}`),
    ...sorted(result.unchanged.keys()).map((key) => `unchanged ${key}`)
  ];

  return lines.map((line) => `${line}\n`).join("");
}

export function describeOutcome(outcome: SyncOutcome): string {
  switch (outcome.status) {
    case "dry-run":
      return "dry run: no parameters written";
    case "nothing-to-do":
      return "nothing to do";
    case "cancelled":
      return "cancelled: no parameters written";
    case "applied":
      return `wrote ${outcome.written} parameter(s)`;
  }
}

export async function pushParameters(
  context: InventoryContext,
  sink: OutputSink,
  confirm: ConfirmPrompt,
  options: PushParametersOptions
): Promise<SyncOutcome> {
  let reported = false;
  const report = async (result: KeyValueDiff): Promise<void> => {
    reported = true;
    await sink.write(formatDiffReport(result));
  };

  const outcome = await runParameterSync(
    {
      gateway: context.parameters,
      confirm: async (prompt, result) => {
        await report(result);
        return confirm(prompt);
      },
      logger: context.logger,
      concurrency: context.config.fetchConcurrency,
      progressLogIntervalMs: context.config.progressLogIntervalMs
    },
    options
  );

  if (!reported) {
    await report(outcome.diff);
  }

  await sink.write(`${describeOutcome(outcome)}\n`);
  return outcome;
}

export function registerParameterCommands(
  program: Command,
  dependencies: ProgramDependencies
): void {
  const { io } = dependencies;
  const params = addConnectionOptions(
    program.command("params").description("List, export, validate and sync SSM parameters")
  );

  params
    .command("ls")
    .description("List parameters")
    .option("--path <path>", "parameter path or name; repeatable", collectValues)
    .option("-n, --lines <count>", "maximum number of parameters", parsePositiveInt)
    .addOption(
      new Option("--sort <key>", "sort rows").choices(["name", "modified"])
    )
    .action(async (_options: unknown, command: Command) => {
      const options = command.optsWithGlobals<ListCommandOptions>();

      await withContext(dependencies, options, (context) =>
        listParameters(context, io.stdout, {
          paths: options.path ?? [],
          limit: options.lines,
          sort: options.sort
        })
      );
    });

  params
    .command("pull")
    .description("Export parameter values in .env format")
    .argument("[envFile]", "file to write, '-' for stdout", STDIO_PATH)
    .option("--path <path>", "parameter path or name; repeatable", collectValues)
    .option("--no-decrypt", "export SecureString values still encrypted")
    .action(async (envFile: string, _options: unknown, command: Command) => {
      const options = command.optsWithGlobals<PullCommandOptions>();

      await withContext(dependencies, options, async (context) => {
        const sink = io.openFile(envFile);

        try {
          const exported = await pullParameters(context, sink, {
            paths: options.path ?? [],
            decrypt: options.decrypt
          });
          context.logger.debug(`exported ${exported} parameter(s)`);
        } finally {
          await sink.close();
        }
      });
    });

  params
    .command("validate")
    .description("Check candidate names against the parameter name rules")
    .argument("<names...>", "names to check")
    .action(async (names: string[]) => {
      let invalid = 0;

      for (const name of names) {
        const check = checkParameterName(name);

        if (check.valid) {
          await io.stdout.write(`valid ${check.name}\n`);
        } else {
          invalid += 1;
          await io.stdout.write(`invalid ${check.name}: ${check.reason}\n`);
        }
      }

      if (invalid > 0) {
        dependencies.setExitCode(1);
      }
    });

  params
    .command("push")
    .description("Write new and changed .env values to the parameter store")
    .argument("[envFile]", "file to read, '-' for stdin", STDIO_PATH)
    .option("--path <path>", "path the .env keys are written under")
    .option("--dry-run", "show the diff without writing", false)
    .action(async (envFile: string, _options: unknown, command: Command) => {
      const options = command.optsWithGlobals<PushCommandOptions>();

      if (envFile === STDIO_PATH && !options.dryRun) {
        command.error(
          "error: confirmation reads stdin, so pass the .env file as a path or use --dry-run"
        );
      }

      const envContent = await io.readText(envFile);

      await withContext(dependencies, options, (context) =>
        pushParameters(context, io.stdout, io.confirm, {
          envContent,
          basePath: options.path,
          dryRun: options.dryRun
        })
      );
    });
}
