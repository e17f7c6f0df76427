import { Command } from "commander";

import { registerLogsCommands } from "./logsCommands";
import { registerParameterCommands } from "./parametersCommands";
import type { ProgramDependencies } from "./shared";

export function buildProgram(dependencies: ProgramDependencies): Command {
  const program = new Command("inventory")
    .description("Browse CloudWatch log streams and sync SSM parameters with .env files")
    .showHelpAfterError();

  registerLogsCommands(program, dependencies);
  registerParameterCommands(program, dependencies);

  return program;
}
