import { buildProgram } from "./cli/program";
import { createProcessIO } from "./cli/io";
import { loadConfig } from "./config";
import { createInventoryContext } from "./context";

async function main(argv: string[]): Promise<void> {
  const program = buildProgram({
    createContext: (overrides) => createInventoryContext(loadConfig(overrides)),
    io: createProcessIO(),
    setExitCode: (code) => {
      process.exitCode = code;
    }
  });

  await program.parseAsync(argv);
}

main(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`inventory failed: ${message}`);
  process.exit(1);
});
