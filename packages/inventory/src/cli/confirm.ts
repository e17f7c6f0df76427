import { createInterface } from "node:readline/promises";

export type ConfirmPrompt = (prompt: string) => Promise<string>;

/** Resolves to the answer line, or to "" when input ends before one arrives. */
export function createReadlinePrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr
): ConfirmPrompt {
  return (prompt) => {
    const readline = createInterface({ input, output, terminal: false });

    return new Promise<string>((resolve, reject) => {
      readline.once("close", () => resolve(""));
      readline.question(prompt).then(resolve, reject);
    }).finally(() => readline.close());
  };
}
