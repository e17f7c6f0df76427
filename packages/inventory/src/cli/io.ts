import { createWriteStream } from "node:fs";
import { readFile } from "node:fs/promises";
import { text } from "node:stream/consumers";

import { type ConfirmPrompt, createReadlinePrompt } from "./confirm";
import { createPagerSink, createStreamSink, type OutputSink } from "./output";

export const STDIO_PATH = "-";

export interface ProgramIO {
  stdout: OutputSink;
  stdoutIsTTY: boolean;
  openPager: () => OutputSink;
  openFile: (path: string) => OutputSink;
  readText: (path: string) => Promise<string>;
  confirm: ConfirmPrompt;
}

export function createProcessIO(): ProgramIO {
  const stdout = createStreamSink(process.stdout);

  return {
    stdout,
    stdoutIsTTY: process.stdout.isTTY === true,
    openPager: () => createPagerSink(),
    openFile: (path) =>
      path === STDIO_PATH
        ? stdout
        : createStreamSink(createWriteStream(path, { encoding: "utf8", flags: "w" }), {
            end: true
          }),
    readText: (path) =>
      path === STDIO_PATH ? text(process.stdin) : readFile(path, "utf8"),
    confirm: createReadlinePrompt()
  };
}
