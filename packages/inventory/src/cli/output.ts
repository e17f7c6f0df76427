import { spawn } from "node:child_process";
import { once } from "node:events";

export interface OutputSink {
  write: (chunk: string) => Promise<void>;
  close: () => Promise<void>;
}

export const DEFAULT_PAGER = "less -R";

async function writeChunk(stream: NodeJS.WritableStream, chunk: string): Promise<void> {
  const writable = stream.write(chunk);

  if (writable) {
    return;
  }

  await once(stream, "drain");
}

/** Writes to a stream, respecting backpressure. `end` closes the stream on close. */
export function createStreamSink(
  stream: NodeJS.WritableStream,
  options: { end?: boolean } = {}
): OutputSink {
  return {
    write: (chunk) => writeChunk(stream, chunk),
    async close(): Promise<void> {
      if (!options.end) {
        return;
      }

      const finished = once(stream, "finish");
      stream.end();
      await finished;
    }
  };
}

function isBrokenPipe(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EPIPE";
}

/**
 * Pipes output through an interactive pager. Once the pager exits, further
 * writes are dropped.
 */
export function createPagerSink(command: string = process.env.PAGER ?? DEFAULT_PAGER): OutputSink {
  const child = spawn(command, {
    shell: true,
    stdio: ["pipe", "inherit", "inherit"]
  });
  const stdin = child.stdin;
  let closed = false;
  let spawnError: Error | null = null;

  if (!stdin) {
    throw new Error(`pager ${command} has no stdin`);
  }

  const exited = new Promise<void>((resolve) => {
    child.once("error", (error) => {
      spawnError = error;
      closed = true;
      resolve();
    });
    child.once("close", () => {
      closed = true;
      resolve();
    });
  });

  stdin.on("error", (error: NodeJS.ErrnoException) => {
    closed = true;
    if (error.code !== "EPIPE") {
      child.kill();
    }
  });

  return {
    async write(chunk: string): Promise<void> {
      if (closed || stdin.destroyed) {
        return;
      }

      try {
        await Promise.race([writeChunk(stdin, chunk), exited]);
      } catch (error) {
        if (isBrokenPipe(error)) {
          closed = true;
          return;
        }

        throw error;
      }
    },
    async close(): Promise<void> {
      if (!stdin.destroyed) {
        stdin.end();
      }

      await exited;

      if (spawnError) {
        throw spawnError;
      }
    }
  };
}
