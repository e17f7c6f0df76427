import type { Command } from "commander";
import { describe, expect, it, vi } from "vitest";

import { formatTimestamp } from "../src/cli/format";
import type { ProgramIO } from "../src/cli/io";
import { buildProgram } from "../src/cli/program";
import type { ConfigOverrides } from "../src/config";
import type { InventoryContext } from "../src/context";
import {
  createFakeContext,
  createFakeIO,
  createFakeLogsGateway,
  createFakeParametersGateway,
  createMemorySink,
  logStream
} from "./fakes";

function silence(command: Command): void {
  command.exitOverride();
  command.configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
  command.commands.forEach((subcommand) => silence(subcommand));
}

function setup(context: InventoryContext, io: ProgramIO) {
  const createContext = vi.fn((_overrides: ConfigOverrides) => context);
  const setExitCode = vi.fn();
  const program = buildProgram({ createContext, io, setExitCode });
  silence(program);

  return {
    createContext,
    setExitCode,
    run: (args: string[]) => program.parseAsync(args, { from: "user" })
  };
}

const events = [1, 2, 3].map((index) => ({
  timestamp: new Date(2024, 0, 2, 3, 4, index).getTime(),
  message: `request ${index}`
}));

describe("logs commands", () => {
  it("lists stream names one per line and closes the context", async () => {
    const context = createFakeContext({
      logs: createFakeLogsGateway([
        logStream("web-0", 0),
        logStream("web-1", 0),
        logStream("web-2", 0)
      ])
    });
    const io = createFakeIO();
    const { createContext, run } = setup(context, io);

    await run(["logs", "--log-group-name", "/app/web", "ls", "--format", "lines", "-n", "2"]);

    expect(io.stdout.text()).toBe("web-0\nweb-1\n");
    expect(createContext).toHaveBeenCalledWith({
      profile: undefined,
      region: undefined,
      endpointUrl: undefined
    });
    expect(context.close).toHaveBeenCalledOnce();
  });

  it("prints streams as service records in json", async () => {
    const context = createFakeContext({
      logs: createFakeLogsGateway([
        logStream("web-0", 1_000),
        { name: "web-1", creationTime: 2_000, firstEventTimestamp: null, lastEventTimestamp: null }
      ])
    });
    const io = createFakeIO();
    const { run } = setup(context, io);

    await run(["logs", "--log-group-name", "/app/web", "ls", "--format", "json"]);

    expect(io.stdout.text()).toBe(
      '[{"logStreamName":"web-0","creationTime":1000,"firstEventTimestamp":1000,' +
        '"lastEventTimestamp":6000},{"logStreamName":"web-1","creationTime":2000}]\n'
    );
  });

  it("prints the last events oldest first", async () => {
    const context = createFakeContext({
      logs: createFakeLogsGateway([], { "web-1": events })
    });
    const io = createFakeIO();
    const { createContext, run } = setup(context, io);

    await run([
      "logs",
      "--log-group-name",
      "/app/web",
      "--region",
      "eu-west-1",
      "tail",
      "web-1",
      "-n",
      "2"
    ]);

    expect(io.stdout.text()).toBe(
      [
        "/app/web web-1\n",
        `${formatTimestamp(events[1].timestamp)}: request 2\n`,
        `${formatTimestamp(events[2].timestamp)}: request 3\n`,
        "\n"
      ].join("")
    );
    expect(createContext).toHaveBeenCalledWith(
      expect.objectContaining({ region: "eu-west-1" })
    );
  });

  it("pages through a pager only on a terminal", async () => {
    const pager = createMemorySink();
    const context = createFakeContext({
      logs: createFakeLogsGateway([], { "web-1": events })
    });
    const io = createFakeIO({ stdoutIsTTY: true, openPager: vi.fn(() => pager) });
    const { run } = setup(context, io);

    await run(["logs", "--log-group-name", "/app/web", "head", "web-1", "-n", "1"]);

    expect(io.openPager).toHaveBeenCalledOnce();
    expect(pager.text()).toBe(
      `/app/web web-1\n${formatTimestamp(events[0].timestamp)}: request 1\n\n`
    );
    expect(pager.closed).toBe(true);
    expect(io.stdout.text()).toBe("");
  });

  it("writes to stdout when the pager is turned off", async () => {
    const context = createFakeContext({
      logs: createFakeLogsGateway([], { "web-1": events })
    });
    const io = createFakeIO({ stdoutIsTTY: true, openPager: vi.fn(() => createMemorySink()) });
    const { run } = setup(context, io);

    await run(["logs", "--log-group-name", "/app/web", "cat", "web-1", "--no-pager"]);

    expect(io.openPager).not.toHaveBeenCalled();
    expect(io.stdout.text().split("\n")).toHaveLength(6);
  });

  it("requires a log group", async () => {
    const io = createFakeIO();
    const { createContext, run } = setup(createFakeContext(), io);

    await expect(run(["logs", "ls"])).rejects.toThrow(
      "required option '--log-group-name <name>' not specified"
    );
    expect(createContext).not.toHaveBeenCalled();
  });
});

describe("params commands", () => {
  it("reports each name and fails the run when one is invalid", async () => {
    const io = createFakeIO();
    const { createContext, setExitCode, run } = setup(createFakeContext(), io);

    await run(["params", "validate", "/svc/db_host", "aws_key"]);

    expect(io.stdout.text()).toBe(
      "valid /svc/db_host\ninvalid aws_key: name cannot begin with 'aws' (case-insensitive)\n"
    );
    expect(setExitCode).toHaveBeenCalledWith(1);
    expect(createContext).not.toHaveBeenCalled();
  });

  it("lists parameters sorted by name", async () => {
    const context = createFakeContext({
      parameters: createFakeParametersGateway({
        "/svc/db_host": "db.internal",
        "/svc/api_key": "test-secret"
      })
    });
    const io = createFakeIO();
    const { run } = setup(context, io);

    await run(["params", "ls", "--path", "/svc", "--sort", "name"]);

    const lines = io.stdout.text().split("\n");
    expect(lines[0]).toBe("| name         | type         | description | modified at         |");
    expect(lines[2].startsWith("| /svc/api_key | SecureString |")).toBe(true);
    expect(lines[3].startsWith("| /svc/db_host | SecureString |")).toBe(true);
  });

  it("exports values to the named file and closes it", async () => {
    const gateway = createFakeParametersGateway({ "/svc/db_host": "db.internal" });
    const file = createMemorySink();
    const io = createFakeIO({ openFile: vi.fn(() => file) });
    const { run } = setup(createFakeContext({ parameters: gateway }), io);

    await run(["params", "pull", "--path", "/svc", "--no-decrypt", "svc.env"]);

    expect(io.openFile).toHaveBeenCalledWith("svc.env");
    expect(file.text()).toBe("DB_HOST=db.internal\n");
    expect(file.closed).toBe(true);
    expect(gateway.valueRequests).toEqual([{ name: "/svc/db_host", decrypt: false }]);
  });

  it("exports direct children only so nested names cannot share a key", async () => {
    const gateway = createFakeParametersGateway({
      "/svc/db_host": "db.internal",
      "/svc/a/host": "a.example",
      "/svc/b/host": "b.example"
    });
    const io = createFakeIO();
    const { run } = setup(createFakeContext({ parameters: gateway }), io);

    await run(["params", "pull", "--path", "/svc"]);

    expect(io.stdout.text()).toBe("DB_HOST=db.internal\n");
    expect(gateway.valueRequests).toEqual([{ name: "/svc/db_host", decrypt: true }]);
  });

  it("shows the diff of a dry run", async () => {
    const gateway = createFakeParametersGateway({});
    const io = createFakeIO({ readText: vi.fn(async () => "DB_HOST=db.internal\n") });
    const { run } = setup(createFakeContext({ parameters: gateway }), io);

    await run(["params", "push", "--dry-run", "--path", "/svc"]);

    expect(io.readText).toHaveBeenCalledWith("-");
    expect(io.stdout.text()).toBe("new       /svc/db_host\ndry run: no parameters written\n");
    expect(gateway.writes).toHaveLength(0);
  });

  it("refuses to confirm over stdin", async () => {
    const io = createFakeIO({ readText: vi.fn(async () => "") });
    const { run } = setup(createFakeContext(), io);

    await expect(run(["params", "push", "--path", "/svc"])).rejects.toThrow(
      "confirmation reads stdin"
    );
    expect(io.readText).not.toHaveBeenCalled();
  });

  it("reports the diff before asking and writes once confirmed", async () => {
    const gateway = createFakeParametersGateway({ "/svc/db_host": "db.internal" });
    const io = createFakeIO({
      readText: vi.fn(async () => "DB_HOST=replica.internal\nDB_PORT=5432\n"),
      confirm: vi.fn(async () => "yes")
    });
    const { run } = setup(createFakeContext({ parameters: gateway }), io);

    await run(["params", "push", "--path", "/svc", "svc.env"]);

    expect(io.confirm).toHaveBeenCalledWith(
      'Write 1 new and 1 changed parameter(s) under /svc? Type "yes" to confirm: '
    );
    expect(io.stdout.text()).toBe(
      "new       /svc/db_port\nchanged   /svc/db_host\nwrote 2 parameter(s)\n"
    );
    expect(gateway.store.get("/svc/db_host")).toBe("replica.internal");
  });
});
