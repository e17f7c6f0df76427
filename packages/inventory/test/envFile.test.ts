import { describe, expect, it } from "vitest";

import { EnvFileFormatError } from "../src/errors";
import {
  envEntriesToParameterMap,
  envKeyForParameter,
  formatEnvFile,
  parseEnvFile
} from "../src/sync/envFile";

describe("parseEnvFile", () => {
  it("skips blanks and comments, trims around '=' and lets the last duplicate win", () => {
    const entries = parseEnvFile(
      "DB_HOST=db.internal\n# comment\n\nDB_PORT = 5432\r\nDB_HOST=replica.internal\n"
    );

    expect(entries).toEqual([
      { key: "DB_HOST", value: "replica.internal" },
      { key: "DB_PORT", value: "5432" }
    ]);
  });

  it("splits on the first '=' only", () => {
    expect(parseEnvFile("TOKEN=a=b")).toEqual([{ key: "TOKEN", value: "a=b" }]);
  });

  it("rejects a line without '=' with its line number", () => {
    expect(() => parseEnvFile("GOOD=1\nBROKEN\n")).toThrow(
      `Badly formatted env file: expected '=' on line 2: "BROKEN"`
    );
  });

  it("skips whitespace-only lines but rejects padded text without '='", () => {
    expect(parseEnvFile("A=1\n   \n\t\nB=2\n")).toEqual([
      { key: "A", value: "1" },
      { key: "B", value: "2" }
    ]);
    expect(() => parseEnvFile("A=1\n \t \n  NOVALUE  \n")).toThrow(
      `Badly formatted env file: expected '=' on line 3: "  NOVALUE  "`
    );
  });

  it("rejects an empty key", () => {
    try {
      parseEnvFile("=orphan");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(EnvFileFormatError);
      expect(error).toMatchObject({ lineNumber: 1, line: "=orphan" });
    }
  });
});

describe("envEntriesToParameterMap", () => {
  it("lower-cases keys and joins them onto the base path", () => {
    const entries = [{ key: "DB_HOST", value: "db.internal" }];

    expect(envEntriesToParameterMap(entries, "/svc/")).toEqual(
      new Map([["/svc/db_host", "db.internal"]])
    );
    expect(envEntriesToParameterMap(entries, undefined)).toEqual(
      new Map([["db_host", "db.internal"]])
    );
  });
});

describe("formatEnvFile", () => {
  it("uses the upper-cased last path segment as the key", () => {
    expect(envKeyForParameter("/svc/prod/db_host")).toBe("DB_HOST");
    expect(
      formatEnvFile([
        { name: "/svc/db_host", value: "db.internal" },
        { name: "/svc/api_key" }
      ])
    ).toBe("DB_HOST=db.internal\nAPI_KEY=\n");
  });

  it("parses back to the same names and values", () => {
    const parameters = new Map([
      ["/svc/db_host", "db.internal"],
      ["/svc/api_key", "test-secret"]
    ]);

    const content = formatEnvFile(
      [...parameters].map(([name, value]) => ({ name, value }))
    );

    expect(envEntriesToParameterMap(parseEnvFile(content), "/svc")).toEqual(parameters);
  });
});
