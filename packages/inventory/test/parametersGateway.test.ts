import {
  DescribeParametersCommand,
  GetParameterCommand,
  PutParameterCommand,
  type SSMClient
} from "@aws-sdk/client-ssm";
import { describe, expect, it, vi } from "vitest";

import {
  buildParameterFilters,
  createParametersGateway
} from "../src/api/parametersGateway";

describe("buildParameterFilters", () => {
  it("maps each query kind onto a parameter filter", () => {
    expect(buildParameterFilters({ kind: "all" })).toBeUndefined();
    expect(buildParameterFilters({ kind: "path", path: "/svc" })).toEqual([
      { Key: "Path", Option: "OneLevel", Values: ["/svc"] }
    ]);
    expect(buildParameterFilters({ kind: "name", name: "/svc" })).toEqual([
      { Key: "Name", Option: "Equals", Values: ["/svc"] }
    ]);
  });
});

describe("createParametersGateway", () => {
  it("caps the page size and parses metadata", async () => {
    const send = vi.fn(async (_command: DescribeParametersCommand) => ({
      Parameters: [
        {
          Name: "/svc/db_host",
          Type: "SecureString",
          Description: "database host",
          LastModifiedDate: new Date(60_000),
          Version: 3
        }
      ],
      NextToken: "next"
    }));
    const gateway = createParametersGateway({ send } as unknown as SSMClient);

    const page = await gateway.describeParametersPage({
      query: { kind: "path", path: "/svc" },
      token: "prev",
      pageSize: 200
    });

    const [command] = send.mock.calls[0];
    expect(command).toBeInstanceOf(DescribeParametersCommand);
    expect(command.input).toEqual({
      ParameterFilters: [{ Key: "Path", Option: "OneLevel", Values: ["/svc"] }],
      MaxResults: 50,
      NextToken: "prev"
    });
    expect(page).toEqual({
      items: [
        {
          name: "/svc/db_host",
          type: "SecureString",
          description: "database host",
          lastModifiedAt: new Date(60_000),
          version: 3
        }
      ],
      nextToken: "next"
    });
  });

  it("reads a value with the requested decryption", async () => {
    const send = vi.fn(async (_command: GetParameterCommand) => ({
      Parameter: { Name: "/svc/api_key", Value: "test-secret" }
    }));
    const gateway = createParametersGateway({ send } as unknown as SSMClient);

    const value = await gateway.getParameterValue("/svc/api_key", { decrypt: false });

    expect(value).toBe("test-secret");
    expect(send.mock.calls[0][0].input).toEqual({
      Name: "/svc/api_key",
      WithDecryption: false
    });
  });

  it("writes values as overwriting SecureStrings", async () => {
    const send = vi.fn(async (_command: PutParameterCommand) => ({ Version: 4 }));
    const gateway = createParametersGateway({ send } as unknown as SSMClient);

    const version = await gateway.putSecureParameter("/svc/api_key", "test-secret");

    expect(version).toBe(4);
    expect(send.mock.calls[0][0]).toBeInstanceOf(PutParameterCommand);
    expect(send.mock.calls[0][0].input).toEqual({
      Name: "/svc/api_key",
      Value: "test-secret",
      Type: "SecureString",
      Overwrite: true
    });
  });
});
