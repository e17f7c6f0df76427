import {
  DescribeParametersCommand,
  GetParameterCommand,
  type ParameterStringFilter,
  PutParameterCommand,
  type SSMClient
} from "@aws-sdk/client-ssm";

import type { CursorPage, Parameter, ParameterQuery } from "../types";
import {
  normalizeToken,
  parseParameterMetadata,
  parseParameterValue
} from "./responseParser";

export const DESCRIBE_PARAMETERS_MAX_PAGE_SIZE = 50;

export interface DescribeParametersPageRequest {
  query: ParameterQuery;
  token: string | null;
  pageSize: number;
}

export interface GetParameterValueOptions {
  decrypt: boolean;
}

export interface ParametersGateway {
  describeParametersPage: (
    request: DescribeParametersPageRequest
  ) => Promise<CursorPage<Parameter>>;
  getParameterValue: (
    name: string,
    options: GetParameterValueOptions
  ) => Promise<string>;
  putSecureParameter: (name: string, value: string) => Promise<number | null>;
}

export function buildParameterFilters(
  query: ParameterQuery
): ParameterStringFilter[] | undefined {
  switch (query.kind) {
    case "all":
      return undefined;
    case "path":
      return [{ Key: "Path", Option: "OneLevel", Values: [query.path] }];
    case "name":
      return [{ Key: "Name", Option: "Equals", Values: [query.name] }];
  }
}

export function createParametersGateway(client: SSMClient): ParametersGateway {
  return {
    async describeParametersPage(request) {
      const output = await client.send(
        new DescribeParametersCommand({
          ParameterFilters: buildParameterFilters(request.query),
          MaxResults: Math.min(request.pageSize, DESCRIBE_PARAMETERS_MAX_PAGE_SIZE),
          NextToken: request.token ?? undefined
        })
      );

      return {
        items: (output.Parameters ?? []).map((parameter) =>
          parseParameterMetadata(parameter)
        ),
        nextToken: normalizeToken(output.NextToken)
      };
    },

    async getParameterValue(name, options) {
      const output = await client.send(
        new GetParameterCommand({ Name: name, WithDecryption: options.decrypt })
      );

      return parseParameterValue(output.Parameter, name);
    },

    async putSecureParameter(name, value) {
      const output = await client.send(
        new PutParameterCommand({
          Name: name,
          Value: value,
          Type: "SecureString",
          Overwrite: true
        })
      );

      return typeof output.Version === "number" ? output.Version : null;
    }
  };
}
