import { CloudWatchLogsClient } from "@aws-sdk/client-cloudwatch-logs";
import { SSMClient } from "@aws-sdk/client-ssm";
import { fromIni } from "@aws-sdk/credential-providers";

import type { InventoryConfig } from "../types";

export interface AwsClientOptions {
  profile?: string;
  region?: string;
  endpoint?: string;
  maxAttempts: number;
  credentials?: ReturnType<typeof fromIni>;
}

export function buildAwsClientOptions(config: InventoryConfig): AwsClientOptions {
  const options: AwsClientOptions = { maxAttempts: config.awsMaxAttempts };

  if (config.region) {
    options.region = config.region;
  }

  if (config.endpointUrl) {
    options.endpoint = config.endpointUrl;
  }

  if (config.profile) {
    options.profile = config.profile;
    options.credentials = fromIni({ profile: config.profile });
  }

  return options;
}

export interface AwsClients {
  logs: CloudWatchLogsClient;
  ssm: SSMClient;
}

export function createAwsClients(config: InventoryConfig): AwsClients {
  const options = buildAwsClientOptions(config);

  return {
    logs: new CloudWatchLogsClient(options),
    ssm: new SSMClient(options)
  };
}

export function destroyAwsClients(clients: AwsClients): void {
  clients.logs.destroy();
  clients.ssm.destroy();
}
