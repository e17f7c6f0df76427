import { createAwsClients, destroyAwsClients } from "./api/awsClients";
import { createLogsGateway, type LogsGateway } from "./api/logsGateway";
import {
  createParametersGateway,
  type ParametersGateway
} from "./api/parametersGateway";
import { createLogger, type Logger } from "./logger";
import type { InventoryConfig } from "./types";

/**
 * Everything one command invocation shares: the configuration, one client
 * per service and the logger. Built once and passed down explicitly.
 */
export interface InventoryContext {
  config: InventoryConfig;
  logger: Logger;
  logs: LogsGateway;
  parameters: ParametersGateway;
  close: () => void;
}

export function createInventoryContext(config: InventoryConfig): InventoryContext {
  const clients = createAwsClients(config);
  const logger = createLogger({ level: config.logLevel });

  logger.debug(
    `aws clients ready (profile=${config.profile ?? "default"}, region=${config.region ?? "default"}, endpoint=${config.endpointUrl ?? "default"})`
  );

  return {
    config,
    logger,
    logs: createLogsGateway(clients.logs),
    parameters: createParametersGateway(clients.ssm),
    close: () => destroyAwsClients(clients)
  };
}
