import http from "node:http";
import type https from "node:https";
import { loadConfig } from "./config";
import {
  createClusterApis,
  createNamespaceReader,
  createResourceCounters,
} from "./services/cluster-client";
import { BYPASS_ANNOTATION_KEY } from "./services/namespace-guard";
import {
  createHealthListener,
  createWebhookListener,
  createWebhookServer,
  loadTlsOptions,
} from "./server";
import { initLogger, logger } from "./utils/logger";

function fatal(message: string, error: unknown): never {
  logger.error(message, error);
  process.exit(1);
}

function attempt<T>(message: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    return fatal(message, error);
  }
}

const config = attempt("Invalid configuration", () => loadConfig());

initLogger(config.logLevel, config.logFormat);

logger.info("Starting Namespace Guard Webhook...");
logger.info("Configuration", {
  port: config.port,
  healthPort: config.healthPort,
  tls: !config.skipTls,
  tlsCert: config.tlsCertPath,
  tlsKey: config.tlsKeyPath,
  clientCa: config.clientCaPath,
  clientAuth: config.clientAuth,
  admitAll: config.admitAll,
  bypassAnnotation: BYPASS_ANNOTATION_KEY,
});

if (config.admitAll) {
  logger.warn("ADMIT_ALL is set: every namespace deletion will be admitted without validation");
}

const apis = attempt("Error occurred while building the kube-config", () => createClusterApis());

let tls: https.ServerOptions | undefined;
if (!config.skipTls) {
  try {
    tls = await loadTlsOptions(config);
    logger.info("TLS certificates loaded successfully");
  } catch (error) {
    logger.error("Set SKIP_TLS=true for development or provide valid certificates");
    fatal("Unable to read the server cert, key or client CA file", error);
  }
}

const webhookServer = createWebhookServer(
  createWebhookListener({
    admitAll: config.admitAll,
    namespaces: createNamespaceReader(apis.core),
    counters: createResourceCounters(apis),
  }),
  tls
);

webhookServer.listen(config.port, () => {
  logger.info(`Webhook server listening on port ${config.port}`, {
    tls: !config.skipTls,
    clientAuth: config.clientAuth,
  });
});

const healthServer = http.createServer(createHealthListener());
healthServer.listen(config.healthPort, () => {
  logger.info(`Health server listening on port ${config.healthPort}`);
});

function shutdown(signal: string): void {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  healthServer.close();
  webhookServer.close();
  process.exit(0);
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

export { webhookServer, healthServer };
