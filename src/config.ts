// src/config.ts

/**
 * Service configuration read from environment variables.
 */

import { ConfigError } from "./utils/errors";
import { LogLevel, type LogFormat } from "./utils/logger";

export interface Config {
  port: number;
  healthPort: number;
  tlsCertPath: string;
  tlsKeyPath: string;
  clientCaPath: string;
  clientAuth: boolean;
  skipTls: boolean;
  admitAll: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

type Env = Record<string, string | undefined>;

function parsePort(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === "") return fallback;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`${name} must be a port number between 1 and 65535, got "${value}"`);
  }
  return port;
}

function parseLogLevel(value: string | undefined): LogLevel {
  const level = (value || "info").toUpperCase();
  const match = Object.values(LogLevel).find((l) => l === level);
  if (!match) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, got "${value}"`);
  }
  return match;
}

function parseLogFormat(value: string | undefined): LogFormat {
  const format = value || "text";
  if (format !== "text" && format !== "json") {
    throw new ConfigError(`LOG_FORMAT must be "text" or "json", got "${value}"`);
  }
  return format;
}

export function loadConfig(env: Env = process.env): Config {
  return {
    port: parsePort("PORT", env.PORT, 8443),
    healthPort: parsePort("HEALTH_PORT", env.HEALTH_PORT, 8080),
    tlsCertPath: env.TLS_CERT_PATH || "/certs/tls.crt",
    tlsKeyPath: env.TLS_KEY_PATH || "/certs/tls.key",
    clientCaPath: env.CLIENT_CA_PATH || "/var/run/secrets/kubernetes.io/serviceaccount/ca.crt",
    // Require and verify the apiserver's client certificate
    clientAuth: env.CLIENT_AUTH === "true",
    skipTls: env.SKIP_TLS === "true",
    // Disables the policy entirely; meant for maintenance windows
    admitAll: env.ADMIT_ALL === "true",
    logLevel: parseLogLevel(env.LOG_LEVEL),
    logFormat: parseLogFormat(env.LOG_FORMAT),
  };
}
