import { readFile } from "node:fs/promises";
import http, { type IncomingMessage, type RequestListener, type ServerResponse } from "node:http";
import https from "node:https";
import type { AdmissionOptions } from "./types";
import type { Config } from "./config";
import { adjudicate } from "./handlers/admission";
import { metrics } from "./services/metrics";
import { logger } from "./utils/logger";

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

function pathOf(req: IncomingMessage): string {
  return new URL(req.url ?? "/", "http://localhost").pathname;
}

function send(res: ServerResponse, status: number, contentType: string, body: string): void {
  res.writeHead(status, { "Content-Type": contentType });
  res.end(body);
}

/**
 * Request listener for the webhook port. `/status.html` always answers OK;
 * everything else is adjudicated. A client that disconnects before the
 * verdict is ready aborts the evaluation and gets no response.
 */
export function createWebhookListener(options: AdmissionOptions): RequestListener {
  return (req, res) => {
    const path = pathOf(req);
    const method = req.method ?? "";
    logger.info(`Serving ${method} ${path} request for client: ${req.socket.remoteAddress ?? "unknown"}`);

    if (path === "/status.html") {
      send(res, 200, "text/plain; charset=utf-8", "OK");
      return;
    }

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) {
        controller.abort(new Error("client disconnected before the verdict was written"));
      }
    });

    readBody(req)
      .then((body) => adjudicate({ method, path, body }, options, controller.signal))
      .then((response) => send(res, response.status, response.contentType, response.body))
      .catch((error: unknown) => {
        if (controller.signal.aborted) {
          logger.warn("Admission review abandoned", { path, reason: String(controller.signal.reason) });
          return;
        }
        logger.error("Error processing admission review", error, { path });
        send(
          res,
          500,
          "text/plain; charset=utf-8",
          `Webhook error: ${error instanceof Error ? error.message : String(error)}`
        );
      });
  };
}

/**
 * Liveness, readiness and metrics, served over plain HTTP.
 */
export function createHealthListener(): RequestListener {
  return (req, res) => {
    switch (pathOf(req)) {
      case "/healthz":
      case "/health":
        send(res, 200, "application/json", JSON.stringify({ status: "ok" }));
        return;
      case "/readyz":
      case "/ready":
        send(res, 200, "application/json", JSON.stringify({ status: "ready" }));
        return;
      case "/metrics":
        send(res, 200, "text/plain; version=0.0.4", metrics.generatePrometheusMetrics());
        return;
      default:
        send(res, 404, "text/plain; charset=utf-8", "Not Found");
    }
  };
}

/**
 * Load the serving certificate and the cluster CA that signs the apiserver's
 * client certificate.
 */
export async function loadTlsOptions(config: Config): Promise<https.ServerOptions> {
  const [cert, key, ca] = await Promise.all([
    readFile(config.tlsCertPath),
    readFile(config.tlsKeyPath),
    readFile(config.clientCaPath),
  ]);

  return {
    cert,
    key,
    ca,
    requestCert: config.clientAuth,
    rejectUnauthorized: config.clientAuth,
  };
}

export function createWebhookServer(
  listener: RequestListener,
  tls?: https.ServerOptions
): http.Server | https.Server {
  return tls ? https.createServer(tls, listener) : http.createServer(listener);
}
