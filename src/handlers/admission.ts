import type {
  AdmissionOptions,
  AdmissionReviewRequest,
  AdmissionReviewResponse,
  GroupVersionResource,
  NamespaceObject,
} from "../types";
import { annotationsOf } from "../services/cluster-client";
import {
  BYPASS_ANNOTATION_KEY,
  BYPASS_ANNOTATION_VALUE,
  evaluateNamespaceDeletion,
  untilAborted,
} from "../services/namespace-guard";
import { metrics, METRICS } from "../services/metrics";
import { decodeAdmissionReview } from "../validators/admission-review";
import { NamespaceNotFoundError } from "../utils/errors";
import { logger } from "../utils/logger";

export const WEBHOOK_PATH = "/";

export const NAMESPACE_RESOURCE: GroupVersionResource = {
  group: "",
  version: "v1",
  resource: "namespaces",
};

export interface WebhookRequest {
  method: string;
  path: string;
  body: string;
}

export interface WebhookResponse {
  status: number;
  contentType: string;
  body: string;
}

/**
 * Outcome of the gates for one review. `cause` labels the metric.
 */
interface Verdict {
  allowed: boolean;
  message: string;
  cause: string;
}

const allow = (cause: string): Verdict => ({ allowed: true, message: "", cause });
const deny = (cause: string, message: string): Verdict => ({ allowed: false, message, cause });

function isNamespaceResource(resource: GroupVersionResource): boolean {
  return (
    resource.group === NAMESPACE_RESOURCE.group &&
    resource.version === NAMESPACE_RESOURCE.version &&
    resource.resource === NAMESPACE_RESOURCE.resource
  );
}

async function decide(
  review: AdmissionReviewRequest,
  options: AdmissionOptions,
  signal?: AbortSignal
): Promise<Verdict> {
  const { uid, operation, resource } = review.request;
  const name = review.request.name ?? "";

  if (options.admitAll) {
    logger.warn(
      "admitAll is enabled. Allowing namespace admission review request to pass without validation.",
      { uid }
    );
    return allow("admit_all");
  }

  if (!isNamespaceResource(resource)) {
    return deny("unexpected_resource", `Incoming resource is not a Namespace: ${JSON.stringify(resource)}`);
  }

  if (operation !== "DELETE") {
    return deny(
      "unsupported_operation",
      `Incoming operation is ${operation} on namespace ${name}. Only DELETE is currently supported.`
    );
  }

  let namespace: NamespaceObject;
  try {
    if (name === "") {
      throw new Error("resource name may not be empty");
    }
    namespace = await untilAborted(options.namespaces.get(name), signal);
  } catch (error) {
    signal?.throwIfAborted();
    // Let the apiserver report a missing namespace itself
    if (error instanceof NamespaceNotFoundError) {
      logger.debug(`Namespace ${name} not found, let apiserver handle the error: ${error.message}`, { uid });
      return allow("not_found");
    }
    return deny(
      "lookup_failed",
      `Error occurred while retrieving the namespace ${name}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (annotationsOf(namespace)[BYPASS_ANNOTATION_KEY] === BYPASS_ANNOTATION_VALUE) {
    logger.info(
      `Namespace ${name} has the bypass annotation set [${BYPASS_ANNOTATION_KEY}:${BYPASS_ANNOTATION_VALUE}]. OK to DELETE.`,
      { uid }
    );
    return allow("bypass");
  }

  const evaluation = await evaluateNamespaceDeletion(name, options.counters, signal);
  if (!evaluation.clear) {
    return deny("resources_present", evaluation.message);
  }

  logger.info(`Namespace ${name} does not contain any workload resources. OK to DELETE.`, { uid });
  return allow("empty");
}

/**
 * Log the verdict and wrap it in an AdmissionReview envelope.
 */
function respond(
  uid: string,
  details: { operation: string; name: string; username: string },
  verdict: Verdict,
  code = 403
): AdmissionReviewResponse {
  logger.info(
    `Responding Allowed: ${verdict.allowed} for ${details.operation} on Namespace: ${details.name} by user: ${details.username}`,
    { uid, allowed: verdict.allowed, cause: verdict.cause }
  );
  if (!verdict.allowed) {
    logger.error("Rejection reason", verdict.message, { uid });
  }

  metrics.incrementCounter(METRICS.ADMISSION_REQUESTS_TOTAL, {
    operation: details.operation || "unknown",
    result: verdict.allowed ? "allowed" : "denied",
    reason: verdict.cause,
  });

  return {
    apiVersion: "admission.k8s.io/v1",
    kind: "AdmissionReview",
    response: verdict.allowed
      ? { uid, allowed: true }
      : {
          uid,
          allowed: false,
          status: {
            code,
            reason: code === 400 ? "BadRequest" : "Forbidden",
            message: verdict.message,
          },
        },
  };
}

/**
 * Handle a decoded admission review for a namespace.
 *
 * Rejects only when `signal` aborts; every other path yields a verdict.
 */
export async function handleAdmissionReview(
  review: AdmissionReviewRequest,
  options: AdmissionOptions,
  signal?: AbortSignal
): Promise<AdmissionReviewResponse> {
  const startTime = Date.now();
  const { uid, operation, resource, kind } = review.request;
  const details = {
    operation,
    name: review.request.name ?? "",
    username: review.request.userInfo?.username ?? "",
  };

  metrics.incrementGauge(METRICS.REQUESTS_IN_FLIGHT);

  try {
    logger.debug(`Incoming AdmissionReview for ${operation} on resource: ${JSON.stringify(resource)}, kind: ${kind.kind}`, {
      uid,
    });

    const verdict = await decide(review, options, signal);
    signal?.throwIfAborted();
    return respond(uid, details, verdict);
  } finally {
    metrics.observeHistogram(METRICS.ADMISSION_REQUEST_DURATION, (Date.now() - startTime) / 1000, {
      operation,
    });
    metrics.decrementGauge(METRICS.REQUESTS_IN_FLIGHT);
  }
}

function plainText(status: number, body: string): WebhookResponse {
  return { status, contentType: "text/plain; charset=utf-8", body };
}

function json(status: number, review: AdmissionReviewResponse): WebhookResponse {
  return { status, contentType: "application/json", body: JSON.stringify(review) };
}

/**
 * Entry point for the webhook endpoint: check method and path, decode the
 * body and adjudicate it.
 */
export async function adjudicate(
  request: WebhookRequest,
  options: AdmissionOptions,
  signal?: AbortSignal
): Promise<WebhookResponse> {
  if (request.method !== "POST") {
    return plainText(
      405,
      `Incoming request method ${request.method} is not supported, only POST is supported`
    );
  }

  if (request.path !== WEBHOOK_PATH) {
    return plainText(404, `${request.path} 404 Not Found`);
  }

  const decoded = decodeAdmissionReview(request.body);
  if (!decoded.valid) {
    const message = `Failed to decode the request body json into an AdmissionReview resource: ${decoded.error}`;
    return json(400, respond("", { operation: "", name: "", username: "" }, deny("malformed", message), 400));
  }

  return json(200, await handleAdmissionReview(decoded.value, options, signal));
}
