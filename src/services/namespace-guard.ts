import type {
  FailedKind,
  NamespaceEvaluation,
  NonEmptyKind,
  ResourceCounter,
  ResourceTally,
} from "../types";
import { metrics, METRICS } from "./metrics";
import { logger } from "../utils/logger";

export const BYPASS_ANNOTATION_KEY = "admission.namespace-guard.dev/allow-cascade-delete";
export const BYPASS_ANNOTATION_VALUE = "true";

/**
 * Workload kinds that block namespace deletion, in reporting order.
 */
export const RESOURCE_KINDS = [
  "pods",
  "services",
  "replicasets",
  "deployments",
  "statefulsets",
  "daemonsets",
  "ingresses",
  "horizontalpodautoscalers",
] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

/**
 * Settle `promise`, or reject with the signal's reason as soon as it aborts.
 */
export function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Build the denial text for a namespace that is not clear to delete.
 */
export function formatDenialMessage(namespace: string, tally: ResourceTally): string {
  const clauses: string[] = [];

  if (tally.nonEmpty.length > 0) {
    const listed = tally.nonEmpty.map(({ kind, count }) => `${kind}(${count})`).join(", ");
    clauses.push(
      `The namespace ${namespace} you are trying to remove contains one or more of these resources: [${listed}]. Please delete them and try again.`
    );
  }

  if (tally.failures.length > 0) {
    const listed = tally.failures.map(({ kind, error }) => `error listing ${kind}, ${error}`).join("; ");
    clauses.push(
      `The following error(s) occurred while validating the DELETE operation on the namespace ${namespace}: [${listed}].`
    );
  }

  clauses.push(
    `WARNING: If you know what you are doing, run \`kubectl annotate namespace ${namespace} ${BYPASS_ANNOTATION_KEY}=${BYPASS_ANNOTATION_VALUE}\` to bypass this policy check.`
  );

  return clauses.join(" ");
}

/**
 * Count every workload kind in `namespace` and decide whether it can be
 * deleted.
 *
 * All queries run concurrently and are collected in counter order. A failed
 * query is recorded and blocks deletion; it does not stop the other kinds
 * from being counted. When `signal` aborts, the evaluation rejects with the
 * signal's reason and yields no verdict.
 */
export async function evaluateNamespaceDeletion(
  namespace: string,
  counters: readonly ResourceCounter[],
  signal?: AbortSignal
): Promise<NamespaceEvaluation> {
  signal?.throwIfAborted();

  const settled = await untilAborted(
    Promise.allSettled(counters.map(async (counter) => counter.count(namespace))),
    signal
  );

  const nonEmpty: NonEmptyKind[] = [];
  const failures: FailedKind[] = [];

  settled.forEach((result, index) => {
    const { kind } = counters[index];

    if (result.status === "rejected") {
      const reason: unknown = result.reason;
      const error = reason instanceof Error ? reason.message : String(reason);
      logger.warn(`Failed to list ${kind} in namespace ${namespace}`, { namespace, kind, error });
      metrics.incrementCounter(METRICS.RESOURCE_QUERIES_TOTAL, { kind, status: "error" });
      failures.push({ kind, error });
      return;
    }

    const count = result.value;
    logger.debug(`Namespace ${namespace} holds ${count} ${kind}`, { namespace, kind, count });
    metrics.incrementCounter(METRICS.RESOURCE_QUERIES_TOTAL, {
      kind,
      status: count > 0 ? "non_empty" : "empty",
    });
    if (count > 0) {
      nonEmpty.push({ kind, count });
    }
  });

  if (nonEmpty.length === 0 && failures.length === 0) {
    return { clear: true };
  }

  const tally: ResourceTally = { nonEmpty, failures };
  return { clear: false, tally, message: formatDenialMessage(namespace, tally) };
}
