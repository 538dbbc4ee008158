import {
  AppsV1Api,
  AutoscalingV1Api,
  CoreV1Api,
  KubeConfig,
  NetworkingV1Api,
} from "@kubernetes/client-node";
import type { NamespaceObject, NamespaceReader, ResourceCounter } from "../types";
import type { ResourceKind } from "./namespace-guard";
import { NamespaceNotFoundError } from "../utils/errors";

type NamespacedList = (param: { namespace: string }) => Promise<{ items: unknown[] }>;

/**
 * The slice of the Kubernetes API the guard reads. Only list access on the
 * workload kinds and get access on namespaces is needed.
 */
export interface ClusterApis {
  core: {
    listNamespacedPod: NamespacedList;
    listNamespacedService: NamespacedList;
    readNamespace: (param: { name: string }) => Promise<NamespaceObject>;
  };
  apps: {
    listNamespacedReplicaSet: NamespacedList;
    listNamespacedDeployment: NamespacedList;
    listNamespacedStatefulSet: NamespacedList;
    listNamespacedDaemonSet: NamespacedList;
  };
  networking: {
    listNamespacedIngress: NamespacedList;
  };
  autoscaling: {
    listNamespacedHorizontalPodAutoscaler: NamespacedList;
  };
}

/**
 * Load cluster credentials (in-cluster service account or kubeconfig) and
 * build the typed API clients.
 */
export function createClusterApis(kubeConfig?: KubeConfig): ClusterApis {
  const kc = kubeConfig ?? new KubeConfig();
  if (!kubeConfig) {
    kc.loadFromDefault();
  }

  return {
    core: kc.makeApiClient(CoreV1Api),
    apps: kc.makeApiClient(AppsV1Api),
    networking: kc.makeApiClient(NetworkingV1Api),
    autoscaling: kc.makeApiClient(AutoscalingV1Api),
  };
}

function counter(kind: ResourceKind, list: NamespacedList): ResourceCounter {
  return {
    kind,
    count: async (namespace) => (await list({ namespace })).items.length,
  };
}

/**
 * The fixed counter table, one entry per workload kind in reporting order.
 */
export function createResourceCounters(apis: ClusterApis): ResourceCounter[] {
  const { core, apps, networking, autoscaling } = apis;

  return [
    counter("pods", (param) => core.listNamespacedPod(param)),
    counter("services", (param) => core.listNamespacedService(param)),
    counter("replicasets", (param) => apps.listNamespacedReplicaSet(param)),
    counter("deployments", (param) => apps.listNamespacedDeployment(param)),
    counter("statefulsets", (param) => apps.listNamespacedStatefulSet(param)),
    counter("daemonsets", (param) => apps.listNamespacedDaemonSet(param)),
    counter("ingresses", (param) => networking.listNamespacedIngress(param)),
    counter("horizontalpodautoscalers", (param) =>
      autoscaling.listNamespacedHorizontalPodAutoscaler(param)
    ),
  ];
}

function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === 404;
}

export function createNamespaceReader(core: ClusterApis["core"]): NamespaceReader {
  return {
    async get(name) {
      try {
        return await core.readNamespace({ name });
      } catch (error) {
        if (isNotFound(error)) {
          throw new NamespaceNotFoundError(name, error);
        }
        throw error;
      }
    },
  };
}

export function annotationsOf(namespace: NamespaceObject): Record<string, string> {
  return namespace.metadata?.annotations ?? {};
}
