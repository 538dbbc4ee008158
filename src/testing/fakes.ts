import type { NamespaceObject, NamespaceReader, ResourceCounter } from "../types";
import { RESOURCE_KINDS, type ResourceKind } from "../services/namespace-guard";
import { NamespaceNotFoundError } from "../utils/errors";

export type FakeCount = number | Error;

/**
 * Counter table over fixed per-kind results. Kinds left out count zero.
 */
export function fakeCounters(results: Partial<Record<ResourceKind, FakeCount>> = {}): ResourceCounter[] {
  return RESOURCE_KINDS.map((kind) => ({
    kind,
    count: async () => {
      const result = results[kind] ?? 0;
      if (result instanceof Error) throw result;
      return result;
    },
  }));
}

/**
 * Reader over an in-memory set of namespaces. `failure` makes every lookup
 * reject with that error instead.
 */
export function fakeNamespaces(
  namespaces: Record<string, NamespaceObject>,
  failure?: Error
): NamespaceReader {
  return {
    async get(name) {
      if (failure) throw failure;
      const namespace = namespaces[name];
      if (!namespace) throw new NamespaceNotFoundError(name);
      return namespace;
    },
  };
}
