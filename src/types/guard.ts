// Namespace deletion guard types

import type { NamespaceObject } from "./kubernetes";

/**
 * One entry of the fixed counter table: a resource kind and the query that
 * counts its members in a namespace.
 */
export interface ResourceCounter {
  kind: string;
  count: (namespace: string) => Promise<number>;
}

export interface NonEmptyKind {
  kind: string;
  count: number;
}

export interface FailedKind {
  kind: string;
  error: string;
}

/**
 * Evidence gathered for one namespace. Both lists follow counter table
 * order.
 */
export interface ResourceTally {
  nonEmpty: NonEmptyKind[];
  failures: FailedKind[];
}

export type NamespaceEvaluation =
  | { clear: true }
  | { clear: false; tally: ResourceTally; message: string };

export interface NamespaceReader {
  /**
   * Rejects with NamespaceNotFoundError when the namespace does not exist.
   */
  get(name: string): Promise<NamespaceObject>;
}

export interface AdmissionOptions {
  admitAll: boolean;
  namespaces: NamespaceReader;
  counters: readonly ResourceCounter[];
}
