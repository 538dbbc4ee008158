// Kubernetes Admission Review Types

export type AdmissionOperation = "CREATE" | "UPDATE" | "DELETE" | "CONNECT";

export interface GroupVersionKind {
  group: string;
  version: string;
  kind: string;
}

export interface GroupVersionResource {
  group: string;
  version: string;
  resource: string;
}

export interface AdmissionReviewRequest {
  apiVersion: string;
  kind: string;
  request: {
    uid: string;
    kind: GroupVersionKind;
    resource: GroupVersionResource;
    subResource?: string;
    name?: string;
    namespace?: string;
    operation: AdmissionOperation;
    userInfo?: {
      username?: string;
      uid?: string;
      groups?: string[];
    };
    object?: unknown;
    oldObject?: unknown;
    dryRun?: boolean;
  };
}

export interface AdmissionReviewResponse {
  apiVersion: string;
  kind: string;
  response: {
    uid: string;
    allowed: boolean;
    status?: {
      code: number;
      reason: string;
      message: string;
    };
  };
}

export interface ObjectMeta {
  name?: string;
  annotations?: Record<string, string>;
  labels?: Record<string, string>;
}

export interface NamespaceObject {
  metadata?: ObjectMeta;
}
