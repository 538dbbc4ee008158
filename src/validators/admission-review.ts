/* Validates the body of an AdmissionReview sent by the apiserver before any
   gate looks at it. Unknown fields are dropped. */

import { z } from "zod";
import type { AdmissionReviewRequest } from "../types";

const GroupVersionKindSchema = z.object({
  group: z.string(),
  version: z.string(),
  kind: z.string(),
});

const GroupVersionResourceSchema = z.object({
  group: z.string(),
  version: z.string(),
  resource: z.string(),
});

export const AdmissionReviewSchema: z.ZodType<AdmissionReviewRequest> = z.object({
  apiVersion: z.string(),
  kind: z.literal("AdmissionReview"),
  request: z.object({
    uid: z.string().min(1),
    kind: GroupVersionKindSchema,
    resource: GroupVersionResourceSchema,
    subResource: z.string().optional(),
    name: z.string().optional(),
    namespace: z.string().optional(),
    operation: z.enum(["CREATE", "UPDATE", "DELETE", "CONNECT"]),
    userInfo: z
      .object({
        username: z.string().optional(),
        uid: z.string().optional(),
        groups: z.array(z.string()).optional(),
      })
      .optional(),
    object: z.unknown().optional(),
    oldObject: z.unknown().optional(),
    dryRun: z.boolean().optional(),
  }),
});

export type DecodeResult =
  | { valid: true; value: AdmissionReviewRequest }
  | { valid: false; error: string };

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Parse raw request bytes into an AdmissionReview.
 */
export function decodeAdmissionReview(body: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    return { valid: false, error: error instanceof Error ? error.message : String(error) };
  }

  const res = AdmissionReviewSchema.safeParse(parsed);
  if (!res.success) return { valid: false, error: describeIssues(res.error) };
  return { valid: true, value: res.data };
}
