import { describe, test, expect, beforeEach, vi } from "vitest";
import {
  BYPASS_ANNOTATION_KEY,
  RESOURCE_KINDS,
  evaluateNamespaceDeletion,
  formatDenialMessage,
} from "./namespace-guard";
import { fakeCounters } from "../testing/fakes";
import type { ResourceCounter } from "../types";

const WARNING =
  "WARNING: If you know what you are doing, run `kubectl annotate namespace ns1 admission.namespace-guard.dev/allow-cascade-delete=true` to bypass this policy check.";

describe("evaluateNamespaceDeletion", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "debug").mockImplementation(() => {});
  });

  test("should be clear when every kind is empty", async () => {
    const result = await evaluateNamespaceDeletion("ns1", fakeCounters());
    expect(result).toEqual({ clear: true });
  });

  test("should be clear for an empty counter table", async () => {
    const result = await evaluateNamespaceDeletion("ns1", []);
    expect(result).toEqual({ clear: true });
  });

  test("should deny a namespace holding one pod", async () => {
    const result = await evaluateNamespaceDeletion("ns1", fakeCounters({ pods: 1 }));

    expect(result.clear).toBe(false);
    if (result.clear) return;
    expect(result.tally).toEqual({ nonEmpty: [{ kind: "pods", count: 1 }], failures: [] });
    expect(result.message).toBe(
      "The namespace ns1 you are trying to remove contains one or more of these resources: [pods(1)]. Please delete them and try again. " +
        WARNING
    );
  });

  test("should list all eight kinds in fixed order", async () => {
    const result = await evaluateNamespaceDeletion(
      "ns1",
      fakeCounters({
        horizontalpodautoscalers: 1,
        ingresses: 1,
        daemonsets: 1,
        statefulsets: 1,
        deployments: 1,
        replicasets: 1,
        services: 1,
        pods: 1,
      })
    );

    if (result.clear) throw new Error("expected a denial");
    expect(result.tally.nonEmpty.map((entry) => entry.kind)).toEqual([...RESOURCE_KINDS]);
    expect(result.message).toContain(
      "[pods(1), services(1), replicasets(1), deployments(1), statefulsets(1), daemonsets(1), ingresses(1), horizontalpodautoscalers(1)]"
    );
  });

  test("should report exact counts", async () => {
    const result = await evaluateNamespaceDeletion("ns1", fakeCounters({ services: 3, ingresses: 12 }));

    if (result.clear) throw new Error("expected a denial");
    expect(result.tally.nonEmpty).toEqual([
      { kind: "services", count: 3 },
      { kind: "ingresses", count: 12 },
    ]);
    expect(result.message).toContain("[services(3), ingresses(12)]");
  });

  test("should deny when a query fails even though everything else is empty", async () => {
    const result = await evaluateNamespaceDeletion(
      "ns1",
      fakeCounters({ deployments: new Error("deployments.apps is forbidden") })
    );

    if (result.clear) throw new Error("expected a denial");
    expect(result.tally).toEqual({
      nonEmpty: [],
      failures: [{ kind: "deployments", error: "deployments.apps is forbidden" }],
    });
    expect(result.message).toBe(
      "The following error(s) occurred while validating the DELETE operation on the namespace ns1: [error listing deployments, deployments.apps is forbidden]. " +
        WARNING
    );
  });

  test("should keep counting the remaining kinds after a failure", async () => {
    const result = await evaluateNamespaceDeletion(
      "ns1",
      fakeCounters({ pods: new Error("timeout"), daemonsets: 2, horizontalpodautoscalers: 1 })
    );

    if (result.clear) throw new Error("expected a denial");
    expect(result.tally.nonEmpty).toEqual([
      { kind: "daemonsets", count: 2 },
      { kind: "horizontalpodautoscalers", count: 1 },
    ]);
    expect(result.tally.failures).toEqual([{ kind: "pods", error: "timeout" }]);
  });

  test("should carry both clauses when resources exist and queries fail", async () => {
    const result = await evaluateNamespaceDeletion(
      "ns1",
      fakeCounters({ pods: 1, services: new Error("boom"), ingresses: new Error("gone") })
    );

    if (result.clear) throw new Error("expected a denial");
    expect(result.message).toBe(
      "The namespace ns1 you are trying to remove contains one or more of these resources: [pods(1)]. Please delete them and try again. " +
        "The following error(s) occurred while validating the DELETE operation on the namespace ns1: [error listing services, boom; error listing ingresses, gone]. " +
        WARNING
    );
  });

  test("should record non-Error rejections as text", async () => {
    const counters: ResourceCounter[] = [{ kind: "pods", count: () => Promise.reject("raw failure") }];

    const result = await evaluateNamespaceDeletion("ns1", counters);

    if (result.clear) throw new Error("expected a denial");
    expect(result.tally.failures).toEqual([{ kind: "pods", error: "raw failure" }]);
  });

  test("should treat a synchronous throw as a query failure", async () => {
    const counters: ResourceCounter[] = [
      {
        kind: "pods",
        count: () => {
          throw new Error("not configured");
        },
      },
      { kind: "services", count: async () => 1 },
    ];

    const result = await evaluateNamespaceDeletion("ns1", counters);

    if (result.clear) throw new Error("expected a denial");
    expect(result.tally).toEqual({
      nonEmpty: [{ kind: "services", count: 1 }],
      failures: [{ kind: "pods", error: "not configured" }],
    });
  });

  test("should order results by table, not by completion", async () => {
    const counters: ResourceCounter[] = [
      { kind: "pods", count: () => new Promise((resolve) => setTimeout(() => resolve(4), 20)) },
      { kind: "services", count: async () => 2 },
    ];

    const result = await evaluateNamespaceDeletion("ns1", counters);

    if (result.clear) throw new Error("expected a denial");
    expect(result.tally.nonEmpty).toEqual([
      { kind: "pods", count: 4 },
      { kind: "services", count: 2 },
    ]);
  });

  test("should query every kind with the namespace name", async () => {
    const seen: string[] = [];
    const counters: ResourceCounter[] = RESOURCE_KINDS.map((kind) => ({
      kind,
      count: async (namespace) => {
        seen.push(`${kind}:${namespace}`);
        return 0;
      },
    }));

    await evaluateNamespaceDeletion("team-a", counters);

    expect(seen).toHaveLength(8);
    expect(seen).toContain("pods:team-a");
    expect(seen).toContain("horizontalpodautoscalers:team-a");
  });

  test("should give the same verdict for unchanged state", async () => {
    const counters = fakeCounters({ pods: 2, services: new Error("boom") });

    const first = await evaluateNamespaceDeletion("ns1", counters);
    const second = await evaluateNamespaceDeletion("ns1", counters);

    expect(second).toEqual(first);
  });

  describe("cancellation", () => {
    test("should reject without querying when already aborted", async () => {
      const count = vi.fn(async () => 1);
      const controller = new AbortController();
      controller.abort(new Error("deadline exceeded"));

      await expect(
        evaluateNamespaceDeletion("ns1", [{ kind: "pods", count }], controller.signal)
      ).rejects.toThrow("deadline exceeded");
      expect(count).not.toHaveBeenCalled();
    });

    test("should reject when aborted while queries are in flight", async () => {
      const controller = new AbortController();
      const counters: ResourceCounter[] = [
        { kind: "pods", count: async () => 3 },
        { kind: "services", count: () => new Promise<number>(() => {}) },
      ];

      const evaluation = evaluateNamespaceDeletion("ns1", counters, controller.signal);
      controller.abort(new Error("client went away"));

      await expect(evaluation).rejects.toThrow("client went away");
    });
  });
});

describe("formatDenialMessage", () => {
  test("should name the bypass annotation and command", () => {
    const message = formatDenialMessage("payments", {
      nonEmpty: [{ kind: "pods", count: 5 }],
      failures: [],
    });

    expect(message).toContain(`kubectl annotate namespace payments ${BYPASS_ANNOTATION_KEY}=true`);
  });
});
