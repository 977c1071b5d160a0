import { afterEach, describe, expect, it, vi } from "vitest";
import { buildApp } from "../../src/app.js";
import type { CoverageRequestServices } from "../../src/modules/coverage/container.js";
import type { PipelineResponse } from "../../src/modules/coverage/types.js";
import { StaticUserDirectory } from "../../src/modules/policies/user-directory.js";
import { SAFE_FAILURE_EXPLANATION } from "../../src/modules/coverage/messages.js";
import { getMetricsSnapshot } from "../../src/observability/metrics.js";

const DONE: PipelineResponse = {
  selected_user: "carol",
  policy_applied: "Property",
  coverage_result: "Yes",
  explanation: "Fire is a named peril under Section I - Perils Insured Against.",
  policy_references: ["Property Policy - Section I - Perils Insured Against"],
  disclaimer: "disclaimer",
  needs_clarification: false,
  clarification_question: null,
  scenario_details: null,
  retrieved_chunks: [],
  terminal_state: "done",
  trace: ["Done: coverage_result=Yes"]
};

const makeServices = () => ({
  users: new StaticUserDirectory([
    { user_id: "carol", display_name: "Carol", policies: { auto: "auto_policy_2.md", property: "property_policy_2.md" } },
    { user_id: "dave", display_name: "Dave", policies: {} }
  ]),
  orchestrator: { run: vi.fn().mockResolvedValue(DONE) }
});

const buildTestApp = (services: CoverageRequestServices) =>
  buildApp({
    logger: false,
    registerInfrastructureHealth: false,
    lifecycle: { enableBootstrap: false },
    apiDependencies: { coverage: { getServices: vi.fn().mockResolvedValue(services) } }
  });

describe("POST /coverage/ask", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("runs the pipeline for a known user", async () => {
    const services = makeServices();
    const app = await buildTestApp(services);
    try {
      const response = await app.inject({
        method: "POST",
        url: "/coverage/ask",
        headers: { "x-request-id": "req-42" },
        payload: { user_id: " carol ", question: "  What if my house catches fire?  ", top_k: 3 }
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers["x-request-id"]).toBe("req-42");
      expect(response.json()).toEqual(DONE);
      expect(services.orchestrator.run).toHaveBeenCalledWith({
        userId: "carol",
        question: "What if my house catches fire?",
        userPolicies: { auto: "auto_policy_2.md", property: "property_policy_2.md" },
        topK: 3,
        requestId: "req-42"
      });
    } finally {
      await app.close();
    }
  });

  it("returns 422 with field locations for an invalid body", async () => {
    const services = makeServices();
    const app = await buildTestApp(services);
    try {
      const response = await app.inject({
        method: "POST",
        url: "/coverage/ask",
        payload: { user_id: "carol", question: "   ", top_k: 0 }
      });

      expect(response.statusCode).toBe(422);
      expect(response.json()).toEqual({
        detail: [
          { type: "too_small", loc: ["body", "question"], msg: "question is required" },
          { type: "too_small", loc: ["body", "top_k"], msg: "Number must be greater than 0" }
        ]
      });
      expect(services.orchestrator.run).not.toHaveBeenCalled();
      expect(getMetricsSnapshot()).toMatchObject({ error_rates: { validation_422: 1 } });
    } finally {
      await app.close();
    }
  });

  it("returns 404 for an unknown user", async () => {
    const app = await buildTestApp(makeServices());
    try {
      const response = await app.inject({
        method: "POST",
        url: "/coverage/ask",
        payload: { user_id: "zed", question: "Is hail covered?" }
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ detail: 'Unknown user "zed"' });
    } finally {
      await app.close();
    }
  });

  it("answers a user without policies without running the pipeline", async () => {
    const services = makeServices();
    const app = await buildTestApp(services);
    try {
      const response = await app.inject({
        method: "POST",
        url: "/coverage/ask",
        payload: { user_id: "dave", question: "Is hail covered?" }
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        selected_user: "dave",
        coverage_result: "ItDepends",
        terminal_state: "no_policy"
      });
      expect(services.orchestrator.run).not.toHaveBeenCalled();
    } finally {
      await app.close();
    }
  });

  it("returns a safe 503 when the pipeline cannot be loaded", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const app = await buildApp({
      logger: false,
      registerInfrastructureHealth: false,
      lifecycle: { enableBootstrap: false },
      apiDependencies: { coverage: { getServices: vi.fn().mockRejectedValue(new Error("users file is not valid JSON")) } }
    });
    try {
      const response = await app.inject({
        method: "POST",
        url: "/coverage/ask",
        payload: { user_id: "carol", question: "Is hail covered?" }
      });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toEqual({ detail: SAFE_FAILURE_EXPLANATION });
      expect(getMetricsSnapshot()).toMatchObject({ error_rates: { service_unavailable_503: 1 } });
    } finally {
      await app.close();
    }
  });

  it("echoes the request id and exposes request metrics", async () => {
    const app = await buildTestApp(makeServices());
    try {
      const ask = await app.inject({
        method: "POST",
        url: "/coverage/ask",
        payload: { user_id: "carol", question: "Is my car covered for theft?" }
      });
      const metrics = await app.inject({ method: "GET", url: "/metrics" });

      expect(ask.headers["x-request-id"]).toEqual(expect.any(String));
      expect(metrics.json()).toMatchObject({ request_latency: { count: 1 } });
    } finally {
      await app.close();
    }
  });
});
