import Fastify from "fastify";
import { describe, expect, it, vi } from "vitest";
import { registerInfrastructureHealthRoute } from "../../src/api/routes/infrastructure-health.js";
import { createMockModelClient, type OpenAISingleton } from "../../src/clients/openai.js";

const singleton = (health: Awaited<ReturnType<OpenAISingleton["healthCheck"]>>): OpenAISingleton => ({
  client: createMockModelClient("model-test"),
  healthCheck: vi.fn().mockResolvedValue(health)
});

describe("registerInfrastructureHealthRoute", () => {
  it("returns the model client health", async () => {
    const app = Fastify();
    try {
      await registerInfrastructureHealthRoute(app, {
        getOpenAIClient: vi.fn().mockResolvedValue(singleton({ status: "ok" }))
      });

      const response = await app.inject({
        method: "GET",
        url: "/infra/health"
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: "ok",
        clients: { openai: { status: "ok" } }
      });
    } finally {
      await app.close();
    }
  });

  it("returns 503 when the model client is unhealthy", async () => {
    const app = Fastify();
    try {
      await registerInfrastructureHealthRoute(app, {
        getOpenAIClient: vi.fn().mockResolvedValue(singleton({ status: "error", details: "401 invalid api key" }))
      });

      const response = await app.inject({
        method: "GET",
        url: "/infra/health"
      });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toEqual({
        status: "error",
        clients: { openai: { status: "error", details: "401 invalid api key" } }
      });
    } finally {
      await app.close();
    }
  });

  it("returns 503 when client resolution throws", async () => {
    const app = Fastify();
    try {
      await registerInfrastructureHealthRoute(app, {
        getOpenAIClient: vi.fn().mockRejectedValue(new Error("Invalid environment configuration"))
      });

      const response = await app.inject({
        method: "GET",
        url: "/infra/health"
      });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toEqual({
        status: "error",
        detail: "Invalid environment configuration"
      });
    } finally {
      await app.close();
    }
  });
});
