import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildAllowedFrontendOrigins, buildApp } from "../../src/app.js";

describe("app.ts", () => {
  it("buildAllowedFrontendOrigins returns defaults and localhost aliases", () => {
    expect(buildAllowedFrontendOrigins(undefined)).toEqual(["http://localhost:5173", "http://127.0.0.1:5173"]);

    const custom = buildAllowedFrontendOrigins("http://localhost:3000, invalid-url, http://localhost:3000");
    expect(custom).toEqual(["http://localhost:3000", "invalid-url", "http://127.0.0.1:3000"]);
  });

  it("buildApp wires cors, health, metrics and api routes", async () => {
    const app = await buildApp({
      logger: false,
      frontendOrigin: "http://localhost:9999",
      lifecycle: { enableBootstrap: false },
      registerInfrastructureHealth: false,
      apiDependencies: {
        users: { getUserDirectory: vi.fn().mockResolvedValue({ listUsers: vi.fn().mockResolvedValue([]) }) }
      }
    });
    try {
      const preflight = await app.inject({
        method: "OPTIONS",
        url: "/coverage/ask",
        headers: {
          origin: "http://127.0.0.1:9999",
          "access-control-request-method": "POST"
        }
      });
      const health = await app.inject({ method: "GET", url: "/health" });
      const users = await app.inject({ method: "GET", url: "/users" });
      const infra = await app.inject({ method: "GET", url: "/infra/health" });

      expect(preflight.statusCode).toBe(204);
      expect(preflight.headers["access-control-allow-origin"]).toBe("http://127.0.0.1:9999");
      expect(preflight.headers["access-control-allow-methods"]).toBe("GET, POST, OPTIONS");
      expect(health.json()).toEqual({ status: "ok" });
      expect(users.json()).toEqual({ users: [] });
      expect(infra.statusCode).toBe(404);
    } finally {
      await app.close();
    }
  });
});

describe("server.ts", () => {
  beforeEach(() => {
    vi.resetModules();
  });

  afterEach(() => {
    vi.doUnmock("../../src/app.js");
    vi.doUnmock("../../src/modules/coverage/container.js");
  });

  it("loads the pipeline before listening on the configured port", async () => {
    const calls: string[] = [];
    const listen = vi.fn(async () => {
      calls.push("listen");
    });
    const buildAppMock = vi.fn(async () => ({ listen }));
    const getCoverageServices = vi.fn(async () => {
      calls.push("services");
    });
    vi.doMock("../../src/app.js", () => ({ buildApp: buildAppMock }));
    vi.doMock("../../src/modules/coverage/container.js", () => ({ getCoverageServices }));
    vi.stubEnv("OPENAI_API_KEY", "test-secret");
    vi.stubEnv("PORT", "4321");
    vi.stubEnv("FRONTEND_ORIGIN", "http://localhost:4000");

    const { bootstrap } = await import("../../src/server.js");
    await bootstrap();

    expect(calls).toEqual(["services", "listen"]);
    expect(buildAppMock).toHaveBeenCalledWith({ frontendOrigin: "http://localhost:4000" });
    expect(listen).toHaveBeenCalledWith({ host: "0.0.0.0", port: 4321 });
  });

  it("fails before listening when the environment is invalid", async () => {
    const buildAppMock = vi.fn();
    vi.doMock("../../src/app.js", () => ({ buildApp: buildAppMock }));
    vi.stubEnv("OPENAI_API_KEY", "");

    const { bootstrap } = await import("../../src/server.js");

    await expect(bootstrap()).rejects.toThrow("Invalid environment configuration");
    expect(buildAppMock).not.toHaveBeenCalled();
  });
});
