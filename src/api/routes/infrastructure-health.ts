import type { FastifyInstance } from "fastify";
import { getOpenAIClient } from "../../clients/openai.js";

export interface InfrastructureHealthDependencies {
  getOpenAIClient?: typeof getOpenAIClient;
}

export async function registerInfrastructureHealthRoute(
  app: FastifyInstance,
  dependencies?: InfrastructureHealthDependencies
): Promise<void> {
  const resolveClient = dependencies?.getOpenAIClient ?? getOpenAIClient;

  app.get("/infra/health", async (_request, reply) => {
    try {
      const openai = await resolveClient();
      const openaiHealth = await openai.healthCheck();

      if (openaiHealth.status !== "ok") {
        reply.code(503);
        return {
          status: "error",
          clients: { openai: openaiHealth }
        };
      }

      return {
        status: "ok",
        clients: { openai: openaiHealth }
      };
    } catch (error) {
      const detail = error instanceof Error ? error.message : "unknown error";
      reply.code(503);
      return {
        status: "error",
        detail
      };
    }
  });
}
