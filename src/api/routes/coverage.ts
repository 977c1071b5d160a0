import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { getCoverageServices, type CoverageRequestServices } from "../../modules/coverage/container.js";
import { buildNoPolicyResponse } from "../../modules/coverage/coverage-orchestrator.js";
import { SAFE_FAILURE_EXPLANATION } from "../../modules/coverage/messages.js";
import type { UserProfile } from "../../modules/policies/types.js";
import { listAvailablePolicyTypes } from "../../modules/policies/user-directory.js";
import { logError, logInfo, serializeError } from "../../observability/logger.js";
import { recordErrorRate, resolveRequestId } from "../../observability/metrics.js";

const askBodySchema = z.object({
  user_id: z.string().trim().min(1, "user_id is required"),
  question: z.string().trim().min(1, "question is required").max(2000, "question is too long"),
  top_k: z.number().int().positive().max(50).optional()
});

const toValidationError = (error: z.ZodError) => ({
  detail: error.issues.map((issue) => ({
    type: issue.code,
    loc: ["body", ...issue.path],
    msg: issue.message
  }))
});

export interface CoverageRoutesDependencies {
  getServices?: () => Promise<CoverageRequestServices>;
}

const buildAskHandler = (dependencies?: CoverageRoutesDependencies) => {
  const getServices = dependencies?.getServices ?? getCoverageServices;

  return async (request: FastifyRequest, reply: FastifyReply) => {
    const requestId = resolveRequestId(request);
    const parsed = askBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      reply.code(422);
      return toValidationError(parsed.error);
    }

    let services: CoverageRequestServices;
    let user: UserProfile | null;
    try {
      services = await getServices();
      user = await services.users.getUser(parsed.data.user_id);
    } catch (error) {
      logError(
        "coverage.request.services_unavailable",
        { requestId, userId: parsed.data.user_id },
        serializeError(error)
      );
      recordErrorRate("service_unavailable_503");
      reply.code(503);
      return { detail: SAFE_FAILURE_EXPLANATION };
    }
    if (!user) {
      recordErrorRate("user_not_found_404");
      reply.code(404);
      return { detail: `Unknown user "${parsed.data.user_id}"` };
    }

    const availableTypes = listAvailablePolicyTypes(user.policies);
    logInfo(
      "coverage.request.received",
      { requestId, userId: user.user_id },
      { policy_types: availableTypes, top_k: parsed.data.top_k ?? null }
    );

    if (availableTypes.length === 0) {
      return buildNoPolicyResponse(user.user_id);
    }

    return services.orchestrator.run({
      userId: user.user_id,
      question: parsed.data.question,
      userPolicies: user.policies,
      topK: parsed.data.top_k,
      requestId
    });
  };
};

export async function registerCoverageRoutes(
  app: FastifyInstance,
  dependencies?: CoverageRoutesDependencies
): Promise<void> {
  app.post("/coverage/ask", buildAskHandler(dependencies));
}
