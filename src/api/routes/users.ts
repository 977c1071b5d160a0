import type { FastifyInstance } from "fastify";
import { getCoverageServices } from "../../modules/coverage/container.js";
import type { UserPolicyDirectory } from "../../modules/policies/types.js";
import { listAvailablePolicyTypes } from "../../modules/policies/user-directory.js";
import { recordErrorRate } from "../../observability/metrics.js";

export interface UserRoutesDependencies {
  getUserDirectory?: () => Promise<UserPolicyDirectory>;
}

export async function registerUserRoutes(app: FastifyInstance, dependencies?: UserRoutesDependencies): Promise<void> {
  const getUserDirectory =
    dependencies?.getUserDirectory ?? (async () => (await getCoverageServices()).users);

  app.get("/users", async () => {
    const directory = await getUserDirectory();
    const users = await directory.listUsers();
    return {
      users: users.map((user) => ({
        user_id: user.user_id,
        display_name: user.display_name,
        policy_types: listAvailablePolicyTypes(user.policies)
      }))
    };
  });

  app.get<{ Params: { userId: string } }>("/users/:userId/policies", async (request, reply) => {
    const directory = await getUserDirectory();
    const user = await directory.getUser(request.params.userId);
    if (!user) {
      recordErrorRate("user_not_found_404");
      reply.code(404);
      return { detail: `Unknown user "${request.params.userId}"` };
    }

    return {
      user_id: user.user_id,
      display_name: user.display_name,
      policy_types: listAvailablePolicyTypes(user.policies),
      policies: user.policies
    };
  });
}
