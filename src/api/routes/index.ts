import type { FastifyInstance } from "fastify";
import { registerCoverageRoutes, type CoverageRoutesDependencies } from "./coverage.js";
import { registerUserRoutes, type UserRoutesDependencies } from "./users.js";

export interface ApiRoutesDependencies {
  coverage?: CoverageRoutesDependencies;
  users?: UserRoutesDependencies;
}

export async function registerApiRoutes(app: FastifyInstance, dependencies?: ApiRoutesDependencies): Promise<void> {
  await registerUserRoutes(app, dependencies?.users);
  await registerCoverageRoutes(app, dependencies?.coverage);
}
