import { fileURLToPath } from "node:url";
import { buildApp } from "./app.js";
import { getConfig } from "./config/index.js";
import { getCoverageServices } from "./modules/coverage/container.js";

export async function bootstrap(): Promise<void> {
  const config = getConfig();
  // Fail fast on a broken users file instead of on the first request.
  await getCoverageServices();

  const app = await buildApp({ frontendOrigin: config.FRONTEND_ORIGIN });
  await app.listen({
    host: "0.0.0.0",
    port: config.PORT
  });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().catch((error) => {
    console.error("Startup failed", error);
    process.exitCode = 1;
  });
}
